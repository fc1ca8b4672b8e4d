import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { logger } from './logger.js';

const config = loadConfig();
if (!config.aws.accessKeyId) {
  logger.info('no static AWS credentials configured, using the SDK default credential chain');
}
if (!config.aws.region) {
  logger.warn('AWS region is not configured, STS calls use us-east-1');
}

const app = createApp({ config });
app.listen(config.port, () => logger.info({ msg: 'api listening', port: config.port }));
