import { OpenAPIV3 } from 'openapi-types';

const namespaceParam: OpenAPIV3.ParameterObject = {
  name: 'namespace', in: 'query', schema: { type: 'string' }, description: 'Defaults to K8S_DEFAULT_NAMESPACE'
};
const warningDaysParam: OpenAPIV3.ParameterObject = {
  name: 'warning_days', in: 'query', schema: { type: 'integer', minimum: 1, default: 30 },
  description: 'Warn for certificates expiring within this many days; invalid values fall back to the default'
};
const errorResponse: OpenAPIV3.ResponseObject = {
  description: 'Error', content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } }
};

export const openapiSpec: OpenAPIV3.Document = {
  openapi: '3.0.3',
  info: {
    title: 'EKS Certificate Monitor API',
    version: '0.1.0',
    description: 'Read-only certificate inventory and expiry analysis for an EKS cluster.'
  },
  servers: [
    { url: '/api', description: 'Base API path (proxy relative)' }
  ],
  tags: [
    { name: 'ClusterCA' },
    { name: 'Pods' },
    { name: 'Identity' },
    { name: 'Diagnostics' }
  ],
  paths: {
    '/cluster-ca': {
      get: {
        tags: ['ClusterCA'],
        summary: 'Cluster CA certificate from the kubeconfig',
        responses: { '200': { description: 'OK' }, '401': errorResponse, '500': errorResponse }
      }
    },
    '/cluster-ca/expiry': {
      get: {
        tags: ['ClusterCA'],
        summary: 'Expiry analysis of the cluster CA',
        parameters: [warningDaysParam],
        responses: { '200': { description: 'OK' }, '401': errorResponse, '500': errorResponse }
      }
    },
    '/pods': {
      get: {
        tags: ['Pods'],
        summary: 'Pods with phase, node, creation time, certificate-looking mounts and classified volumes',
        parameters: [namespaceParam],
        responses: { '200': { description: 'OK' }, '401': errorResponse }
      }
    },
    '/pods/{name}/certificates': {
      get: {
        tags: ['Pods'],
        summary: 'Certificates reachable from one pod (cluster CA, secrets, config maps)',
        parameters: [
          { name: 'name', in: 'path', required: true, schema: { type: 'string' } },
          namespaceParam,
          warningDaysParam
        ],
        responses: {
          '200': { description: 'OK', content: { 'application/json': { schema: { type: 'object', properties: {
            certificateSources: { type: 'object', additionalProperties: { $ref: '#/components/schemas/CertificateSource' } },
            expiryWarnings: { type: 'array', items: { type: 'string' } }
          } } } } },
          '404': errorResponse
        }
      }
    },
    '/certificate-expiry': {
      get: {
        tags: ['Pods'],
        summary: 'Expiry analysis for every pod in a namespace',
        parameters: [namespaceParam, warningDaysParam],
        responses: { '200': { description: 'OK' }, '401': errorResponse }
      }
    },
    '/identity': {
      get: {
        tags: ['Identity'],
        summary: 'AWS caller identity used for token generation',
        responses: { '200': { description: 'OK' }, '401': errorResponse }
      }
    },
    '/diagnostics/connect': {
      get: {
        tags: ['Diagnostics'],
        summary: 'Mint a token and list one namespace to confirm cluster access',
        responses: { '200': { description: 'OK' }, '401': errorResponse, '502': errorResponse }
      }
    },
    '/diagnostics/debug': {
      get: {
        tags: ['Diagnostics'],
        summary: 'Credential settings and kubeconfig details',
        responses: { '200': { description: 'OK' } }
      }
    },
    '/diagnostics/auth': {
      get: {
        tags: ['Diagnostics'],
        summary: 'Staged checks: credentials, client, namespaces, pods in the target and default namespaces',
        responses: { '200': { description: 'OK' } }
      }
    }
  },
  components: {
    schemas: {
      Error: { type: 'object', properties: {
        status: { type: 'string', enum: ['error'] },
        code: { type: 'string' },
        error: { type: 'string' }
      } },
      Certificate: { type: 'object', properties: {
        subject: { type: 'string' },
        issuer: { type: 'string' },
        serialNumber: { type: 'string', description: 'Decimal' },
        notBefore: { type: 'string', format: 'date-time' },
        notAfter: { type: 'string', format: 'date-time' },
        isExpired: { type: 'boolean' },
        daysUntilExpiry: { type: 'integer' },
        dnsNames: { type: 'array', items: { type: 'string' } },
        ipAddresses: { type: 'array', items: { type: 'string' } },
        keyUsage: { type: 'array', items: { type: 'string' } },
        isCA: { type: 'boolean' }
      } },
      CertificateSource: { type: 'object', required: ['type', 'name', 'namespace', 'certificates'], properties: {
        type: { type: 'string', enum: ['secret', 'configmap', 'cluster-ca'] },
        name: { type: 'string' },
        namespace: { type: 'string' },
        key: { type: 'string' },
        certificates: { type: 'array', items: { $ref: '#/components/schemas/Certificate' } },
        error: { type: 'string' }
      } }
    }
  }
};
