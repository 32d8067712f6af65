import { OpenAPIV3 } from 'openapi-types';

const json = (schema: OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject) => ({ 'application/json': { schema } });
const ref = (name: string): OpenAPIV3.ReferenceObject => ({ $ref: `#/components/schemas/${name}` });
const error = (description: string): OpenAPIV3.ResponseObject => ({ description, content: json(ref('Error')) });
const noContent: OpenAPIV3.ResponseObject = { description: 'No Content' };
const idParam: OpenAPIV3.ParameterObject = { name: 'id', in: 'path', required: true, schema: { type: 'string' } };
const pageParams: OpenAPIV3.ParameterObject[] = [
  { name: 'first', in: 'query', schema: { type: 'integer', minimum: 0, default: 0 } },
  { name: 'max', in: 'query', schema: { type: 'integer', minimum: 1, maximum: 100, default: 20 } },
];
const adminErrors = { '401': error('Missing or invalid bearer token'), '403': error('Administrator role required'), '503': error('Directory unavailable') };
const bearer: OpenAPIV3.SecurityRequirementObject[] = [{ bearerAuth: [] }];

export const openapiSpec: OpenAPIV3.Document = {
  openapi: '3.0.3',
  info: {
    title: 'Identity Portal API',
    version: '0.1.0',
    description: 'Short-lived SSH certificates, cluster kubeconfigs and directory administration for OIDC-authenticated users.',
  },
  servers: [{ url: '/api/v1', description: 'Base API path (proxy relative)' }],
  tags: [{ name: 'Auth' }, { name: 'SSH' }, { name: 'Kubeconfig' }, { name: 'Users' }, { name: 'Groups' }, { name: 'Audit' }],
  security: bearer,
  paths: {
    '/auth/login': {
      get: {
        tags: ['Auth'],
        summary: 'Redirect to the identity provider',
        description: 'Starts a PKCE (S256) authorization-code flow and sets the HttpOnly `login_session` cookie that binds the state to this browser.',
        security: [],
        parameters: [{ name: 'returnTo', in: 'query', schema: { type: 'string' }, description: 'Same-origin path to return to' }],
        responses: { '302': { description: 'Redirect to the authorization endpoint' } },
      },
    },
    '/auth/callback': {
      get: {
        tags: ['Auth'],
        summary: 'Complete the authorization-code flow',
        description: 'Requires the `login_session` cookie set by /auth/login; the cookie is cleared whatever the outcome.',
        security: [],
        parameters: [
          { name: 'code', in: 'query', schema: { type: 'string' } },
          { name: 'state', in: 'query', schema: { type: 'string' } },
          { name: 'error', in: 'query', schema: { type: 'string' } },
        ],
        responses: {
          '200': { description: 'Token set and user summary', content: json(ref('LoginResult')) },
          '400': error('Missing code or state'),
          '401': error('Login failed or state invalid'),
        },
      },
    },
    '/auth/logout': {
      post: {
        tags: ['Auth'],
        summary: 'End the session',
        requestBody: {
          content: json({ type: 'object', properties: { refreshToken: { type: 'string' }, postLogoutRedirectUri: { type: 'string', format: 'uri' } } }),
        },
        responses: {
          '200': { description: 'OK', content: json({ type: 'object', properties: { endSessionUrl: { type: 'string', nullable: true } } }) },
          '401': error('Missing or invalid bearer token'),
        },
      },
    },
    '/config': {
      get: {
        tags: ['Auth'],
        summary: 'Settings the web UI needs before login',
        security: [],
        responses: { '200': { description: 'OK', content: json(ref('PublicConfig')) } },
      },
    },
    '/auth/userinfo': {
      get: {
        tags: ['Auth'],
        summary: 'Current principal and resolved role',
        responses: { '200': { description: 'OK', content: json(ref('UserSummary')) }, '401': error('Missing or invalid bearer token') },
      },
    },
    '/ssh/sign': {
      post: {
        tags: ['SSH'],
        summary: 'Sign an SSH public key',
        requestBody: {
          required: true,
          content: json({
            type: 'object',
            required: ['publicKey'],
            properties: {
              publicKey: { type: 'string', description: 'authorized_keys line (ssh-ed25519, or ssh-rsa >= 4096 bits)' },
              role: { type: 'string', description: 'Request a role ranked at or below your own' },
              ttl: { oneOf: [{ type: 'integer' }, { type: 'string' }], description: 'Seconds or a duration like 30m; clamped to the role maximum' },
            },
          }),
        },
        responses: {
          '201': { description: 'Issued', content: json(ref('SshCertificate')) },
          '400': error('Invalid public key or request'),
          '401': error('Missing or invalid bearer token'),
          '403': error('No eligible role, or role not permitted'),
          '429': error('Signing rate limit exceeded'),
          '503': error('PKI backend unavailable'),
        },
      },
    },
    '/ssh/roles': {
      get: {
        tags: ['SSH'],
        summary: 'Roles available to the caller',
        responses: {
          '200': {
            description: 'OK',
            content: json({ type: 'object', properties: { current: { type: 'string' }, items: { type: 'array', items: ref('Role') } } }),
          },
          '403': error('No eligible role'),
        },
      },
    },
    '/ssh/public-key': {
      get: {
        tags: ['SSH'],
        summary: 'The caller\'s registered SSH key',
        responses: { '200': { description: 'OK', content: json(ref('RegisteredKey')) }, '401': error('Missing or invalid bearer token'), '404': error('No key registered') },
      },
      put: {
        tags: ['SSH'],
        summary: 'Register the only key the caller may have signed',
        requestBody: { required: true, content: json({ type: 'object', required: ['publicKey'], properties: { publicKey: { type: 'string' } } }) },
        responses: {
          '200': { description: 'OK', content: json(ref('RegisteredKey')) },
          '400': error('Invalid public key'),
          '404': error('Caller not found in the directory'),
          '503': error('Directory unavailable'),
        },
      },
      delete: { tags: ['SSH'], summary: 'Remove the registered key', responses: { '204': noContent, '404': error('No key registered') } },
    },
    '/ssh/ca-public-key': {
      get: {
        tags: ['SSH'],
        summary: 'SSH user CA public key',
        security: [],
        parameters: [{ name: 'format', in: 'query', schema: { type: 'string', enum: ['json', 'text'] } }],
        responses: {
          '200': { description: 'OK', content: json({ type: 'object', properties: { publicKey: { type: 'string' } } }) },
          '503': error('PKI backend unavailable'),
        },
      },
    },
    '/kubeconfig': {
      get: {
        tags: ['Kubeconfig'],
        summary: 'Download a kubeconfig using the OIDC exec plugin',
        responses: {
          '200': { description: 'kubeconfig', content: { 'application/x-yaml': { schema: { type: 'string' } } } },
          '401': error('Missing or invalid bearer token'),
        },
      },
    },
    '/users': {
      get: {
        tags: ['Users'],
        summary: 'List users',
        parameters: [...pageParams, { name: 'search', in: 'query', schema: { type: 'string' } }],
        responses: {
          '200': { description: 'OK', content: json({ type: 'object', properties: { items: { type: 'array', items: ref('User') }, first: { type: 'integer' }, max: { type: 'integer' } } }) },
          ...adminErrors,
        },
      },
      post: {
        tags: ['Users'],
        summary: 'Create user',
        requestBody: { required: true, content: json(ref('CreateUser')) },
        responses: { '201': { description: 'Created', content: json(ref('User')) }, '400': error('Validation error'), '409': error('User exists'), ...adminErrors },
      },
    },
    '/users/{id}': {
      parameters: [idParam],
      get: { tags: ['Users'], summary: 'Get user', responses: { '200': { description: 'OK', content: json(ref('User')) }, '404': error('Not found'), ...adminErrors } },
      put: {
        tags: ['Users'],
        summary: 'Update user',
        requestBody: { required: true, content: json(ref('UpdateUser')) },
        responses: { '204': noContent, '400': error('Validation error'), '404': error('Not found'), ...adminErrors },
      },
      delete: { tags: ['Users'], summary: 'Delete user', responses: { '204': noContent, '404': error('Not found'), ...adminErrors } },
    },
    '/users/{id}/sessions': {
      parameters: [idParam],
      get: {
        tags: ['Users'],
        summary: 'Active identity provider sessions',
        responses: {
          '200': { description: 'OK', content: json({ type: 'object', properties: { items: { type: 'array', items: ref('Session') } } }) },
          '404': error('Not found'),
          ...adminErrors,
        },
      },
    },
    '/users/{id}/logout': {
      parameters: [idParam],
      post: {
        tags: ['Users'],
        summary: 'End every session of the user',
        responses: {
          '200': { description: 'OK', content: json({ type: 'object', properties: { status: { type: 'string', enum: ['logged_out'] } } }) },
          '404': error('Not found'),
          ...adminErrors,
        },
      },
    },
    '/users/{id}/reset-password': {
      parameters: [idParam],
      post: {
        tags: ['Users'],
        summary: 'Set a new password',
        requestBody: {
          required: true,
          content: json({ type: 'object', required: ['password'], properties: { password: { type: 'string', minLength: 8 }, temporary: { type: 'boolean', default: true } } }),
        },
        responses: { '204': noContent, '404': error('Not found'), ...adminErrors },
      },
    },
    '/users/{id}/groups': {
      parameters: [idParam],
      get: {
        tags: ['Users'],
        summary: "User's groups",
        responses: { '200': { description: 'OK', content: json({ type: 'object', properties: { items: { type: 'array', items: ref('Group') } } }) }, ...adminErrors },
      },
    },
    '/users/{id}/groups/{groupId}': {
      parameters: [idParam, { name: 'groupId', in: 'path', required: true, schema: { type: 'string' } }],
      put: { tags: ['Users'], summary: 'Add user to group', responses: { '204': noContent, '404': error('Not found'), ...adminErrors } },
      delete: { tags: ['Users'], summary: 'Remove user from group', responses: { '204': noContent, '404': error('Not found'), ...adminErrors } },
    },
    '/groups': {
      get: {
        tags: ['Groups'],
        summary: 'List groups',
        responses: { '200': { description: 'OK', content: json({ type: 'object', properties: { items: { type: 'array', items: ref('Group') } } }) }, ...adminErrors },
      },
    },
    '/groups/{id}/members': {
      parameters: [idParam],
      get: {
        tags: ['Groups'],
        summary: 'Group members',
        parameters: pageParams,
        responses: { '200': { description: 'OK', content: json({ type: 'object', properties: { items: { type: 'array', items: ref('User') } } }) }, ...adminErrors },
      },
    },
    '/audit': {
      get: {
        tags: ['Audit'],
        summary: 'Query recent audit events',
        parameters: [
          { name: 'limit', in: 'query', schema: { type: 'integer', default: 50, maximum: 200 } },
          { name: 'cursor', in: 'query', schema: { type: 'string' } },
          { name: 'actor', in: 'query', schema: { type: 'string' } },
          { name: 'action', in: 'query', schema: { type: 'string' } },
          { name: 'result', in: 'query', schema: { type: 'string', enum: ['success', 'failure', 'denied'] } },
          { name: 'sort', in: 'query', schema: { type: 'string', enum: ['ts', 'actor', 'action', 'result'] } },
          { name: 'dir', in: 'query', schema: { type: 'string', enum: ['asc', 'desc'] } },
        ],
        responses: {
          '200': { description: 'OK', content: json({ type: 'object', properties: { items: { type: 'array', items: ref('AuditEvent') }, nextCursor: { type: 'string', nullable: true } } }) },
          ...adminErrors,
        },
      },
    },
    '/audit/stats': {
      get: {
        tags: ['Audit'],
        summary: 'Event counters since start',
        responses: {
          '200': {
            description: 'OK',
            content: json({
              type: 'object',
              properties: { since: { type: 'string', format: 'date-time' }, buffered: { type: 'integer' }, counters: { type: 'object', additionalProperties: { type: 'integer' } } },
            }),
          },
          ...adminErrors,
        },
      },
    },
  },
  components: {
    securitySchemes: { bearerAuth: { type: 'http', scheme: 'bearer', bearerFormat: 'JWT' } },
    schemas: {
      RegisteredKey: {
        type: 'object',
        properties: { publicKey: { type: 'string' }, fingerprint: { type: 'string', example: 'SHA256:...' }, registeredAt: { type: 'string', format: 'date-time' } },
      },
      Session: {
        type: 'object',
        properties: {
          id: { type: 'string' },
          userId: { type: 'string' },
          username: { type: 'string' },
          ipAddress: { type: 'string' },
          startedAt: { type: 'string', format: 'date-time' },
          lastAccessAt: { type: 'string', format: 'date-time' },
          clients: { type: 'array', items: { type: 'string' } },
        },
      },
      PublicConfig: {
        type: 'object',
        properties: {
          issuerUrl: { type: 'string' },
          clientId: { type: 'string' },
          keycloakUrl: { type: 'string' },
          realm: { type: 'string' },
          clusterName: { type: 'string' },
        },
      },
      Error: {
        type: 'object',
        required: ['error', 'code'],
        properties: { error: { type: 'string' }, code: { type: 'string' }, requestId: { type: 'string' }, details: { type: 'object' } },
      },
      UserSummary: {
        type: 'object',
        properties: {
          subject: { type: 'string' },
          username: { type: 'string' },
          email: { type: 'string', nullable: true },
          name: { type: 'string', nullable: true },
          groups: { type: 'array', items: { type: 'string' } },
          role: { type: 'string', nullable: true },
          isAdmin: { type: 'boolean' },
          expiresAt: { type: 'string', format: 'date-time' },
        },
      },
      LoginResult: {
        type: 'object',
        properties: {
          accessToken: { type: 'string' },
          idToken: { type: 'string', nullable: true },
          refreshToken: { type: 'string', nullable: true },
          expiresIn: { type: 'integer' },
          tokenType: { type: 'string' },
          returnTo: { type: 'string' },
          user: ref('UserSummary'),
        },
      },
      Role: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          maxTtl: { type: 'string', example: '12h' },
          maxTtlSeconds: { type: 'integer' },
          principals: { type: 'array', items: { type: 'string' } },
          precedence: { type: 'integer' },
        },
      },
      SshCertificate: {
        type: 'object',
        properties: {
          signedCertificate: { type: 'string' },
          serial: { type: 'string' },
          keyId: { type: 'string' },
          principals: { type: 'array', items: { type: 'string' } },
          role: { type: 'string' },
          ttlSeconds: { type: 'integer' },
          issuedAt: { type: 'string', format: 'date-time' },
          validAfter: { type: 'string', format: 'date-time' },
          validUntil: { type: 'string', format: 'date-time' },
          extensions: { type: 'array', items: { type: 'string' } },
          fingerprint: { type: 'string' },
        },
      },
      User: {
        type: 'object',
        properties: {
          id: { type: 'string' },
          username: { type: 'string' },
          email: { type: 'string' },
          firstName: { type: 'string' },
          lastName: { type: 'string' },
          enabled: { type: 'boolean' },
          emailVerified: { type: 'boolean' },
          createdAt: { type: 'integer' },
          groups: { type: 'array', items: { type: 'string' } },
        },
      },
      CreateUser: {
        type: 'object',
        required: ['username'],
        properties: {
          username: { type: 'string', maxLength: 255 },
          email: { type: 'string', format: 'email' },
          firstName: { type: 'string' },
          lastName: { type: 'string' },
          enabled: { type: 'boolean', default: true },
          password: { type: 'string', minLength: 8 },
          temporaryPassword: { type: 'boolean', default: true },
        },
      },
      UpdateUser: {
        type: 'object',
        properties: { email: { type: 'string', format: 'email' }, firstName: { type: 'string' }, lastName: { type: 'string' }, enabled: { type: 'boolean' } },
      },
      Group: {
        type: 'object',
        properties: { id: { type: 'string' }, name: { type: 'string' }, path: { type: 'string' }, subGroups: { type: 'array', items: ref('Group') } },
      },
      AuditEvent: {
        type: 'object',
        properties: {
          id: { type: 'string' },
          ts: { type: 'string', format: 'date-time' },
          actor: { type: 'string' },
          action: { type: 'string' },
          result: { type: 'string', enum: ['success', 'failure', 'denied'] },
          targetType: { type: 'string' },
          targetId: { type: 'string' },
          requestId: { type: 'string' },
          details: { type: 'object' },
        },
      },
    },
  },
};
