const errorBody = {
  type: 'object',
  properties: { error: { type: 'string' }, code: { type: 'string' } },
};

const jsonBody = (schema: object) => ({ content: { 'application/json': { schema } } });

export function getSwaggerSpec(): object {
  return {
    openapi: '3.0.0',
    info: {
      title: 'SMTP Relay API',
      version: '1.0.0',
      description: 'Verify Gmail app-password credentials once, then send mail with a one-hour token',
    },
    servers: [{ url: '/', description: 'API Base' }],
    components: {
      securitySchemes: {
        relayToken: { type: 'apiKey', in: 'header', name: 'X-Token' },
      },
    },
    paths: {
      '/': {
        get: {
          summary: 'Dashboard',
          description: 'Lifetime counters. JSON by default, HTML when Accept is text/html',
          responses: { 200: { description: 'OK' } },
        },
      },
      '/health': {
        get: { summary: 'Health check', responses: { 200: { description: 'OK' } } },
      },
      '/auth': {
        post: {
          summary: 'Verify SMTP credentials and issue a token',
          requestBody: jsonBody({
            type: 'object',
            required: ['email', 'password'],
            properties: {
              email: { type: 'string', format: 'email' },
              password: { type: 'string', description: 'Gmail app password' },
            },
          }),
          responses: {
            200: {
              description: 'Token issued',
              ...jsonBody({
                type: 'object',
                properties: {
                  token: { type: 'string' },
                  expires_in_hours: { type: 'number' },
                  expires_at: { type: 'string', format: 'date-time' },
                  sender_email: { type: 'string' },
                  message: { type: 'string' },
                },
              }),
            },
            400: { description: 'Validation error', ...jsonBody(errorBody) },
            401: { description: 'SMTP login failed', ...jsonBody(errorBody) },
            429: { description: 'Too many attempts', ...jsonBody(errorBody) },
          },
        },
      },
      '/send': {
        post: {
          summary: 'Send a message with the credentials bound to a token',
          security: [{ relayToken: [] }],
          requestBody: jsonBody({
            type: 'object',
            required: ['recipients', 'subject', 'body'],
            properties: {
              recipients: {
                oneOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
              },
              subject: { type: 'string' },
              body: { type: 'string' },
              is_html: { type: 'boolean' },
              cc: { oneOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }] },
              bcc: { oneOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }] },
              reply_to: { type: 'string' },
              repeat: { type: 'integer', minimum: 1 },
            },
          }),
          responses: {
            200: { description: 'All copies sent' },
            400: { description: 'Validation error', ...jsonBody(errorBody) },
            401: { description: 'Missing, unknown or expired token', ...jsonBody(errorBody) },
            502: {
              description: 'SMTP failure; sent/failed/requested report partial progress',
              ...jsonBody({
                type: 'object',
                properties: {
                  error: { type: 'string' },
                  code: { type: 'string' },
                  sent: { type: 'integer' },
                  failed: { type: 'integer' },
                  requested: { type: 'integer' },
                },
              }),
            },
          },
        },
      },
      '/mail': {
        post: {
          summary: 'Send (original body shape, token in body)',
          requestBody: jsonBody({
            type: 'object',
            required: ['recipient_email', 'subject', 'body', 'token'],
            properties: {
              recipient_email: { type: 'string' },
              subject: { type: 'string' },
              body: { type: 'string' },
              quantity: { type: 'integer', minimum: 1 },
              token: { type: 'string' },
            },
          }),
          responses: { 200: { description: 'All copies sent' }, 401: { description: 'Bad token' } },
        },
      },
      '/token': {
        delete: {
          summary: 'Revoke a token',
          security: [{ relayToken: [] }],
          responses: { 200: { description: 'Revoked' }, 401: { description: 'Unknown token' } },
        },
      },
    },
  };
}
