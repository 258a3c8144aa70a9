import pino from 'pino';

const env = process.env['NODE_ENV'];

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? (env === 'test' ? 'silent' : 'info'),
  transport:
    env !== 'production' && env !== 'test'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  redact: {
    paths: ['api_key', 'apiKey', 'token', 'password', 'secret', '*.api_key', '*.token', '*.password'],
    censor: '***REDACTED***',
  },
});
