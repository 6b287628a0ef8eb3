import pino from 'pino';

const pretty = !['production', 'test'].includes(process.env['NODE_ENV'] ?? '');

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport: pretty ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
  redact: {
    paths: ['api_key', 'apiKey', 'authorization', '*.api_key', '*.apiKey', 'headers.Authorization'],
    censor: '***REDACTED***',
  },
});

export type Logger = typeof logger;
