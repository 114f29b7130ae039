import pino, { type Logger } from 'pino';

const defaultLevel = process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';

export const logger = pino({
  name: 'guestrun',
  level: process.env['LOG_LEVEL'] ?? defaultLevel,
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 2 } }
      : undefined,
});

export type { Logger };
