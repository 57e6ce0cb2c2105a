import pino from 'pino';

// stdout carries patch text, so log lines always go to stderr.
export const logger = pino(
  {
    name: 'patch-export',
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  },
  pino.destination({ dest: 2, sync: true })
);

export function enableDebug(): void {
  logger.level = 'debug';
}
