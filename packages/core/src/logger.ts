import pino from 'pino';

export type Logger = pino.Logger;

export function createLogger(level = process.env.LOG_LEVEL || 'info'): Logger {
  return pino({
    name: 'lexirule',
    level,
    redact: {
      paths: ['openaiApiKey', '*.openaiApiKey', 'headers.authorization'],
      censor: '[REDACTED]'
    }
  });
}

export const log = createLogger();
