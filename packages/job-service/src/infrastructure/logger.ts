// packages/job-service/src/infrastructure/logger.ts

// Pino-based JSON logger behind a small typed wrapper.
// - stdout JSON in production, pino-pretty when NODE_ENV=development.
// - Child loggers carry jobId/component bindings.

import pino from 'pino';

export interface LogFields {
  jobId?: string;
  component?: string;
  event?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string | Error, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

// logger.declaration()
export const logger: Logger = createRootLogger();

function createRootLogger(): Logger {
  const base = pino({
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
            },
          }
        : undefined,
  });

  return wrapPino(base);
}

export function wrapPino(instance: pino.Logger): Logger {
  return {
    info(msg, fields) {
      instance.info(fields ?? {}, msg);
    },
    warn(msg, fields) {
      instance.warn(fields ?? {}, msg);
    },
    error(msg, fields) {
      if (msg instanceof Error) {
        instance.error(
          {
            ...(fields ?? {}),
            err: {
              message: msg.message,
              stack: msg.stack,
              name: msg.name,
            },
          },
          msg.message,
        );
      } else {
        instance.error(fields ?? {}, msg);
      }
    },
    debug(msg, fields) {
      instance.debug(fields ?? {}, msg);
    },
    child(bindings) {
      return wrapPino(instance.child(bindings));
    },
  };
}
