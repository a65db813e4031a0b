import pino from 'pino';

const env = process.env.NODE_ENV || 'development';
const isDevelopment = env === 'development';

export const logger = pino({
  level: process.env.LOG_LEVEL || (env === 'test' ? 'silent' : 'info'),
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    service: 'bidscope',
    env,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
});

export type LogContext = Record<string, unknown>;

export interface ModuleLogger {
  info(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
}

export function createLogger(module: string): ModuleLogger {
  const moduleLogger = logger.child({ module });

  // pino takes the context object first; callers pass it second
  return {
    info: (msg, context) => moduleLogger.info(context ?? {}, msg),
    error: (msg, context) => moduleLogger.error(context ?? {}, msg),
    warn: (msg, context) => moduleLogger.warn(context ?? {}, msg),
    debug: (msg, context) => moduleLogger.debug(context ?? {}, msg),
    fatal: (msg, context) => moduleLogger.fatal(context ?? {}, msg),
  };
}
