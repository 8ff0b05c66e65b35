import pino from 'pino';

export type LogContext = Record<string, unknown>;

/** Structured logger used throughout ocmeter. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

export interface LoggerOptions {
  level?: string;
  name?: string;
}

function wrap(instance: pino.Logger): Logger {
  return {
    debug: (msg, context) => (context ? instance.debug(context, msg) : instance.debug(msg)),
    info: (msg, context) => (context ? instance.info(context, msg) : instance.info(msg)),
    warn: (msg, context) => (context ? instance.warn(context, msg) : instance.warn(msg)),
    error: (msg, context) => (context ? instance.error(context, msg) : instance.error(msg)),
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

/**
 * Create a pino logger writing to stderr, so that report output on stdout
 * stays machine-readable.
 */
export function createLogger(options?: LoggerOptions): Logger {
  const instance = pino(
    {
      name: options?.name ?? 'ocmeter',
      level: options?.level ?? process.env['OCMETER_LOG_LEVEL'] ?? process.env['LOG_LEVEL'] ?? 'warn',
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination(2),
  );
  return wrap(instance);
}

/** Logger that discards everything. Default for library callers that pass none. */
export function createSilentLogger(): Logger {
  return wrap(pino({ level: 'silent' }));
}
