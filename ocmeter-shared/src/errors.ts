/**
 * Error hierarchy for ocmeter.
 *
 * Per-record problems (unreadable interaction files, zero-usage records,
 * unknown models) are never errors; they are filtered or priced at zero.
 * These classes cover operator mistakes and explicit lookups that fail.
 */

export class OcmeterError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(params: {
    message: string;
    code: string;
    cause?: unknown;
    context?: Record<string, unknown>;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'OcmeterError';
    this.code = params.code;
    this.context = params.context;
  }
}

/** Malformed configuration or pricing source. Always fatal at load time. */
export class ConfigError extends OcmeterError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super({ message, code: 'CONFIG_ERROR', context, cause });
    this.name = 'ConfigError';
  }
}

export class SessionNotFoundError extends OcmeterError {
  constructor(sessionPath: string) {
    super({
      message: `No usable session data found at ${sessionPath}`,
      code: 'SESSION_NOT_FOUND',
      context: { sessionPath },
    });
    this.name = 'SessionNotFoundError';
  }
}

export class ExportError extends OcmeterError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super({ message, code: 'EXPORT_ERROR', context, cause });
    this.name = 'ExportError';
  }
}

/** Extracts a printable message from an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
