/**
 * logger.ts — Minimal structured logger.
 *
 * Records go to stderr as one JSON object per line; stdout belongs to the MCP stdio transport.
 */

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
}

function write(level: 'debug' | 'warn', message: string, fields: LogFields = {}): void {
  console.error(JSON.stringify({ level, time: new Date().toISOString(), msg: message, ...fields }));
}

export const consoleLogger: Logger = {
  debug: (message, fields) => write('debug', message, fields),
  warn: (message, fields) => write('warn', message, fields),
};

// Flattens an error (and its cause chain) into loggable fields
export function describeError(error: unknown): LogFields {
  if (!(error instanceof Error)) {
    return { error: String(error) };
  }
  const fields: LogFields = { error: error.message, errorName: error.name };
  if (error.cause !== undefined) {
    fields.cause = describeError(error.cause);
  }
  return fields;
}
