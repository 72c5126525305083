/**
 * Error taxonomy for errgotrace.
 *
 * Everything except ConfigError is recovered at the file boundary; the CLI
 * reports the message and moves on to the next file.
 */
export class ErrgotraceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed --filter or --exclude pattern. Aborts the whole run. */
export class ConfigError extends ErrgotraceError {}

export class FileIOError extends ErrgotraceError {
  constructor(
    readonly file: string,
    readonly operation: "open" | "read" | "write",
    reason: string
  ) {
    super(`${file}: failed to ${operation} (${reason})`);
  }
}

export class ParseError extends ErrgotraceError {
  constructor(
    readonly reason: string,
    readonly line: number,
    readonly column: number
  ) {
    super(`${line}:${column}: ${reason}`);
  }
}

/** Source did not canonicalize, or generated output failed to re-parse. */
export class FormatError extends ErrgotraceError {
  constructor(readonly file: string, reason: string) {
    super(`${file}: formatting error (${reason})`);
  }
}

export class AlreadyProcessedError extends ErrgotraceError {
  constructor(readonly file: string) {
    super(`${file}: already processed`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
