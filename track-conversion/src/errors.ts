/**
 * Conversion errors
 *
 * UnrecognizedSchemaError and FileReadError are per-file and recoverable:
 * the batch runner reports them and moves on to the next file.
 */

/**
 * The file's header matches none of the known vendor schemas
 */
export class UnrecognizedSchemaError extends Error {
  readonly fileName: string;
  readonly columns: string[];

  constructor(fileName: string, columns: string[]) {
    super(`Unrecognized column layout in ${fileName}: [${columns.join(', ')}]`);
    this.name = 'UnrecognizedSchemaError';
    this.fileName = fileName;
    this.columns = columns;
  }
}

/**
 * The file could not be read or parsed as CSV
 */
export class FileReadError extends Error {
  readonly fileName: string;

  constructor(fileName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read ${fileName}: ${reason}`, { cause });
    this.name = 'FileReadError';
    this.fileName = fileName;
  }
}

/**
 * Settings from a config file or the command line are invalid
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
