export class EtlError extends Error {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

export class ConfigError extends EtlError {}

export class InputFileError extends EtlError {
  readonly filePath: string;

  constructor(filePath: string, message: string, details?: unknown) {
    super(message, details);
    this.filePath = filePath;
  }
}

export function inputMissing(filePath: string, cause?: unknown): InputFileError {
  return new InputFileError(filePath, `input file ${filePath} is missing or unreadable`, cause);
}

export function inputMalformed(filePath: string, details?: unknown): InputFileError {
  return new InputFileError(filePath, `input file ${filePath} does not have the expected columns`, details);
}

export function invalidConfig(details: unknown): ConfigError {
  return new ConfigError('invalid configuration', details);
}

/** True for SQLite constraint failures (unique, foreign key, not null, check, trigger aborts). */
export function isIntegrityViolation(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  return typeof error.code === 'string' && error.code.startsWith('SQLITE_CONSTRAINT');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
