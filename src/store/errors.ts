/**
 * Failure while reading or writing one of the configuration files.
 */
export class ConfigStoreError extends Error {
  constructor(message: string, public readonly filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigStoreError';
  }
}

/** The file exists but is not valid JSON. */
export class ConfigParseError extends ConfigStoreError {
  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, filePath, options);
    this.name = 'ConfigParseError';
  }
}

/** The file is valid JSON but not shaped like a config document. */
export class ConfigValidationError extends ConfigStoreError {
  constructor(filePath: string, public readonly issues: string[]) {
    super(`Unexpected content in ${filePath}: ${issues.join('; ')}`, filePath);
    this.name = 'ConfigValidationError';
  }
}

export class ConfigWriteError extends ConfigStoreError {
  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, filePath, options);
    this.name = 'ConfigWriteError';
  }
}

// Errors from Node's own modules can come from another realm, where `instanceof Error` is false.
export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
