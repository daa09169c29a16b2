/**
 * Base error for FaceFix failures
 */
export class FaceFixError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'FaceFixError';
  }
}

/**
 * A file could not be read or decoded as UTF-8
 */
export class FileReadError extends FaceFixError {
  constructor(
    public readonly file: string,
    cause?: Error
  ) {
    super(`Cannot read '${file}': ${describeCause(cause)}`, cause);
    this.name = 'FileReadError';
  }
}

/**
 * A backup or the rewritten file could not be written
 */
export class FileWriteError extends FaceFixError {
  constructor(
    public readonly file: string,
    public readonly target: 'backup' | 'file',
    cause?: Error
  ) {
    const what = target === 'backup' ? 'backup for' : 'changes to';
    super(`Cannot write ${what} '${file}': ${describeCause(cause)}`, cause);
    this.name = 'FileWriteError';
  }
}

/**
 * A directory could not be listed during selection
 */
export class EnumerationError extends FaceFixError {
  constructor(
    public readonly directory: string,
    cause?: Error
  ) {
    super(`Cannot list '${directory}': ${describeCause(cause)}`, cause);
    this.name = 'EnumerationError';
  }
}

/**
 * Configuration file or values are invalid
 */
export class ConfigError extends FaceFixError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ConfigError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function describeCause(cause?: Error): string {
  return cause?.message ?? 'unknown error';
}
