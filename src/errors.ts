export const ExitCode = {
  Success: 0,
  Unexpected: 1,
  Usage: 2,
  Configuration: 3,
  Validation: 4,
  IO: 5,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export class PromptMergeError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCodeValue,
    public readonly internalDetails?: string
  ) {
    super(message);
    this.name = 'PromptMergeError';
    Object.setPrototypeOf(this, PromptMergeError.prototype);
  }
}

/**
 * Bad or missing template root, unreadable config, no usable terminal
 */
export class ConfigurationError extends PromptMergeError {
  constructor(message: string, internalDetails?: string) {
    super(message, ExitCode.Configuration, internalDetails);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Selection rejected by the merger (empty, duplicated or unknown ids)
 */
export class ValidationError extends PromptMergeError {
  constructor(message: string, internalDetails?: string) {
    super(message, ExitCode.Validation, internalDetails);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * A template or the output file could not be read or written
 */
export class TemplateIOError extends PromptMergeError {
  constructor(message: string, internalDetails?: string) {
    super(message, ExitCode.IO, internalDetails);
    this.name = 'TemplateIOError';
    Object.setPrototypeOf(this, TemplateIOError.prototype);
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

const FS_REASONS: Record<string, string> = {
  ENOENT: 'no such file or directory',
  EACCES: 'permission denied',
  EPERM: 'operation not permitted',
  EISDIR: 'is a directory',
  ENOTDIR: 'not a directory',
  EROFS: 'read-only file system',
  ENOSPC: 'no space left on device',
};

/**
 * Short human-readable reason for a filesystem failure
 */
export function describeFsError(error: unknown): string {
  if (isErrnoException(error) && error.code && FS_REASONS[error.code]) {
    return FS_REASONS[error.code];
  }
  return error instanceof Error ? error.message : String(error);
}
