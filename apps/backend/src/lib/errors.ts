export class LeafWikiError extends Error {
  constructor(public readonly message: string, public readonly code = 'INTERNAL_ERROR', public readonly details?: unknown) {
    super(message);
    this.name = 'LeafWikiError';
  }
}

export class NotFoundError extends LeafWikiError {
  constructor(message = 'Resource not found', details?: unknown) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends LeafWikiError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class MissingMetadataError extends LeafWikiError {
  constructor(public readonly key: string, details?: unknown) {
    super(`Metadata key "${key}" is not set`, 'MISSING_METADATA', details);
    this.name = 'MissingMetadataError';
  }
}

export class IOError extends LeafWikiError {
  constructor(message = 'Filesystem operation failed', details?: unknown) {
    super(message, 'IO_ERROR', details);
    this.name = 'IOError';
  }
}

export class InvalidPatternError extends LeafWikiError {
  constructor(public readonly pattern: string, details?: unknown) {
    super(`Invalid search pattern: ${pattern}`, 'INVALID_PATTERN', details);
    this.name = 'InvalidPatternError';
  }
}

export class InvalidStateError extends LeafWikiError {
  constructor(message = 'Operation not allowed in the current state', details?: unknown) {
    super(message, 'INVALID_STATE', details);
    this.name = 'InvalidStateError';
  }
}

/**
 * Node filesystem errors carry an errno string in `code`.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
