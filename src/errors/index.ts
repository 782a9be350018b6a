// Base error class for all syncjob errors
export class SyncjobError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'SyncjobError';
  }
}

// Validation error for CLI option and environment failures
export class ValidationError extends SyncjobError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error: required keys missing or values unparsable
export class ConfigError extends SyncjobError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'MALFORMED_CONFIGURATION');
    this.name = 'ConfigError';
  }
}

// No language could be resolved for a task
export class MissingLanguageError extends SyncjobError {
  constructor(public readonly taskIdentifier: string) {
    super(`No language set for task '${taskIdentifier}': neither task_language nor job_language is present`, 'MISSING_LANGUAGE');
    this.name = 'MissingLanguageError';
  }
}

export type ContainerErrorCode = 'CONTAINER_ERROR' | 'UNSUPPORTED_CONTAINER' | 'ENTRY_NOT_FOUND';

// Container could not be opened or an entry could not be read
export class ContainerError extends SyncjobError {
  constructor(
    message: string,
    code: ContainerErrorCode = 'CONTAINER_ERROR',
    public readonly source?: string
  ) {
    super(message, code);
    this.name = 'ContainerError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
