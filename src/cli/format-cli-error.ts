import {
  ConfigError,
  EmptyResultError,
  FileSystemError,
  InvalidDocumentPathError,
  MissingInputError,
  UsageError,
} from '../exceptions.js';

export function isExpectedError(error: unknown): boolean {
  return (
    error instanceof UsageError ||
    error instanceof MissingInputError ||
    error instanceof EmptyResultError ||
    error instanceof InvalidDocumentPathError ||
    error instanceof ConfigError ||
    error instanceof FileSystemError
  );
}

export function formatCliError(error: unknown): string {
  if (error instanceof FileSystemError) {
    const detail = error.cause instanceof Error ? ` (${error.cause.message})` : '';
    return `ERROR: ${error.message}${detail}`;
  }
  if (isExpectedError(error) && error instanceof Error) {
    return `ERROR: ${error.message}`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `ERROR: Unexpected failure: ${message}`;
}
