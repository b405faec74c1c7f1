export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class MissingInputError extends Error {
  readonly path: string;

  constructor(path: string, message = `Input not found: ${path}`) {
    super(message);
    this.name = 'MissingInputError';
    this.path = path;
  }
}

export class EmptyResultError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyResultError';
  }
}

export class InvalidDocumentPathError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Invalid document path ${JSON.stringify(path)}: ${reason}`);
    this.name = 'InvalidDocumentPathError';
    this.path = path;
  }
}

export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'ConfigError';
    this.cause = cause;
  }
}

export type FileSystemOperation = 'read' | 'write' | 'mkdir' | 'list' | 'stat';

export class FileSystemError extends Error {
  readonly operation: FileSystemOperation;
  readonly path: string;

  constructor(operation: FileSystemOperation, filePath: string, cause?: unknown) {
    super(`File system ${operation} failed: ${filePath}`);
    this.name = 'FileSystemError';
    this.operation = operation;
    this.path = filePath;
    this.cause = cause;
  }
}
