import { InvalidDocumentPathError } from './exceptions.js';

const WINDOWS_DRIVE = /^[A-Za-z]:/;

export function validateLogicalPath(path: string): void {
  if (path.length === 0) {
    throw new InvalidDocumentPathError(path, 'path is empty');
  }
  if (/[\r\n]/.test(path)) {
    throw new InvalidDocumentPathError(path, 'path contains a line break');
  }
  if (path.trim() !== path) {
    throw new InvalidDocumentPathError(path, 'path has leading or trailing whitespace');
  }
}

/** A logical path must stay inside the root it is materialized under. */
export function assertSafeRelativePath(path: string): void {
  validateLogicalPath(path);
  if (path.startsWith('/') || path.startsWith('\\') || WINDOWS_DRIVE.test(path)) {
    throw new InvalidDocumentPathError(path, 'path is absolute');
  }
  if (path.split(/[\\/]/).includes('..')) {
    throw new InvalidDocumentPathError(path, 'path escapes the output root');
  }
}
