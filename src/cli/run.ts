import type { FileSystemPort } from '../ports/file-system.js';
import type { Logger } from '../ports/logger.js';
import { UsageError } from '../exceptions.js';
import { formatCliError, isExpectedError } from './format-cli-error.js';
import type { CliOutput } from './output.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export interface CliDeps {
  readonly fs?: FileSystemPort;
  readonly output?: CliOutput;
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
  readonly now?: () => Date;
}

/**
 * Prints the failure and returns the exit code. Usage errors are followed by
 * the synopsis; unexpected errors are handed to the logger with their cause.
 */
export function reportFailure(
  error: unknown,
  output: CliOutput,
  usage: readonly string[],
  log: Logger,
): number {
  output.err(formatCliError(error));
  if (error instanceof UsageError) {
    output.err('');
    for (const line of usage) output.err(line);
  } else if (!isExpectedError(error)) {
    log.error('Unexpected failure', error);
  }
  return EXIT_FAILURE;
}

export function toUsageError(error: unknown): UsageError {
  return new UsageError(error instanceof Error ? error.message : String(error));
}
