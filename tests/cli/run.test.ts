import { describe, expect, it } from 'vitest';
import type { CliOutput } from '../../src/cli/output.js';
import { EXIT_FAILURE, reportFailure } from '../../src/cli/run.js';
import { EmptyResultError, UsageError } from '../../src/exceptions.js';
import { createMockLogger } from '../helpers/memory-file-system.js';

function createCapture(): CliOutput & { stderr: string[] } {
  const stderr: string[] = [];
  return { stderr, out: () => {}, err: (line) => stderr.push(line) };
}

const usage = ['Usage: tool <arg>'];

describe('reportFailure', () => {
  it('hands unexpected errors to the logger', () => {
    const output = createCapture();
    const log = createMockLogger();
    const error = new TypeError('boom');

    expect(reportFailure(error, output, usage, log)).toBe(EXIT_FAILURE);
    expect(output.stderr).toEqual(['ERROR: Unexpected failure: boom']);
    expect(log.error).toHaveBeenCalledWith('Unexpected failure', error);
  });

  it('prints the usage after a usage error', () => {
    const output = createCapture();
    const log = createMockLogger();

    expect(reportFailure(new UsageError('Missing <arg>'), output, usage, log)).toBe(EXIT_FAILURE);
    expect(output.stderr).toEqual(['ERROR: Missing <arg>', '', 'Usage: tool <arg>']);
    expect(log.error).not.toHaveBeenCalled();
  });

  it('keeps expected errors to one line', () => {
    const output = createCapture();
    const log = createMockLogger();

    reportFailure(new EmptyResultError('No files found'), output, usage, log);

    expect(output.stderr).toEqual(['ERROR: No files found']);
    expect(log.error).not.toHaveBeenCalled();
  });
});
