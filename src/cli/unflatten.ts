import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { NodeFileSystemAdapter } from '../adapters/node-file-system.js';
import { readEnvConfig } from '../config/env.js';
import { UsageError } from '../exceptions.js';
import { createLogger } from '../logger.js';
import { Materializer } from '../materializer.js';
import { formatTree } from '../tree.js';
import { UnflattenService } from '../unflatten-service.js';
import { expandHome } from './expand-home.js';
import { RULE, boxHeading, consoleOutput, printLines } from './output.js';
import { EXIT_OK, reportFailure, toUsageError } from './run.js';
import type { CliDeps } from './run.js';

export const UNFLATTEN_USAGE: readonly string[] = [
  'Usage: confbundle-unflatten [options] <bundle_file> <output_directory>',
  '',
  'Arguments:',
  '  bundle_file                 Bundle written by confbundle-flatten',
  '  output_directory            Directory where the files will be recreated',
  '',
  'Options:',
  '  -p, --comment-prefix <text> Comment prefix of the marker lines (default: detected)',
  '  -v, --verbose               Debug logging',
  '  -h, --help                  Show this help',
  '',
  'Examples:',
  '  confbundle-unflatten init-flat.lua ./nvim-config/',
  '  confbundle-unflatten ~/backups/nvim-config.lua ~/.config/nvim/',
];

const UNFLATTEN_OPTIONS = {
  'comment-prefix': { type: 'string', short: 'p' },
  verbose: { type: 'boolean', short: 'v' },
  help: { type: 'boolean', short: 'h' },
} as const;

interface UnflattenArgs {
  readonly help: boolean;
  readonly bundleFile: string;
  readonly outputDir: string;
  readonly commentPrefix?: string;
  readonly verbose: boolean;
}

function parseOrThrow(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: UNFLATTEN_OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw toUsageError(error);
  }
}

export function parseUnflattenArgs(argv: readonly string[]): UnflattenArgs {
  const { values, positionals } = parseOrThrow(argv);

  if (values.help) {
    return { help: true, bundleFile: '', outputDir: '', verbose: false };
  }
  if (positionals.length < 2) {
    throw new UsageError(
      positionals.length === 0 ? 'Missing <bundle_file> and <output_directory>' : 'Missing <output_directory>',
    );
  }
  if (positionals.length > 2) {
    throw new UsageError(`Unexpected argument: ${positionals[2]}`);
  }

  return {
    help: false,
    bundleFile: positionals[0],
    outputDir: positionals[1],
    commentPrefix: values['comment-prefix'],
    verbose: values.verbose ?? false,
  };
}

export async function runUnflatten(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const output = deps.output ?? consoleOutput;

  try {
    const args = parseUnflattenArgs(argv);
    if (args.help) {
      printLines(output, UNFLATTEN_USAGE);
      return EXIT_OK;
    }

    const fs = deps.fs ?? new NodeFileSystemAdapter();
    const env = readEnvConfig(deps.env ?? process.env);
    const cwd = deps.cwd ?? process.cwd();
    const verbose = args.verbose || env.verbose;
    const bundleFile = path.resolve(cwd, expandHome(args.bundleFile));
    const outputDir = path.resolve(cwd, expandHome(args.outputDir));

    printLines(output, ['', ...boxHeading('CONFIG BUNDLE UNFLATTENER'), '']);
    printLines(output, [`Input file:  ${bundleFile}`, `Output dir:  ${outputDir}`, '']);

    const service = new UnflattenService(
      fs,
      new Materializer(fs, createLogger('Materialize', { verbose })),
      createLogger('Unflatten', { verbose }),
    );
    const decoded = await service.read({
      bundleFile,
      commentPrefix: args.commentPrefix ?? env.commentPrefix,
    });

    if (decoded.metadata) {
      printLines(output, ['Metadata from bundle:', RULE]);
      for (const [key, value] of Object.entries(decoded.metadata)) {
        if (key !== 'files') output.out(`  ${key}: ${value}`);
      }
      printLines(output, [RULE, '']);
    }

    printLines(output, ['Extracting files:', RULE]);
    const written = await service.write(decoded, outputDir);
    printLines(output, [RULE, '']);

    printLines(output, [...boxHeading('COMPLETE'), '']);
    printLines(output, [
      `  Files created:       ${written.files.length}`,
      `  Directories created: ${written.directories.length}`,
      `  Output location:     ${outputDir}`,
    ]);
    if (decoded.unterminated.length > 0) {
      output.out(`  Unterminated:        ${decoded.unterminated.length} (not extracted)`);
    }
    printLines(output, ['', 'Created structure:', ...formatTree(written.outputEntries), '']);
    printLines(output, [
      'To use these files:',
      '  1. Back up the existing configuration directory',
      `  2. Copy contents: cp -r ${outputDir}/. <config_dir>/`,
      `  3. Or symlink:    ln -s ${outputDir} <config_dir>`,
      '',
    ]);
    return EXIT_OK;
  } catch (error) {
    return reportFailure(error, output, UNFLATTEN_USAGE, createLogger('Unflatten'));
  }
}
