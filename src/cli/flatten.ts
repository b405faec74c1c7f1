import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { NodeFileSystemAdapter } from '../adapters/node-file-system.js';
import { Collector } from '../collector.js';
import { readEnvConfig } from '../config/env.js';
import { resolveProfile } from '../config/profile.js';
import { UsageError } from '../exceptions.js';
import { FlattenService } from '../flatten-service.js';
import { createLogger } from '../logger.js';
import { expandHome } from './expand-home.js';
import { RULE, boxHeading, consoleOutput, formatBytes, printLines } from './output.js';
import { EXIT_OK, reportFailure, toUsageError } from './run.js';
import type { CliDeps } from './run.js';

export const FLATTEN_USAGE: readonly string[] = [
  'Usage: confbundle-flatten [options] <output_file>',
  '',
  'Arguments:',
  '  output_file                 Path where the bundle will be written',
  '',
  'Options:',
  '  -s, --source <dir>          Configuration root (default: $CONFBUNDLE_SOURCE_DIR or .)',
  '  -c, --config <file>         Profile JSON listing the files to bundle',
  '                              (default: confbundle.json in the source root)',
  '  -p, --comment-prefix <text> Line-comment token written before generated lines',
  '  -v, --verbose               Debug logging',
  '  -h, --help                  Show this help',
  '',
  'Examples:',
  '  confbundle-flatten init-flat.lua',
  '  confbundle-flatten -s ~/.config/nvim ~/backups/nvim-config.lua',
];

const FLATTEN_OPTIONS = {
  source: { type: 'string', short: 's' },
  config: { type: 'string', short: 'c' },
  'comment-prefix': { type: 'string', short: 'p' },
  verbose: { type: 'boolean', short: 'v' },
  help: { type: 'boolean', short: 'h' },
} as const;

interface FlattenArgs {
  readonly help: boolean;
  readonly outputFile: string;
  readonly source?: string;
  readonly config?: string;
  readonly commentPrefix?: string;
  readonly verbose: boolean;
}

function parseOrThrow(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: FLATTEN_OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw toUsageError(error);
  }
}

export function parseFlattenArgs(argv: readonly string[]): FlattenArgs {
  const { values, positionals } = parseOrThrow(argv);

  if (values.help) {
    return { help: true, outputFile: '', verbose: false };
  }
  if (positionals.length === 0) {
    throw new UsageError('Missing <output_file>');
  }
  if (positionals.length > 1) {
    throw new UsageError(`Unexpected argument: ${positionals[1]}`);
  }

  return {
    help: false,
    outputFile: positionals[0],
    source: values.source,
    config: values.config,
    commentPrefix: values['comment-prefix'],
    verbose: values.verbose ?? false,
  };
}

export async function runFlatten(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const output = deps.output ?? consoleOutput;

  try {
    const args = parseFlattenArgs(argv);
    if (args.help) {
      printLines(output, FLATTEN_USAGE);
      return EXIT_OK;
    }

    const fs = deps.fs ?? new NodeFileSystemAdapter();
    const env = readEnvConfig(deps.env ?? process.env);
    const cwd = deps.cwd ?? process.cwd();
    const verbose = args.verbose || env.verbose;
    const resolvePath = (p: string): string => path.resolve(cwd, expandHome(p));

    const sourceDir = resolvePath(args.source ?? env.sourceDir ?? '.');
    const outputFile = resolvePath(args.outputFile);
    const profilePath = args.config ?? env.profilePath;
    const profile = await resolveProfile(fs, sourceDir, profilePath ? resolvePath(profilePath) : undefined);

    printLines(output, ['', ...boxHeading('CONFIG BUNDLE FLATTENER'), '']);
    printLines(output, [`Source directory: ${sourceDir}`, `Output file:      ${outputFile}`, '']);
    printLines(output, ['Processing files:', RULE]);

    const service = new FlattenService(
      fs,
      new Collector(fs, createLogger('Collect', { verbose })),
      createLogger('Flatten', { verbose }),
    );
    const result = await service.flatten({
      sourceDir,
      outputFile,
      profile,
      commentPrefix: args.commentPrefix ?? env.commentPrefix,
      now: deps.now?.() ?? new Date(),
    });

    printLines(output, [RULE, '', `Wrote ${outputFile}`, '']);
    printLines(output, [...boxHeading('COMPLETE'), '']);
    printLines(output, [
      `  Lines:    ${result.lineCount.toLocaleString('en-US')}`,
      `  Size:     ${formatBytes(result.byteLength)}`,
      `  Files:    ${result.documents.length} embedded`,
    ]);
    if (result.skipped.length > 0) {
      output.out(`  Skipped:  ${result.skipped.length} (not found)`);
    }
    printLines(output, [
      '',
      'To reconstruct the files:',
      `  confbundle-unflatten ${outputFile} <output_directory>`,
      '',
    ]);
    return EXIT_OK;
  } catch (error) {
    return reportFailure(error, output, FLATTEN_USAGE, createLogger('Flatten'));
  }
}
