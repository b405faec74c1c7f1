import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runFlatten } from '../../src/cli/flatten.js';
import type { CliOutput } from '../../src/cli/output.js';
import { runUnflatten } from '../../src/cli/unflatten.js';
import { MemoryFileSystem } from '../helpers/memory-file-system.js';

interface CapturedOutput extends CliOutput {
  readonly stdout: string[];
  readonly stderr: string[];
}

function captureOutput(): CapturedOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line: string) => stdout.push(line),
    err: (line: string) => stderr.push(line),
  };
}

const now = () => new Date(2026, 0, 2, 3, 4, 5);

describe('confbundle-flatten', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints usage and exits 0 for --help', async () => {
    const output = captureOutput();

    expect(await runFlatten(['--help'], { output, fs: new MemoryFileSystem() })).toBe(0);
    expect(output.stdout[0]).toBe('Usage: confbundle-flatten [options] <output_file>');
  });

  it('exits 1 with usage when the output file is missing', async () => {
    const output = captureOutput();

    expect(await runFlatten([], { output, fs: new MemoryFileSystem() })).toBe(1);
    expect(output.stderr[0]).toBe('ERROR: Missing <output_file>');
    expect(output.stderr).toContain('Usage: confbundle-flatten [options] <output_file>');
  });

  it('exits 1 on an unknown flag', async () => {
    const output = captureOutput();

    expect(await runFlatten(['--bogus', 'out.lua'], { output, fs: new MemoryFileSystem() })).toBe(1);
    expect(output.stderr[0]).toContain("Unknown option '--bogus'");
  });

  it('exits 1 on an extra positional argument', async () => {
    const output = captureOutput();

    expect(await runFlatten(['a.lua', 'b.lua'], { output, fs: new MemoryFileSystem() })).toBe(1);
    expect(output.stderr[0]).toBe('ERROR: Unexpected argument: b.lua');
  });

  it('exits 1 when the entry file is missing from the source root', async () => {
    const output = captureOutput();
    const fs = new MemoryFileSystem();

    const code = await runFlatten(['-s', '/cfg', 'out.lua'], { output, fs, env: {}, cwd: '/work', now });

    expect(code).toBe(1);
    expect(output.stderr[0]).toBe('ERROR: init.lua not found in config directory: /cfg');
    expect(fs.writes).toEqual([]);
  });

  it('writes the bundle with the built-in profile and reports skipped files', async () => {
    const output = captureOutput();
    const fs = new MemoryFileSystem({
      '/cfg/init.lua': 'require("config.options")\n',
      '/cfg/lua/config/options.lua': 'vim.o.number = true\n',
    });

    const code = await runFlatten(['out/bundle.lua'], {
      output,
      fs,
      env: { CONFBUNDLE_SOURCE_DIR: '/cfg' },
      cwd: '/work',
      now,
    });

    expect(code).toBe(0);
    const bundle = fs.read('/work/out/bundle.lua');
    expect(bundle).toContain('-- @FILE_START: init.lua\nrequire("config.options")\n-- @FILE_END: init.lua\n');
    expect(output.stdout).toContain('Source directory: /cfg');
    expect(output.stdout).toContain('  Files:    2 embedded');
    expect(output.stdout).toContain('  Skipped:  21 (not found)');
    expect(output.stdout).toContain('  confbundle-unflatten /work/out/bundle.lua <output_directory>');
  });

  it('reads the file list from a profile given on the command line', async () => {
    const output = captureOutput();
    const fs = new MemoryFileSystem({
      '/cfg/main.conf': 'include extra.conf\n',
      '/cfg/extra.conf': 'key = value\n',
      '/work/profile.json': JSON.stringify({
        entryFile: 'main.conf',
        commentPrefix: '# ',
        sections: [{ title: 'ALL', files: ['main.conf', 'extra.conf'] }],
      }),
    });

    const code = await runFlatten(['-s', '/cfg', '-c', 'profile.json', 'b.conf'], {
      output,
      fs,
      env: {},
      cwd: '/work',
      now,
    });

    expect(code).toBe(0);
    expect(fs.read('/work/b.conf')).toContain('# files: main.conf, extra.conf\n');
    expect(output.stdout).not.toContain('  Skipped:  0 (not found)');
  });

  it('exits 1 on an invalid profile', async () => {
    const output = captureOutput();
    const fs = new MemoryFileSystem({ '/work/profile.json': '{"sections": []}' });

    const code = await runFlatten(['-c', 'profile.json', 'b.conf'], { output, fs, env: {}, cwd: '/work', now });

    expect(code).toBe(1);
    expect(output.stderr[0]).toMatch(/^ERROR: Invalid profile \/work\/profile\.json: sections: /);
  });
});

describe('confbundle-unflatten', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints usage and exits 0 for -h', async () => {
    const output = captureOutput();

    expect(await runUnflatten(['-h'], { output, fs: new MemoryFileSystem() })).toBe(0);
    expect(output.stdout[0]).toBe('Usage: confbundle-unflatten [options] <bundle_file> <output_directory>');
  });

  it('exits 1 when the output directory is missing', async () => {
    const output = captureOutput();

    expect(await runUnflatten(['bundle.lua'], { output, fs: new MemoryFileSystem() })).toBe(1);
    expect(output.stderr[0]).toBe('ERROR: Missing <output_directory>');
  });

  it('exits 1 when the bundle does not exist', async () => {
    const output = captureOutput();

    const code = await runUnflatten(['missing.lua', 'out'], {
      output,
      fs: new MemoryFileSystem(),
      env: {},
      cwd: '/work',
    });

    expect(code).toBe(1);
    expect(output.stderr[0]).toBe('ERROR: Input file not found: /work/missing.lua');
  });

  it('exits 1 on a file without markers and writes nothing', async () => {
    const output = captureOutput();
    const fs = new MemoryFileSystem({ '/work/junk.txt': 'nothing to see\n' });

    const code = await runUnflatten(['junk.txt', 'out'], { output, fs, env: {}, cwd: '/work' });

    expect(code).toBe(1);
    expect(output.stderr[0]).toBe(
      'ERROR: No files found in bundle: /work/junk.txt. Make sure the file was created by confbundle-flatten.',
    );
    expect(fs.writes).toEqual([]);
  });

  it('restores what confbundle-flatten bundled', async () => {
    const fs = new MemoryFileSystem({
      '/cfg/init.lua': 'require("config.options")\n',
      '/cfg/lua/config/options.lua': 'vim.o.number = true',
    });
    await runFlatten(['-s', '/cfg', '/tmp/bundle.lua'], { output: captureOutput(), fs, env: {}, cwd: '/work', now });
    const output = captureOutput();

    const code = await runUnflatten(['/tmp/bundle.lua', 'restored'], { output, fs, env: {}, cwd: '/work' });

    expect(code).toBe(0);
    expect(fs.read('/work/restored/init.lua')).toBe('require("config.options")\n');
    expect(fs.read('/work/restored/lua/config/options.lua')).toBe('vim.o.number = true\n');
    expect(output.stdout).toContain('  generator: confbundle');
    expect(output.stdout).toContain('  file_count: 2');
    expect(output.stdout.some((line) => line.startsWith('  files:'))).toBe(false);
    expect(output.stdout).toContain('  Files created:       2');
    expect(output.stdout).toContain('  Directories created: 2');
    expect(output.stdout).toContain('│   └── config/');
    expect(output.stdout).toContain('└── init.lua');
  });
});
