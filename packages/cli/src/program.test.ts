import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { Readable } from 'stream';
import { name, run } from './program';
import { createCliState } from './utils/runtime';

const lines = (...rows: string[]) => rows.join('\n') + '\n';

const farewellPatch = lines(
  '--- a/greeting.txt',
  '+++ b/greeting.txt',
  '@@ -1,2 +1,2 @@',
  ' Hello, world!',
  '-Goodbye!',
  '+See you later!',
);

describe('cli package', () => {
  it('exports name', () => {
    expect(name).toBe('@hunkwise/cli');
  });
});

describe('hunkwise', () => {
  let tmpDir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errSpy: MockInstance<typeof console.error>;
  let stdoutSpy: MockInstance<typeof process.stdout.write>;

  const hunkwise = (args: string[], stdin = '') =>
    run(
      ['node', 'hunkwise', ...args],
      createCliState({ cwd: tmpDir, env: {}, stdin: Readable.from([stdin]) }),
    );
  const logged = () => logSpy.mock.calls.map((c) => String(c[0])).join('\n');
  const written = () => stdoutSpy.mock.calls.map((c) => String(c[0])).join('');
  const file = (rel: string) => path.join(tmpDir, rel);

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hunkwise-cli-'));
    await fs.writeFile(file('change.patch'), farewellPatch);
    await fs.writeFile(file('greeting.txt'), 'Hello, world!\nGoodbye!\n');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('check-format', () => {
    it('exits 0 for a well-formed patch', async () => {
      expect(await hunkwise(['check-format', 'change.patch'])).toBe(0);
      expect(logged()).toContain('Patch is well-formed.');
      expect(logged()).toContain('(1 file)');
    });

    it('exits 1 and explains a malformed patch as JSON', async () => {
      await fs.writeFile(file('bad.patch'), 'Hullo world\n');

      expect(await hunkwise(['--json', 'check-format', 'bad.patch'])).toBe(1);

      const report = JSON.parse(String(logSpy.mock.calls[0][0]));
      expect(report.ok).toBe(false);
      expect(report.fileCount).toBe(0);
      expect(report.diagnostics[0].kind).toBe('PatchEmpty');
    });

    it('reads the patch from stdin', async () => {
      expect(await hunkwise(['check-format', '-'], farewellPatch)).toBe(0);
    });
  });

  describe('check-applies', () => {
    it('exits 0 when the patch applies and leaves the tree alone', async () => {
      expect(await hunkwise(['check-applies', 'change.patch', '.', '--timeout', '5'])).toBe(0);
      expect(logged()).toContain('Patch applies.');
      expect(await fs.readFile(file('greeting.txt'), 'utf8')).toBe('Hello, world!\nGoodbye!\n');
    });

    it('exits 1 when the patch does not apply', async () => {
      await fs.writeFile(file('greeting.txt'), 'Hello, world!\nFarewell!\n');
      expect(await hunkwise(['check-applies', 'change.patch'])).toBe(1);
      expect(logged()).toContain('Hunk #1 FAILED at lines 1-2');
    });

    it('reports a missing patch file', async () => {
      expect(await hunkwise(['check-applies', 'nope.patch'])).toBe(1);
      expect(logged()).toContain(`${file('nope.patch')}: patch file not found`);
    });

    it('rejects a timeout that is not a positive number', async () => {
      expect(await hunkwise(['check-applies', 'change.patch', '--timeout', '0'])).toBe(2);
    });
  });

  describe('apply', () => {
    it('writes the patched file', async () => {
      expect(await hunkwise(['apply', 'change.patch'])).toBe(0);
      expect(await fs.readFile(file('greeting.txt'), 'utf8')).toBe('Hello, world!\nSee you later!\n');
      expect(logged()).toContain('Changed files:');
      expect(logged()).toContain('  - greeting.txt');
    });

    it('leaves the tree alone on a dry run', async () => {
      expect(await hunkwise(['apply', '--dry-run', 'change.patch'])).toBe(0);
      expect(await fs.readFile(file('greeting.txt'), 'utf8')).toBe('Hello, world!\nGoodbye!\n');
      expect(logged()).toContain('Dry run: patch applies.');
    });

    it('applies in reverse', async () => {
      await fs.writeFile(file('greeting.txt'), 'Hello, world!\nSee you later!\n');
      expect(await hunkwise(['apply', '-R', 'change.patch'])).toBe(0);
      expect(await fs.readFile(file('greeting.txt'), 'utf8')).toBe('Hello, world!\nGoodbye!\n');
    });

    it('applies into a tree given as an argument', async () => {
      await fs.mkdir(file('tree'));
      await fs.writeFile(file('tree/greeting.txt'), 'Hello, world!\nGoodbye!\n');
      expect(await hunkwise(['apply', 'change.patch', 'tree'])).toBe(0);
      expect(await fs.readFile(file('tree/greeting.txt'), 'utf8')).toBe(
        'Hello, world!\nSee you later!\n',
      );
    });

    it('exits 1 when a file cannot be found at the strip level', async () => {
      expect(await hunkwise(['apply', '-p', '2', 'change.patch'])).toBe(1);
      expect(logged()).toContain('cannot strip 2 leading components from b/greeting.txt');
    });

    it('prints the report as JSON', async () => {
      expect(await hunkwise(['--json', 'apply', 'change.patch'])).toBe(0);
      const report = JSON.parse(String(logSpy.mock.calls[0][0]));
      expect(report.committed).toBe(true);
      expect(report.filesChanged).toEqual(['greeting.txt']);
    });

    it('appends structured events to the log file', async () => {
      expect(await hunkwise(['--log-file', 'events.jsonl', 'apply', 'change.patch'])).toBe(0);
      const events = (await fs.readFile(file('events.jsonl'), 'utf8'))
        .trim()
        .split('\n')
        .map((line) => JSON.parse(line));
      expect(events.map((e) => e.type)).toEqual(['PatchParsed', 'FileEvaluated', 'FilesCommitted']);
      expect(new Set(events.map((e) => e.runId)).size).toBe(1);
      expect(events[2].payload).toEqual({ files: ['greeting.txt'], atomic: false });
    });

    it('reads settings from the repository config file', async () => {
      await fs.writeFile(file('.hunkwise.yaml'), 'matching:\n  fuzz: 0\n');
      await fs.writeFile(file('greeting.txt'), 'Hi!\nGoodbye!\n');
      expect(await hunkwise(['apply', 'change.patch'])).toBe(1);
      expect(await hunkwise(['apply', '--fuzz', '1', 'change.patch'])).toBe(0);
    });

    it('exits 2 for a missing patch file', async () => {
      expect(await hunkwise(['apply', 'nope.patch'])).toBe(2);
      expect(errSpy).toHaveBeenCalledWith('❌ Error: Patch file not found: nope.patch');
    });

    it('exits 2 for an option value that is not a number', async () => {
      expect(await hunkwise(['apply', '--fuzz', 'abc', 'change.patch'])).toBe(2);
    });
  });

  describe('reverse', () => {
    it('prints the inverted patch', async () => {
      expect(await hunkwise(['reverse', 'change.patch'])).toBe(0);
      expect(written()).toBe(
        lines(
          '--- b/greeting.txt',
          '+++ a/greeting.txt',
          '@@ -1,2 +1,2 @@',
          ' Hello, world!',
          '+Goodbye!',
          '-See you later!',
        ),
      );
    });

    it('exits 1 for a malformed patch', async () => {
      expect(await hunkwise(['reverse', '-'], 'Hullo world\n')).toBe(1);
      expect(errSpy).toHaveBeenCalledWith('❌ Error: Patch contains no file changes');
    });
  });

  it('prints configuration errors as JSON and exits 2', async () => {
    expect(await hunkwise(['--json', '--config', 'missing.yaml', 'check-format', 'change.patch'])).toBe(2);
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      error: { code: 'ConfigError', message: `Config file not found: ${file('missing.yaml')}` },
    });
  });

  it('exits 0 for --help', async () => {
    expect(await hunkwise(['--help'])).toBe(0);
    expect(written()).toContain('Usage: hunkwise [options] [command]');
  });

  it('exits 2 for an unknown command', async () => {
    expect(await hunkwise(['frobnicate'])).toBe(2);
  });
});
