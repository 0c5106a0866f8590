import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { UsageError, type HunkwiseEvent, type Logger } from '@hunkwise/shared';
import { DryRunSimulator } from '../apply/simulator';
import { checkApplies, checkFormat, diagnoseApplies, diagnoseAppliesText, diagnoseFormat } from './facade';

const lines = (...rows: string[]) => rows.join('\n') + '\n';

const farewellPatch = lines(
  '--- a/greeting.txt',
  '+++ b/greeting.txt',
  '@@ -1,2 +1,2 @@',
  ' Hello, world!',
  '-Goodbye!',
  '+See you later!',
);

describe('checkFormat', () => {
  it('rejects text without any patch structure', () => {
    expect(checkFormat('Hullo world')).toBe(false);
  });

  it('accepts a unified diff', () => {
    expect(checkFormat(farewellPatch)).toBe(true);
  });

  it('counts the files of a well-formed patch', () => {
    expect(diagnoseFormat(farewellPatch)).toEqual({ ok: true, fileCount: 1, diagnostics: [] });
  });
});

describe('checkApplies', () => {
  let tmpDir: string;
  let patchFile: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hunkwise-check-'));
    patchFile = path.join(tmpDir, 'change.patch');
    await fs.writeFile(patchFile, farewellPatch);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('is true when the file matches the patch', async () => {
    await fs.writeFile(path.join(tmpDir, 'greeting.txt'), 'Hello, world!\nGoodbye!');
    expect(await checkApplies(patchFile, tmpDir, 5)).toBe(true);
    expect(await fs.readFile(path.join(tmpDir, 'greeting.txt'), 'utf8')).toBe('Hello, world!\nGoodbye!');
  });

  it('is false when the file has different content', async () => {
    await fs.writeFile(path.join(tmpDir, 'greeting.txt'), 'Hello, world!\nFarewell!');
    expect(await checkApplies(patchFile, tmpDir, 5)).toBe(false);

    const report = await diagnoseApplies(patchFile, tmpDir, 5);
    expect(report.files[0].verdict).toMatchObject({
      kind: 'WouldFail',
      reason: { kind: 'HunkApplyFailed', file: 'greeting.txt', message: 'Hunk #1 FAILED at lines 1-2' },
    });
  });

  it('reports a moved hunk as applying with an offset', async () => {
    await fs.writeFile(path.join(tmpDir, 'greeting.txt'), 'Intro\n\nHello, world!\nGoodbye!\n');
    const report = await diagnoseApplies(patchFile, tmpDir);
    expect(report.ok).toBe(true);
    expect(report.files[0].verdict).toEqual({ kind: 'WouldApplyWithOffset', offset: 2, fuzz: 0 });
  });

  it('reports a missing patch file', async () => {
    const missing = path.join(tmpDir, 'nope.patch');
    expect(await diagnoseApplies(missing, tmpDir)).toEqual({
      ok: false,
      files: [],
      diagnostics: [
        {
          kind: 'PathNotFound',
          severity: 'error',
          file: missing,
          message: `${missing}: patch file not found`,
        },
      ],
    });
  });

  it('returns format diagnostics for an invalid patch', async () => {
    const report = await diagnoseAppliesText('Hullo world', tmpDir);
    expect(report.ok).toBe(false);
    expect(report.diagnostics.map((d) => d.kind)).toEqual(['PatchEmpty']);
  });

  it('rejects a timeout that is not positive', async () => {
    await expect(checkApplies(patchFile, tmpDir, 0)).rejects.toBeInstanceOf(UsageError);
  });

  it('rejects a timeout longer than a timer can wait', async () => {
    await expect(checkApplies(patchFile, tmpDir, 3_000_000)).rejects.toThrow(
      'Timeout must be at most 2147483 seconds, got 3000000',
    );
    await fs.writeFile(path.join(tmpDir, 'greeting.txt'), 'Hello, world!\nGoodbye!\n');
    expect(await checkApplies(patchFile, tmpDir, 2_147_483)).toBe(true);
  });

  it('gives the same answer twice and leaves the tree unchanged', async () => {
    const target = path.join(tmpDir, 'greeting.txt');
    for (const content of ['Hello, world!\nGoodbye!\n', 'Hello, world!\nFarewell!\n']) {
      await fs.writeFile(target, content);
      const first = await checkApplies(patchFile, tmpDir, 5);
      expect(await fs.readFile(target, 'utf8')).toBe(content);
      expect(await checkApplies(patchFile, tmpDir, 5)).toBe(first);
      expect(await fs.readFile(target, 'utf8')).toBe(content);
      expect((await fs.readdir(tmpDir)).sort()).toEqual(['change.patch', 'greeting.txt']);
    }
  });

  it('is false for a file reached through a link out of the tree', async () => {
    const outside = await fs.mkdtemp(path.join(os.tmpdir(), 'hunkwise-outside-'));
    try {
      await fs.writeFile(path.join(outside, 'greeting.txt'), 'Hello, world!\nGoodbye!\n');
      await fs.symlink(outside, path.join(tmpDir, 'a'), 'dir');
      await fs.writeFile(patchFile, farewellPatch.replace(/greeting\.txt/g, 'a/greeting.txt'));

      const report = await diagnoseApplies(patchFile, tmpDir, 5);
      expect(report.ok).toBe(false);
      expect(report.files[0].verdict).toMatchObject({
        kind: 'WouldFail',
        reason: {
          kind: 'UnsafePath',
          message: 'a/greeting.txt: path leaves the tree root through a symbolic link',
        },
      });
    } finally {
      await fs.rm(outside, { recursive: true, force: true });
    }
  });

  it('reports a dry run that does not finish in time', async () => {
    vi.spyOn(DryRunSimulator.prototype, 'simulate').mockImplementation(
      (_document, _root, options) =>
        new Promise((_, reject) => {
          options?.signal?.addEventListener('abort', () => reject(options.signal?.reason));
        }),
    );
    const events: HunkwiseEvent[] = [];
    const logger: Logger = {
      log: (event) => {
        events.push(event);
      },
      trace: () => {},
      debug: () => {},
      child: () => logger,
    };

    const report = await diagnoseApplies(patchFile, tmpDir, 0.01, { logger, runId: 'run-7' });

    expect(report).toEqual({
      ok: false,
      files: [],
      diagnostics: [
        {
          kind: 'Timeout',
          severity: 'error',
          message: 'Dry run did not finish within 10ms',
          suggestion: 'Raise the timeout or split the patch.',
        },
      ],
    });
    expect(events.map((e) => e.type)).toEqual(['PatchParsed', 'DeadlineExceeded']);
  });
});
