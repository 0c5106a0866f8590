import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FileSystemError } from '@hunkwise/shared';
import { FsTree } from './fs-tree';

describe('FsTree', () => {
  let tmpDir: string;
  let tree: FsTree;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hunkwise-tree-'));
    tree = new FsTree(tmpDir);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reads files and reports missing ones as undefined', async () => {
    await fs.writeFile(path.join(tmpDir, 'a.txt'), 'hello');
    expect((await tree.read('a.txt'))?.toString('utf8')).toBe('hello');
    expect(await tree.read('missing.txt')).toBeUndefined();
    expect(await tree.read('a.txt/below')).toBeUndefined();
  });

  it('stats regular files only', async () => {
    await fs.mkdir(path.join(tmpDir, 'dir'));
    await fs.writeFile(path.join(tmpDir, 'f.txt'), '');
    expect(await tree.stat('dir')).toBeUndefined();
    expect(await tree.stat('f.txt')).toBeDefined();
  });

  it('creates parent directories when writing', async () => {
    await tree.write('deep/er/x.txt', Buffer.from('x'));
    expect(await fs.readFile(path.join(tmpDir, 'deep/er/x.txt'), 'utf8')).toBe('x');
  });

  it('keeps the permissions of a replaced file', async () => {
    const file = path.join(tmpDir, 'run.sh');
    await fs.writeFile(file, 'echo');
    await fs.chmod(file, 0o755);

    await tree.write('run.sh', Buffer.from('echo hi'));

    expect((await fs.stat(file)).mode & 0o777).toBe(0o755);
    expect(await fs.readFile(file, 'utf8')).toBe('echo hi');
  });

  it('applies an explicit mode', async () => {
    await tree.write('tool', Buffer.from('#!/bin/sh\n'), 0o100755);
    expect((await fs.stat(path.join(tmpDir, 'tool'))).mode & 0o777).toBe(0o755);

    await tree.chmod('tool', 0o100600);
    expect((await fs.stat(path.join(tmpDir, 'tool'))).mode & 0o777).toBe(0o600);
  });

  it('removes files and ignores missing ones', async () => {
    await fs.writeFile(path.join(tmpDir, 'x.txt'), 'x');
    await tree.remove('x.txt');
    await tree.remove('x.txt');
    expect(await tree.stat('x.txt')).toBeUndefined();
  });

  it('refuses paths outside the root', async () => {
    await expect(tree.read('../outside.txt')).rejects.toBeInstanceOf(FileSystemError);
    await expect(tree.resolve('/etc/passwd')).rejects.toThrow(
      '/etc/passwd: absolute paths are not allowed',
    );
  });

  describe('symbolic links', () => {
    let outside: string;

    beforeEach(async () => {
      outside = await fs.mkdtemp(path.join(os.tmpdir(), 'hunkwise-outside-'));
      await fs.writeFile(path.join(outside, 'secret.txt'), 'keep\n');
      await fs.symlink(outside, path.join(tmpDir, 'link'), 'dir');
      await fs.mkdir(path.join(tmpDir, 'real'));
      await fs.symlink(path.join(tmpDir, 'real'), path.join(tmpDir, 'alias'), 'dir');
    });

    afterEach(async () => {
      await fs.rm(outside, { recursive: true, force: true });
    });

    it('flags paths that leave the root through a link', async () => {
      const reason = 'path leaves the tree root through a symbolic link';
      expect(await tree.unsafeReason('link/secret.txt')).toBe(reason);
      expect(await tree.unsafeReason('link/new/file.txt')).toBe(reason);
      await expect(tree.write('link/secret.txt', Buffer.from('changed\n'))).rejects.toThrow(
        `link/secret.txt: ${reason}`,
      );
      expect(await fs.readFile(path.join(outside, 'secret.txt'), 'utf8')).toBe('keep\n');
    });

    it('allows links that stay inside the root', async () => {
      expect(await tree.unsafeReason('alias/a.txt')).toBeUndefined();
      expect(await tree.unsafeReason('not/there/yet.txt')).toBeUndefined();
      await tree.write('alias/a.txt', Buffer.from('a'));
      expect(await fs.readFile(path.join(tmpDir, 'real/a.txt'), 'utf8')).toBe('a');
    });
  });
});
