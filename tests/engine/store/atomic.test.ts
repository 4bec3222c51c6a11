import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { writeFileAtomic, DEFAULT_FILE_MODE } from '../../../src/engine/store/atomic.js';
import { StoreIOError } from '../../../src/engine/types.js';
import { cleanupTestDir, createTestDir } from '../../helpers/fixtures.js';

async function exists(filePath: string): Promise<boolean> {
  return fs.stat(filePath).then(
    () => true,
    () => false
  );
}

describe('writeFileAtomic', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTestDir('atomic');
  });

  afterEach(async () => {
    await cleanupTestDir(testDir);
  });

  it('should write the complete contents and leave no temp file', async () => {
    const target = path.join(testDir, 'a.torrent');

    await writeFileAtomic(target, Buffer.from('hello'));

    expect(await fs.readFile(target, 'utf-8')).toBe('hello');
    expect(await exists(`${target}.tmp`)).toBe(false);
  });

  it('should replace an existing file', async () => {
    const target = path.join(testDir, 'a.torrent');
    await fs.writeFile(target, 'old contents');

    await writeFileAtomic(target, Buffer.from('new'));

    expect(await fs.readFile(target, 'utf-8')).toBe('new');
  });

  it('should truncate a stale temp file left by a crash', async () => {
    const target = path.join(testDir, 'a.torrent');
    await fs.writeFile(`${target}.tmp`, 'leftover bytes from an interrupted write');

    await writeFileAtomic(target, Buffer.from('short'));

    expect(await fs.readFile(target, 'utf-8')).toBe('short');
    expect(await exists(`${target}.tmp`)).toBe(false);
  });

  it.skipIf(process.platform === 'win32')('should apply the file mode', async () => {
    const target = path.join(testDir, 'private.torrent');

    await writeFileAtomic(target, Buffer.from('x'), 0o600);

    const stats = await fs.stat(target);
    expect(stats.mode & 0o777).toBe(0o600);
  });

  it('should default to world-readable files', () => {
    expect(DEFAULT_FILE_MODE).toBe(0o644);
  });

  it('should report a failed open as StoreIOError', async () => {
    const target = path.join(testDir, 'missing', 'a.torrent');

    const error = await writeFileAtomic(target, Buffer.from('x'), 0o644, 'create').catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(StoreIOError);
    expect(error).toMatchObject({
      code: 'IO',
      operation: 'create',
      target,
      sysCode: 'ENOENT',
    });
  });

  it('should remove the temp file when the rename fails', async () => {
    const target = path.join(testDir, 'taken');
    await fs.mkdir(path.join(target, 'child'), { recursive: true });

    await expect(writeFileAtomic(target, Buffer.from('x'))).rejects.toBeInstanceOf(
      StoreIOError
    );

    expect(await exists(`${target}.tmp`)).toBe(false);
    expect((await fs.stat(target)).isDirectory()).toBe(true);
  });
});
