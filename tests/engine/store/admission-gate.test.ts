import { describe, it, expect, expectTypeOf, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import {
  AdmissionGate,
  applyWhitelistChange,
  matchesWhitelist,
  parseWhitelist,
  type PatternList,
} from '../../../src/engine/store/admission-gate.js';
import { AsyncLock } from '../../../src/engine/store/lock.js';
import { TypedEventEmitter, type StoreEvents } from '../../../src/engine/events.js';
import { DecodeError, WhitelistWriteError } from '../../../src/engine/types.js';
import { cleanupTestDir, createTestDir, recordingLogger } from '../../helpers/fixtures.js';

describe('parseWhitelist', () => {
  it('should read a JSON array of strings', () => {
    expect(parseWhitelist('["a","b"]', 'w')).toEqual(['a', 'b']);
    expect(parseWhitelist('[]', 'w')).toEqual([]);
  });

  it('should treat a zero-byte file as an empty whitelist', () => {
    expect(parseWhitelist('', 'w')).toEqual([]);
  });

  it('should treat JSON null as an empty whitelist', () => {
    expect(parseWhitelist('null', 'w')).toEqual([]);
  });

  it('should reject invalid JSON', () => {
    expect(() => parseWhitelist('[', 'w')).toThrow(DecodeError);
    expect(() => parseWhitelist('[', 'w')).toThrow('Whitelist w is not valid JSON');
  });

  it('should reject anything but an array of strings', () => {
    expect(() => parseWhitelist('{"a":1}', 'w')).toThrow(
      'Whitelist w must be a JSON array of strings'
    );
    expect(() => parseWhitelist('[1]', 'w')).toThrow(
      'Whitelist w must be a JSON array of strings'
    );
  });
});

describe('applyWhitelistChange', () => {
  it('should add, remove, deduplicate and sort', () => {
    expect(applyWhitelistChange(['b', 'a'], ['c', 'a', 'c'], ['b'])).toEqual(['a', 'c']);
  });

  it('should let an addition win over a removal of the same pattern', () => {
    expect(applyWhitelistChange(['a'], ['a'], ['a'])).toEqual(['a']);
  });

  it('should ignore removal of absent patterns', () => {
    expect(applyWhitelistChange([], [], ['x'])).toEqual([]);
  });

  it('should accept sets of patterns but not a bare string', () => {
    expect(applyWhitelistChange(['a'], new Set(['c', 'b']), new Set(['a']))).toEqual(['b', 'c']);
    expectTypeOf<string>().not.toMatchTypeOf<PatternList>();
  });
});

describe('matchesWhitelist', () => {
  it('should match patterns as substrings of the name', () => {
    expect(matchesWhitelist('foobar', ['foo'])).toBe(true);
    expect(matchesWhitelist('bar', ['foo'])).toBe(false);
    expect(matchesWhitelist('bar', [])).toBe(false);
  });
});

describe('AdmissionGate', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTestDir('gate');
  });

  afterEach(async () => {
    await cleanupTestDir(testDir);
  });

  it('should admit everything until download-once mode starts', async () => {
    const gate = new AdmissionGate(testDir);

    expect(await gate.newDownloadsAreProhibited('anything')).toBe(false);
    expect(await gate.whitelist()).toBeNull();
  });

  it('should block everything with an empty whitelist', async () => {
    const gate = new AdmissionGate(testDir);

    expect(await gate.prohibitNewDownloads([], [])).toEqual([]);

    expect(await fs.readFile(gate.filePath, 'utf-8')).toBe('[]');
    expect(await gate.newDownloadsAreProhibited('anything')).toBe(true);
    expect(await gate.whitelist()).toEqual([]);
  });

  it('should admit names containing a whitelisted pattern', async () => {
    const gate = new AdmissionGate(testDir);

    await gate.prohibitNewDownloads(['foo'], []);

    expect(await gate.newDownloadsAreProhibited('foobar')).toBe(false);
    expect(await gate.newDownloadsAreProhibited('bar')).toBe(true);
  });

  it('should keep the whitelist a sorted set across updates', async () => {
    const gate = new AdmissionGate(testDir);

    await gate.prohibitNewDownloads(['headers', 'bodies'], []);
    await gate.prohibitNewDownloads(['headers'], []);
    const result = await gate.prohibitNewDownloads(['transactions'], ['bodies']);

    expect(result).toEqual(['headers', 'transactions']);
    expect(await fs.readFile(gate.filePath, 'utf-8')).toBe('["headers","transactions"]');
  });

  it('should persist across instances', async () => {
    await new AdmissionGate(testDir).prohibitNewDownloads(['headers'], []);

    const reopened = new AdmissionGate(testDir);
    expect(await reopened.whitelist()).toEqual(['headers']);
    expect(await reopened.newDownloadsAreProhibited('bodies')).toBe(true);
  });

  it('should treat a zero-byte file as an empty whitelist', async () => {
    const gate = new AdmissionGate(testDir);
    await fs.writeFile(gate.filePath, '');

    expect(await gate.newDownloadsAreProhibited('anything')).toBe(true);
    expect(await gate.prohibitNewDownloads(['a'], [])).toEqual(['a']);
  });

  it('should treat a null whitelist as download-once mode with nothing admitted', async () => {
    const gate = new AdmissionGate(testDir);
    await fs.writeFile(gate.filePath, 'null');

    expect(await gate.newDownloadsAreProhibited('x')).toBe(true);
    expect(await gate.whitelist()).toEqual([]);
    expect(await gate.prohibitNewDownloads(['a'], [])).toEqual(['a']);
  });

  it('should fail with DecodeError on a malformed whitelist', async () => {
    const gate = new AdmissionGate(testDir);
    await fs.writeFile(gate.filePath, 'not json');

    await expect(gate.newDownloadsAreProhibited('a')).rejects.toBeInstanceOf(DecodeError);
    await expect(gate.prohibitNewDownloads(['a'], [])).rejects.toMatchObject({
      code: 'DECODE',
    });
    expect(await fs.readFile(gate.filePath, 'utf-8')).toBe('not json');
  });

  it('should report the computed whitelist when the write fails', async () => {
    const gate = new AdmissionGate(path.join(testDir, 'missing'));

    const error = await gate.prohibitNewDownloads(['b', 'a'], []).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(WhitelistWriteError);
    expect(error).toMatchObject({
      code: 'IO',
      operation: 'prohibitNewDownloads',
      sysCode: 'ENOENT',
      whitelist: ['a', 'b'],
    });
  });

  it('should log and emit each update', async () => {
    const logger = recordingLogger();
    const events = new TypedEventEmitter<StoreEvents>();
    const updates: string[][] = [];
    events.on('whitelistUpdated', ({ whitelist }) => updates.push(whitelist));
    const gate = new AdmissionGate(testDir, { logger, events });

    await gate.prohibitNewDownloads(['a'], []);
    await gate.prohibitNewDownloads(['b'], []);

    expect(updates).toEqual([['a'], ['a', 'b']]);
    expect(logger.lines).toEqual([
      { level: 'info', message: 'New downloads prohibited; whitelist has 1 pattern(s)' },
      { level: 'info', message: 'New downloads prohibited; whitelist has 2 pattern(s)' },
    ]);
  });

  it('should serialize concurrent updates through the shared lock', async () => {
    const lock = new AsyncLock();
    const gate = new AdmissionGate(testDir, { lock });

    const updates = ['a', 'b', 'c', 'd'].map((pattern) => gate.prohibitNewDownloads([pattern], []));
    expect(lock.size).toBe(4);

    const results = await Promise.all(updates);
    expect(results.at(-1)).toEqual(['a', 'b', 'c', 'd']);
    expect(await gate.whitelist()).toEqual(['a', 'b', 'c', 'd']);
  });
});
