/**
 * Tests for bundle/pointer-store.ts
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { FileKeyValueSlot, MemoryKeyValueSlot } from '../../src/bundle/pointer-store.js';
import { LogLevel, UnifiedLogger } from '../../src/sdk/unified-logger.js';
import { makeTempDir, removeTempDir } from '../helpers/temp-dir.js';

describe('MemoryKeyValueSlot', () => {
  it('should get, set and delete values', async () => {
    const slot = new MemoryKeyValueSlot({ a: '1' });

    expect(await slot.get('a')).toBe('1');
    await slot.set('b', '2');
    expect(await slot.get('b')).toBe('2');
    await slot.delete('a');
    expect(await slot.get('a')).toBeUndefined();
  });
});

describe('FileKeyValueSlot', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    UnifiedLogger.reset();
    dir = await makeTempDir();
    filePath = join(dir, 'state', 'state.json');
  });

  afterEach(async () => {
    UnifiedLogger.reset();
    await removeTempDir(dir);
  });

  it('should read a missing file as empty', async () => {
    const slot = new FileKeyValueSlot(filePath);

    expect(await slot.get('currentBundleName')).toBeUndefined();
    expect(UnifiedLogger.getInstance().getLogs()).toHaveLength(0);
  });

  it('should persist values across instances', async () => {
    await new FileKeyValueSlot(filePath).set('currentBundleName', 'abc.bundle');

    expect(await new FileKeyValueSlot(filePath).get('currentBundleName')).toBe('abc.bundle');
    expect(JSON.parse(await readFile(filePath, 'utf-8'))).toEqual({ currentBundleName: 'abc.bundle' });
  });

  it('should leave no temporary files behind', async () => {
    const slot = new FileKeyValueSlot(filePath);
    await slot.set('a', '1');
    await slot.set('a', '2');

    expect(await readdir(join(dir, 'state'))).toEqual(['state.json']);
  });

  it('should serialize concurrent updates', async () => {
    const slot = new FileKeyValueSlot(filePath);

    await Promise.all([slot.set('a', '1'), slot.set('b', '2'), slot.set('c', '3')]);

    expect(JSON.parse(await readFile(filePath, 'utf-8'))).toEqual({ a: '1', b: '2', c: '3' });
  });

  it('should delete keys', async () => {
    const slot = new FileKeyValueSlot(filePath);
    await slot.set('a', '1');
    await slot.set('b', '2');
    await slot.delete('a');

    expect(await slot.get('a')).toBeUndefined();
    expect(await slot.get('b')).toBe('2');
  });

  it('should ignore inherited object keys', async () => {
    const slot = new FileKeyValueSlot(filePath);
    await slot.set('a', '1');

    expect(await slot.get('toString')).toBeUndefined();
  });

  it('should treat a corrupt file as empty and warn', async () => {
    const slot = new FileKeyValueSlot(filePath);
    await slot.set('a', '1');
    await writeFile(filePath, '{ not json', 'utf-8');

    expect(await slot.get('a')).toBeUndefined();
    const warnings = UnifiedLogger.getInstance().getLogs({ minLevel: LogLevel.WARN });
    expect(warnings.map(entry => entry.message)).toEqual(['Pointer file is corrupt, treating as empty']);
    expect(warnings[0].source).toBe('pointer-store');
  });

  it('should treat a file of the wrong shape as empty', async () => {
    const slot = new FileKeyValueSlot(filePath);
    await slot.set('a', '1');
    await writeFile(filePath, JSON.stringify({ a: 1 }), 'utf-8');

    expect(await slot.get('a')).toBeUndefined();
  });

  it('should resolve the path', () => {
    expect(new FileKeyValueSlot(filePath).getPath()).toBe(filePath);
  });
});
