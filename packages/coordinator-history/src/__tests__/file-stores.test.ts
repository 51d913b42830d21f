import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { StorageError, loadText } from '@taskloom/coordinator-sdk';
import { MemoryFileStore } from '../memory-file-store.js';
import { NodeFileStore } from '../node-file-store.js';
import { normalizeStorePath } from '../store-paths.js';

describe('normalizeStorePath', () => {
  it('normalizes separators and dot segments', () => {
    expect(normalizeStorePath('tasks\\t1/./task.json')).toBe('tasks/t1/task.json');
    expect(normalizeStorePath('tasks/t1/../t2/task.json')).toBe('tasks/t2/task.json');
  });

  it('rejects paths that leave the root', () => {
    expect(() => normalizeStorePath('../../etc/passwd')).toThrow('Path escapes the store root: ../../etc/passwd');
    expect(() => normalizeStorePath('/etc/passwd')).toThrow('Path must be relative: /etc/passwd');
    expect(() => normalizeStorePath('C:/Windows')).toThrow(StorageError);
    expect(() => normalizeStorePath('  ')).toThrow('Path must be non-empty');
    expect(() => normalizeStorePath('tasks/..')).toThrow('Path must name a file: tasks/..');
  });
});

describe('NodeFileStore', () => {
  let rootDir: string;
  let store: NodeFileStore;

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'coordinator-store-'));
    store = new NodeFileStore(rootDir);
  });

  afterEach(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  it('creates parent directories on save', async () => {
    await store.save('tasks/t1/task.json', '{"ok":true}');

    expect(fs.readFileSync(path.join(rootDir, 'tasks', 't1', 'task.json'), 'utf-8')).toBe('{"ok":true}');
    expect(await loadText(store, 'tasks/t1/task.json')).toBe('{"ok":true}');
  });

  it('reports existence without throwing', async () => {
    await store.save('a.txt', new Uint8Array([104, 105]));

    expect(await store.exists('a.txt')).toBe(true);
    expect(await store.exists('b.txt')).toBe(false);
  });

  it('fails to load a missing file with a StorageError', async () => {
    await expect(store.load('missing.txt')).rejects.toThrow('File not found: missing.txt');
    await expect(store.load('missing.txt')).rejects.toBeInstanceOf(StorageError);
  });

  it('never writes outside its root', async () => {
    await expect(store.save('../escape.txt', 'x')).rejects.toThrow('Path escapes the store root: ../escape.txt');
    expect(fs.existsSync(path.join(rootDir, '..', 'escape.txt'))).toBe(false);
  });
});

describe('MemoryFileStore', () => {
  it('round-trips text and copies bytes', async () => {
    const store = new MemoryFileStore();
    const bytes = new Uint8Array([1, 2, 3]);

    await store.save('bin/data', bytes);
    bytes[0] = 9;
    const loaded = await store.load('bin/data');
    loaded[1] = 9;

    expect([...(await store.load('bin/data'))]).toEqual([1, 2, 3]);
  });

  it('lists normalized paths', async () => {
    const store = new MemoryFileStore();
    await store.save('b/./two.txt', 'two');
    await store.save('a/one.txt', 'one');

    expect(store.paths()).toEqual(['a/one.txt', 'b/two.txt']);
    expect(await store.exists('b/two.txt')).toBe(true);
    await expect(store.load('c.txt')).rejects.toThrow('File not found: c.txt');
  });
});
