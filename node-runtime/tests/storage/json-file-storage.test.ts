import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { JsonFileStorage } from '../../src/storage/json-file-storage.js';

describe('JsonFileStorage', () => {
  let baseDir: string;
  let storage: JsonFileStorage;

  beforeEach(() => {
    baseDir = join(tmpdir(), `storage-test-${randomUUID()}`);
    storage = new JsonFileStorage(baseDir);
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('saves pretty-printed JSON and creates parent directories', async () => {
    await storage.save('results/pages.json', { pages: [1, 2] });

    const raw = await readFile(join(baseDir, 'results', 'pages.json'), 'utf-8');
    expect(raw).toBe('{\n  "pages": [\n    1,\n    2\n  ]\n}\n');
  });

  it('loads what it saved', async () => {
    await storage.save('state.json', ['a', { b: null }]);
    expect(await storage.load('state.json')).toEqual(['a', { b: null }]);
  });

  it('rejects paths outside the base directory', async () => {
    const base = resolve(baseDir);
    expect(() => storage.resolvePath('../escape.json')).toThrow(
      `Storage path "../escape.json" resolves outside ${base}`,
    );
    expect(() => storage.resolvePath('/etc/passwd')).toThrow('resolves outside');
    expect(() => storage.resolvePath('.')).toThrow('resolves outside');
    await expect(storage.save('../escape.json', 1)).rejects.toThrow('resolves outside');
  });

  it('allows names that merely start with dots', () => {
    expect(storage.resolvePath('..data.json')).toBe(join(resolve(baseDir), '..data.json'));
  });

  it('fails to load a missing file', async () => {
    await expect(storage.load('missing.json')).rejects.toThrow('ENOENT');
  });

  it('reports its resolved base directory', () => {
    expect(storage.getBaseDir()).toBe(resolve(baseDir));
  });
});
