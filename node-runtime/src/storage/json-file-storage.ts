import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import { toValue, type Value } from '../types/value.js';
import type { WorkflowStorage } from './workflow-storage.js';

/**
 * Stores values as pretty-printed JSON files under a base directory.
 * Paths are relative to that directory and may not point outside it.
 */
export class JsonFileStorage implements WorkflowStorage {
  private baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);
  }

  resolvePath(path: string): string {
    const target = resolve(this.baseDir, path);
    const rel = relative(this.baseDir, target);
    if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new Error(`Storage path "${path}" resolves outside ${this.baseDir}`);
    }
    return target;
  }

  async save(path: string, value: Value): Promise<void> {
    const target = this.resolvePath(path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, JSON.stringify(value, null, 2) + '\n', 'utf-8');
  }

  async load(path: string): Promise<Value> {
    const raw = await readFile(this.resolvePath(path), 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    return toValue(parsed);
  }

  getBaseDir(): string {
    return this.baseDir;
  }
}
