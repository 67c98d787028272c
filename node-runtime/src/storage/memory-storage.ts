import type { Value } from '../types/value.js';
import type { WorkflowStorage } from './workflow-storage.js';

export class MemoryStorage implements WorkflowStorage {
  private entries = new Map<string, Value>();

  async save(path: string, value: Value): Promise<void> {
    this.entries.set(path, structuredClone(value));
  }

  async load(path: string): Promise<Value> {
    const value = this.entries.get(path);
    if (value === undefined) {
      throw new Error(`No stored value at "${path}"`);
    }
    return structuredClone(value);
  }

  has(path: string): boolean {
    return this.entries.has(path);
  }

  paths(): string[] {
    return [...this.entries.keys()];
  }
}
