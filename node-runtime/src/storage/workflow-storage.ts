import type { Value } from '../types/value.js';

export interface WorkflowStorage {
  save(path: string, value: Value): Promise<void>;
  load(path: string): Promise<Value>;
}
