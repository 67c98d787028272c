import { writeFile, appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExecutionResult, StepOutcome } from '../types/step-result.js';

/** Persists one run's outcomes and final result under a run directory. */
export class RunLogger {
  private outcomesPath: string;
  private initialized = false;

  constructor(private runDir: string) {
    this.outcomesPath = join(runDir, 'outcomes.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  async logOutcome(outcome: StepOutcome): Promise<void> {
    await this.ensureDir();
    const entry = {
      timestamp: new Date().toISOString(),
      ...outcome,
    };
    await appendFile(this.outcomesPath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  async saveResult(result: ExecutionResult): Promise<void> {
    await this.ensureDir();
    await writeFile(join(this.runDir, 'result.json'), JSON.stringify(result, null, 2) + '\n', 'utf-8');
  }

  getRunDir(): string {
    return this.runDir;
  }
}
