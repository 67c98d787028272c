import { setTimeout as delay } from 'node:timers/promises';
import { classifyError } from '../exception/classifier.js';
import { RetryExhaustedError, type WorkflowError } from '../exception/errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { Value } from '../types/value.js';
import type { ErrorPolicy, RetryConfig, Step } from '../types/workflow.js';

export type Sleep = (ms: number) => Promise<void>;

export type PolicyResult =
  | { status: 'success' | 'retried'; attempts: number; value: Value; abort: false }
  | {
      status: 'failed';
      attempts: number;
      value: null;
      error: WorkflowError;
      /** The failure ends the run. */
      abort: boolean;
    };

export interface PolicyExecutorOptions {
  defaultRetry?: RetryConfig;
  sleep?: Sleep;
  logger?: Logger;
}

export const DEFAULT_RETRY: RetryConfig = { max_attempts: 3, delay_seconds: 1 };

const defaultSleep: Sleep = (ms) => delay(ms);

/**
 * Applies a step's `on_error` policy around one leaf dispatch.
 *
 * `prepare` resolves the step's templates and runs once: its errors are
 * deterministic and never retried. `invoke` performs the collaborator call
 * and is repeated under `retry`. Never throws; the caller decides from
 * `abort` whether the run continues.
 */
export class PolicyExecutor {
  private defaultRetry: RetryConfig;
  private sleep: Sleep;
  private logger: Logger;

  constructor(options: PolicyExecutorOptions = {}) {
    this.defaultRetry = options.defaultRetry ?? DEFAULT_RETRY;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? silentLogger;
  }

  async execute<T>(
    step: Step,
    prepare: () => T,
    invoke: (prepared: T) => Promise<Value>,
    signal?: AbortSignal,
  ): Promise<PolicyResult> {
    const policy: ErrorPolicy = step.on_error ?? 'fail';

    let prepared: T;
    try {
      prepared = prepare();
    } catch (error) {
      return this.fail(step, policy === 'retry' ? 'fail' : policy, 0, classifyError(error, { step: step.name }));
    }

    const retry = step.retry ?? this.defaultRetry;
    const maxAttempts = policy === 'retry' ? retry.max_attempts : 1;
    let attempts = 0;

    for (;;) {
      attempts++;
      try {
        const value = await invoke(prepared);
        return { status: attempts > 1 ? 'retried' : 'success', attempts, value, abort: false };
      } catch (error) {
        const failure = classifyError(error, { step: step.name });
        if (attempts >= maxAttempts || signal?.aborted) {
          if (policy === 'retry' && attempts >= maxAttempts) {
            return this.fail(step, 'fail', attempts, new RetryExhaustedError(step.name, attempts, failure));
          }
          return this.fail(step, policy, attempts, failure);
        }

        this.logger.warn('Step attempt failed, retrying', {
          step: step.name,
          attempt: attempts,
          maxAttempts,
          delaySeconds: retry.delay_seconds,
          error: failure,
        });
        await this.sleep(retry.delay_seconds * 1000);
      }
    }
  }

  private fail(step: Step, policy: ErrorPolicy, attempts: number, error: WorkflowError): PolicyResult {
    if (policy === 'continue') {
      this.logger.warn('Step failed, continuing', { step: step.name, attempts, kind: error.kind, error });
      return { status: 'failed', attempts, value: null, error, abort: false };
    }
    return { status: 'failed', attempts, value: null, error, abort: true };
  }
}
