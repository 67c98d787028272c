import { randomUUID } from 'node:crypto';
import type { BrowserDriver } from '../engines/browser-driver.js';
import { classifyError } from '../exception/classifier.js';
import { CancelledError, type WorkflowError } from '../exception/errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { WorkflowStorage } from '../storage/workflow-storage.js';
import type { ExecutionResult, RunStatus, StepOutcome, StepStatus } from '../types/step-result.js';
import type { ValueMap } from '../types/value.js';
import {
  bindsResult,
  isControlStep,
  type ControlStep,
  type LoopStep,
  type RetryConfig,
  type Step,
} from '../types/workflow.js';
import { evaluateCondition } from '../workflow/condition.js';
import { validateWorkflow } from '../workflow/validator.js';
import { Environment } from './environment.js';
import { openLoop, type LoopCursor } from './loops.js';
import { PolicyExecutor, type Sleep } from './policy-executor.js';
import { ResultBinder } from './result-binder.js';
import { StepExecutor } from './step-executor.js';

export interface WorkflowRunnerOptions {
  logger?: Logger;
  /** Used for retry delays. */
  sleep?: Sleep;
  defaultRetry?: RetryConfig;
  /** Default `wait_for` timeout, in seconds. */
  waitForTimeout?: number;
}

export interface RunOptions {
  runId?: string;
  /** Applied over the document's own `variables`. */
  variables?: ValueMap;
  /** Limit the returned variables to these names. */
  exportVariables?: string[];
  signal?: AbortSignal;
  onOutcome?: (outcome: StepOutcome) => void;
}

interface OpenControl {
  step: ControlStep;
  path: string;
  startedAt: number;
}

type Frame =
  | { kind: 'sequence'; steps: Step[]; index: number; basePath: string; owner?: OpenControl }
  | { kind: 'loop'; step: LoopStep; cursor: LoopCursor; owner: OpenControl };

interface Termination {
  status: Exclude<RunStatus, 'completed'>;
  error: WorkflowError;
}

interface RunState {
  env: Environment;
  binder: ResultBinder;
  outcomes: StepOutcome[];
  stack: Frame[];
  logger: Logger;
  signal?: AbortSignal;
  onOutcome?: (outcome: StepOutcome) => void;
}

/**
 * Executes a workflow document against a browser driver and storage.
 *
 * The step tree is walked with an explicit frame stack: sequence frames hold
 * a position in a step list, loop frames hold a loop cursor. Bodies of `if`
 * and `loop` steps share the run's single Environment.
 */
export class WorkflowRunner {
  private executor: StepExecutor;
  private policy: PolicyExecutor;
  private logger: Logger;

  constructor(driver: BrowserDriver, storage: WorkflowStorage, options: WorkflowRunnerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.executor = new StepExecutor(driver, storage, { waitForTimeout: options.waitForTimeout });
    this.policy = new PolicyExecutor({
      defaultRetry: options.defaultRetry,
      sleep: options.sleep,
      logger: this.logger,
    });
  }

  /** Validates `document` first; a ValidationError rejects before any step runs. */
  async run(document: unknown, options: RunOptions = {}): Promise<ExecutionResult> {
    const { workflow, warnings } = validateWorkflow(document);
    const runId = options.runId ?? randomUUID();
    const logger = this.logger.child({ runId, workflow: workflow.name });
    const started = Date.now();

    for (const warning of warnings) {
      logger.warn('Workflow warning', { warning });
    }

    const env = new Environment({ ...workflow.variables, ...options.variables });
    const state: RunState = {
      env,
      binder: new ResultBinder(env),
      outcomes: [],
      stack: [{ kind: 'sequence', steps: workflow.steps, index: 0, basePath: 'steps' }],
      logger,
      signal: options.signal,
      onOutcome: options.onOutcome,
    };

    logger.info('Run started', { version: workflow.version, steps: workflow.steps.length });
    const termination = await this.walk(state);
    const status: RunStatus = termination ? termination.status : 'completed';
    const durationMs = Date.now() - started;

    if (termination) {
      logger.error('Run ended early', { status, kind: termination.error.kind, error: termination.error });
    }
    logger.info('Run finished', { status, durationMs, outcomes: state.outcomes.length });

    return {
      runId,
      workflow: workflow.name,
      version: workflow.version,
      status,
      variables: env.snapshot(options.exportVariables),
      outcomes: state.outcomes,
      error: termination?.error.toInfo(),
      startedAt: new Date(started).toISOString(),
      durationMs,
    };
  }

  private async walk(state: RunState): Promise<Termination | undefined> {
    const { stack, env, signal } = state;

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];

      if (frame.kind === 'loop') {
        if (signal?.aborted) return this.cancel(state);
        let more: boolean;
        try {
          more = frame.cursor.next();
        } catch (error) {
          stack.pop();
          const failure = classifyError(error, { step: frame.step.name });
          const termination = this.evaluationFailed(state, frame.step, frame.owner.path, frame.owner.startedAt, failure);
          if (termination) return termination;
          continue;
        }
        if (more) {
          stack.push({ kind: 'sequence', steps: frame.step.steps, index: 0, basePath: `${frame.owner.path}.steps` });
        } else {
          stack.pop();
          state.logger.debug('Loop finished', { step: frame.step.name, iterations: frame.cursor.iterations });
          this.closeControl(state, frame.owner, 'success');
        }
        continue;
      }

      if (frame.index >= frame.steps.length) {
        stack.pop();
        if (frame.owner) this.closeControl(state, frame.owner, 'success');
        continue;
      }

      const step = frame.steps[frame.index];
      const path = `${frame.basePath}[${frame.index}]`;
      frame.index++;

      if (signal?.aborted) return this.cancel(state);
      const startedAt = Date.now();

      if (step.condition) {
        let guard: boolean;
        try {
          guard = evaluateCondition(step.condition, env);
        } catch (error) {
          const termination = this.evaluationFailed(state, step, path, startedAt, classifyError(error, { step: step.name }));
          if (termination) return termination;
          continue;
        }
        if (!guard) {
          this.record(state, { step: step.name, action: step.action, path, status: 'skipped', attempts: 0, durationMs: 0 });
          continue;
        }
      }

      if (isControlStep(step)) {
        const termination = this.enter(state, step, path, startedAt);
        if (termination) return termination;
        continue;
      }

      const result = await this.policy.execute(
        step,
        () => this.executor.prepare(step, env, state.outcomes),
        (prepared) => this.executor.invoke(step, prepared, env),
        signal,
      );

      const outcome: StepOutcome = {
        step: step.name,
        action: step.action,
        path,
        status: result.status,
        attempts: result.attempts,
        durationMs: Date.now() - startedAt,
      };

      if (result.status === 'failed') {
        outcome.error = result.error.toInfo();
        if (result.abort) {
          this.record(state, outcome);
          return signal?.aborted ? this.cancel(state) : this.terminate(state, 'failed', result.error);
        }
      }

      if (bindsResult(step)) {
        outcome.resultKey = state.binder.bind(step, result.value);
        this.record(state, outcome);
        continue;
      }

      this.record(state, outcome);
      if (result.status !== 'failed') {
        state.logger.info('Run stopped', { step: step.name, path, reason: result.value });
        this.closeOpenControls(state, 'success');
        return undefined;
      }
    }

    return undefined;
  }

  private enter(state: RunState, step: ControlStep, path: string, startedAt: number): Termination | undefined {
    const owner: OpenControl = { step, path, startedAt };
    try {
      if (step.action === 'if') {
        const taken = evaluateCondition(step.value, state.env);
        state.stack.push({
          kind: 'sequence',
          steps: taken ? step.steps : (step.else_steps ?? []),
          index: 0,
          basePath: `${path}.${taken ? 'steps' : 'else_steps'}`,
          owner,
        });
      } else {
        const cursor = openLoop(step.value, state.env, {
          onLimit: (limit) => state.logger.warn('Loop stopped at max_iterations', { step: step.name, limit }),
        });
        state.stack.push({ kind: 'loop', step, cursor, owner });
      }
    } catch (error) {
      return this.evaluationFailed(state, step, path, startedAt, classifyError(error, { step: step.name }));
    }
    return undefined;
  }

  /**
   * A guard, `if` condition or loop spec failed to evaluate. Never retried;
   * `continue` records the failure and moves on.
   */
  private evaluationFailed(
    state: RunState,
    step: Step,
    path: string,
    startedAt: number,
    error: WorkflowError,
  ): Termination | undefined {
    const outcome: StepOutcome = {
      step: step.name,
      action: step.action,
      path,
      status: 'failed',
      attempts: 0,
      durationMs: Date.now() - startedAt,
      error: error.toInfo(),
    };

    if (step.on_error !== 'continue') {
      this.record(state, outcome);
      return this.terminate(state, 'failed', error);
    }

    state.logger.warn('Step failed, continuing', { step: step.name, kind: error.kind, error });
    if (bindsResult(step)) {
      outcome.resultKey = state.binder.bind(step, null);
    }
    this.record(state, outcome);
    return undefined;
  }

  private closeControl(state: RunState, owner: OpenControl, status: StepStatus, error?: WorkflowError): void {
    const outcome: StepOutcome = {
      step: owner.step.name,
      action: owner.step.action,
      path: owner.path,
      status,
      attempts: 1,
      durationMs: Date.now() - owner.startedAt,
    };
    if (error) outcome.error = error.toInfo();
    this.record(state, outcome);
  }

  private cancel(state: RunState): Termination {
    return this.terminate(state, 'cancelled', new CancelledError(state.signal?.reason));
  }

  private terminate(state: RunState, status: Termination['status'], error: WorkflowError): Termination {
    this.closeOpenControls(state, 'failed', error);
    return { status, error };
  }

  /** Close every control step still open, innermost first, and empty the stack. */
  private closeOpenControls(state: RunState, status: StepStatus, error?: WorkflowError): void {
    for (let i = state.stack.length - 1; i >= 0; i--) {
      const owner = state.stack[i].owner;
      if (owner) this.closeControl(state, owner, status, error);
    }
    state.stack.length = 0;
  }

  private record(state: RunState, outcome: StepOutcome): void {
    state.outcomes.push(outcome);
    state.logger.debug('Step finished', { ...outcome });
    state.onOutcome?.(outcome);
  }
}
