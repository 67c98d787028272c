import type { BrowserDriver, FieldMap } from '../engines/browser-driver.js';
import { classifyError } from '../exception/classifier.js';
import { StepTimeoutError, TypeMismatchError } from '../exception/errors.js';
import type { WorkflowStorage } from '../storage/workflow-storage.js';
import type { StepOutcome } from '../types/step-result.js';
import { toValue, type Value } from '../types/value.js';
import type { LeafStep } from '../types/workflow.js';
import { interpolate, resolveNumber, resolveValue } from '../workflow/template.js';
import type { Environment } from './environment.js';

/** A leaf step with every template resolved, ready to dispatch. */
export type PreparedStep =
  | { action: 'navigate'; url: string }
  | { action: 'click'; selector: string }
  | { action: 'hover'; selector: string }
  | { action: 'type'; selector: string; text: string }
  | { action: 'wait'; seconds: number }
  | { action: 'wait_for'; selector: string; timeoutSeconds: number }
  | { action: 'extract'; selector: string; fields?: FieldMap }
  | { action: 'get_text'; selector: string }
  | { action: 'get_attribute'; selector: string; attribute: string }
  | { action: 'evaluate'; script: string }
  | { action: 'execute_script'; script: string }
  | { action: 'screenshot'; path: string }
  | { action: 'save'; path: string; data: Value }
  | { action: 'load'; path: string }
  | { action: 'set_variable'; variable: string; value: Value; append: boolean }
  | { action: 'set_input_files'; selector: string; paths: string[] }
  | { action: 'stop'; reason: string | null };

export interface StepExecutorOptions {
  /** Default `wait_for` timeout, in seconds. */
  waitForTimeout?: number;
}

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const DEFAULT_WAIT_SECONDS = 1;
const DEFAULT_SCREENSHOT = 'screenshot.png';

export function isVariableName(name: string): boolean {
  return VARIABLE_NAME.test(name);
}

/** Race `work` against the step's timeout. The underlying call is not interrupted. */
export async function withTimeout<T>(work: Promise<T>, seconds: number, stepName: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new StepTimeoutError(`Step "${stepName}" timed out after ${seconds}s`));
    }, seconds * 1000);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class StepExecutor {
  private waitForTimeout: number;

  constructor(
    private driver: BrowserDriver,
    private storage: WorkflowStorage,
    options: StepExecutorOptions = {},
  ) {
    this.waitForTimeout = options.waitForTimeout ?? 30;
  }

  /**
   * Resolve a step's templates against the environment. Throws the
   * resolver's errors as-is; they are never worth retrying.
   */
  prepare(step: LeafStep, env: Environment, outcomes: readonly StepOutcome[]): PreparedStep {
    switch (step.action) {
      case 'navigate':
        return { action: 'navigate', url: interpolate(step.value, env) };
      case 'click':
      case 'hover':
      case 'get_text':
        return { action: step.action, selector: interpolate(step.selector, env) };
      case 'type':
        return {
          action: 'type',
          selector: interpolate(step.selector, env),
          text: typeof step.value === 'string' ? interpolate(step.value, env) : String(step.value),
        };
      case 'wait': {
        const seconds = resolveNumber(step.value ?? DEFAULT_WAIT_SECONDS, env, 'wait duration');
        if (seconds < 0) throw new TypeMismatchError(`wait duration must not be negative, got ${seconds}`);
        return { action: 'wait', seconds };
      }
      case 'wait_for':
        return {
          action: 'wait_for',
          selector: interpolate(step.selector, env),
          timeoutSeconds: step.timeout ?? this.waitForTimeout,
        };
      case 'extract':
        return {
          action: 'extract',
          selector: interpolate(step.selector, env),
          fields: step.value === undefined ? undefined : resolveFields(step.value, env),
        };
      case 'get_attribute':
        return {
          action: 'get_attribute',
          selector: interpolate(step.selector, env),
          attribute: interpolate(step.value, env),
        };
      case 'evaluate':
      case 'execute_script':
        return { action: step.action, script: interpolate(step.value, env) };
      case 'screenshot':
        return { action: 'screenshot', path: interpolate(step.value ?? DEFAULT_SCREENSHOT, env) };
      case 'save':
        return {
          action: 'save',
          path: interpolate(step.value, env),
          data: step.data === undefined ? toValue(outcomes) : resolveValue(step.data, env),
        };
      case 'load':
        return { action: 'load', path: interpolate(step.value, env) };
      case 'set_variable': {
        const variable = interpolate(step.selector, env);
        if (!isVariableName(variable)) {
          throw new TypeMismatchError(`"${variable}" is not a valid variable name`);
        }
        return { action: 'set_variable', variable, value: resolveValue(step.value, env), append: step.append ?? false };
      }
      case 'set_input_files': {
        const paths = typeof step.value === 'string' ? [step.value] : step.value;
        return {
          action: 'set_input_files',
          selector: interpolate(step.selector, env),
          paths: paths.map((path) => interpolate(path, env)),
        };
      }
      case 'stop':
        return { action: 'stop', reason: step.value === undefined ? null : interpolate(step.value, env) };
    }
  }

  /** Perform one attempt of a prepared step and return the value to bind. */
  async invoke(step: LeafStep, prepared: PreparedStep, env: Environment): Promise<Value> {
    const work = this.dispatch(prepared, env);
    try {
      return step.timeout === undefined ? await work : await withTimeout(work, step.timeout, step.name);
    } catch (error) {
      throw classifyError(error, { step: step.name, selector: 'selector' in prepared ? prepared.selector : undefined });
    }
  }

  private async dispatch(prepared: PreparedStep, env: Environment): Promise<Value> {
    switch (prepared.action) {
      case 'navigate':
        await this.driver.navigate(prepared.url);
        return prepared.url;
      case 'click':
        await this.driver.click(prepared.selector);
        return true;
      case 'hover':
        await this.driver.hover(prepared.selector);
        return true;
      case 'type':
        await this.driver.type(prepared.selector, prepared.text);
        return prepared.text;
      case 'wait':
        await this.driver.wait(prepared.seconds);
        return prepared.seconds;
      case 'wait_for':
        await this.driver.waitFor(prepared.selector, prepared.timeoutSeconds);
        return true;
      case 'extract':
        return toValue(await this.driver.extract(prepared.selector, prepared.fields));
      case 'get_text':
        return toValue(await this.driver.getText(prepared.selector));
      case 'get_attribute':
        return toValue(await this.driver.getAttribute(prepared.selector, prepared.attribute));
      case 'evaluate':
        return toValue(await this.driver.evaluate(prepared.script));
      case 'execute_script':
        return toValue(await this.driver.executeScript(prepared.script));
      case 'screenshot':
        await this.driver.screenshot(prepared.path);
        return prepared.path;
      case 'save':
        await this.storage.save(prepared.path, prepared.data);
        return prepared.path;
      case 'load':
        return this.storage.load(prepared.path);
      case 'set_variable':
        // The bound result is what the variable now holds.
        if (prepared.append) {
          return env.append(prepared.variable, prepared.value);
        }
        env.set(prepared.variable, prepared.value);
        return prepared.value;
      case 'set_input_files':
        await this.driver.setInputFiles(prepared.selector, prepared.paths);
        return true;
      case 'stop':
        return prepared.reason;
    }
  }
}

function resolveFields(fields: FieldMap, env: Environment): FieldMap {
  const resolved: FieldMap = {};
  for (const [name, spec] of Object.entries(fields)) {
    resolved[name] = interpolate(spec, env);
  }
  return resolved;
}
