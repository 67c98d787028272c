import type { ZodIssue } from 'zod';
import { ValidationError, WorkflowError } from '../exception/errors.js';
import { deriveResultKey } from '../runner/result-binder.js';
import { isVariableName } from '../runner/step-executor.js';
import { WorkflowSchema } from '../schemas/workflow.schema.js';
import type { Value } from '../types/value.js';
import {
  bindsResult,
  isControlStep,
  type BindingStep,
  type LoopSpec,
  type Step,
  type Workflow,
} from '../types/workflow.js';
import { conditionOperands } from './condition.js';
import { collectTemplates, hasPlaceholders, parseTemplate } from './template.js';

export interface ValidatedWorkflow {
  workflow: Workflow;
  warnings: string[];
}

function formatPath(path: Array<string | number>): string {
  let out = '';
  for (const segment of path) {
    out += typeof segment === 'number' ? `[${segment}]` : out === '' ? segment : `.${segment}`;
  }
  return out || '(root)';
}

function formatIssue(issue: ZodIssue): string {
  return `${formatPath(issue.path)}: ${issue.message}`;
}

/** A literal number, a numeric literal string, or undefined for templates. */
function literalNumber(value: number | string): number | undefined {
  if (typeof value === 'number') return value;
  if (hasPlaceholders(value)) return undefined;
  return value.trim() === '' ? Number.NaN : Number(value);
}

function loopOperands(spec: LoopSpec): Value[] {
  switch (spec.type) {
    case 'while':
      return conditionOperands(spec.condition);
    case 'for':
      return spec.step === undefined ? [spec.start, spec.end] : [spec.start, spec.end, spec.step];
    case 'for_each':
      return [spec.items];
    case 'repeat':
      return [spec.times];
  }
}

function stepOperands(step: Step): Value[] {
  const operands: Value[] = step.condition ? conditionOperands(step.condition) : [];
  switch (step.action) {
    case 'if':
      return [...operands, ...conditionOperands(step.value)];
    case 'loop':
      return [...operands, ...loopOperands(step.value)];
    case 'extract':
      return [...operands, step.selector, ...(step.value ? Object.values(step.value) : [])];
    case 'save':
      return step.data === undefined ? [...operands, step.value] : [...operands, step.value, step.data];
    default:
      if ('selector' in step) operands.push(step.selector);
      if ('value' in step && step.value !== undefined) operands.push(step.value);
      return operands;
  }
}

class WorkflowChecker {
  readonly issues: string[] = [];
  readonly warnings: string[] = [];
  private keys = new Map<string, string>();

  constructor(private declared: ReadonlySet<string>) {}

  checkSteps(steps: Step[], basePath: string): void {
    steps.forEach((step, index) => {
      const path = `${basePath}[${index}]`;
      this.checkStep(step, path);
      if (isControlStep(step)) {
        this.checkSteps(step.steps, `${path}.steps`);
        if (step.action === 'if' && step.else_steps) {
          this.checkSteps(step.else_steps, `${path}.else_steps`);
        }
      }
    });
  }

  private checkStep(step: Step, path: string): void {
    for (const template of stepOperands(step).flatMap(collectTemplates)) {
      try {
        parseTemplate(template);
      } catch (error) {
        if (!(error instanceof WorkflowError)) throw error;
        this.issues.push(`${path}: ${error.message}`);
      }
    }

    if (step.retry && step.on_error !== 'retry') {
      this.warnings.push(`${path}: retry settings have no effect without on_error "retry"`);
    }

    switch (step.action) {
      case 'if':
      case 'loop':
        if (step.on_error === 'retry') {
          this.issues.push(`${path}: on_error "retry" is not allowed on ${step.action} steps`);
        }
        if (step.action === 'loop') this.checkLoop(step.value, path);
        break;
      case 'set_variable':
        if (!hasPlaceholders(step.selector) && !isVariableName(step.selector)) {
          this.issues.push(`${path}.selector: "${step.selector}" is not a valid variable name`);
        }
        break;
      case 'wait':
        if (step.value !== undefined) {
          const seconds = literalNumber(step.value);
          if (seconds !== undefined && !(seconds >= 0)) {
            this.issues.push(`${path}.value: wait duration must be a non-negative number`);
          }
        }
        break;
    }

    if (bindsResult(step)) this.checkResultKey(step, path);
  }

  private checkLoop(spec: LoopSpec, path: string): void {
    if (spec.type === 'for') {
      for (const [field, operand] of [['start', spec.start], ['end', spec.end], ['step', spec.step]] as const) {
        if (operand === undefined) continue;
        const literal = literalNumber(operand);
        if (literal !== undefined && !Number.isFinite(literal)) {
          this.issues.push(`${path}.value.${field}: expected a number or template`);
        }
      }
      if (spec.step !== undefined && literalNumber(spec.step) === 0) {
        this.issues.push(`${path}.value.step: for loop step must not be 0`);
      }
    }
    if (spec.type === 'repeat') {
      const times = literalNumber(spec.times);
      if (times !== undefined && !(Number.isInteger(times) && times >= 0)) {
        this.issues.push(`${path}.value.times: expected a non-negative integer`);
      }
    }
  }

  private checkResultKey(step: BindingStep, path: string): void {
    const key = deriveResultKey(step);
    const previous = this.keys.get(key);
    if (previous !== undefined) {
      this.warnings.push(`${path}: result key "${key}" is also bound by ${previous}; the later value wins`);
    } else {
      this.keys.set(key, path);
    }
    // A set_variable step named after its own target binds the same value twice.
    const selfAssign = step.action === 'set_variable' && step.selector === key;
    if (this.declared.has(key) && !selfAssign) {
      this.warnings.push(`${path}: result key "${key}" shadows workflow variable "${key}"`);
    }
  }
}

/**
 * Parse and check a workflow document. Every problem is collected and
 * reported in one ValidationError; non-fatal findings come back as warnings.
 */
export function validateWorkflow(document: unknown): ValidatedWorkflow {
  const parsed = WorkflowSchema.safeParse(document);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map(formatIssue));
  }

  const workflow = parsed.data;
  const checker = new WorkflowChecker(new Set(Object.keys(workflow.variables ?? {})));
  checker.checkSteps(workflow.steps, 'steps');

  if (checker.issues.length > 0) {
    throw new ValidationError(checker.issues);
  }
  return { workflow, warnings: checker.warnings };
}
