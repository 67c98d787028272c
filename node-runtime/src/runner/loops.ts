import { TypeMismatchError } from '../exception/errors.js';
import { describeValue, type Value } from '../types/value.js';
import type { ForEachLoop, ForLoop, LoopSpec, RepeatLoop, WhileLoop } from '../types/workflow.js';
import { evaluateCondition } from '../workflow/condition.js';
import { resolveNumber, resolveValue } from '../workflow/template.js';
import type { Environment } from './environment.js';

/**
 * Drives one loop step. `next()` runs before every iteration: it binds the
 * iteration variable and returns false once the loop is finished.
 */
export interface LoopCursor {
  readonly iterations: number;
  next(): boolean;
}

export interface LoopHooks {
  /** Called when a while loop stops at its `max_iterations` cap. */
  onLimit?: (limit: number) => void;
}

class WhileCursor implements LoopCursor {
  iterations = 0;

  constructor(
    private spec: WhileLoop,
    private env: Environment,
    private hooks: LoopHooks,
  ) {}

  next(): boolean {
    const limit = this.spec.max_iterations;
    if (limit !== undefined && this.iterations >= limit) {
      this.hooks.onLimit?.(limit);
      return false;
    }
    if (!evaluateCondition(this.spec.condition, this.env)) return false;
    this.iterations++;
    return true;
  }
}

class RangeCursor implements LoopCursor {
  iterations = 0;
  private current: number;

  constructor(
    private env: Environment,
    private variable: string | undefined,
    start: number,
    private end: number,
    private step: number,
  ) {
    this.current = start;
  }

  next(): boolean {
    const inRange = this.step > 0 ? this.current <= this.end : this.current >= this.end;
    if (!inRange) return false;
    if (this.variable !== undefined) this.env.set(this.variable, this.current);
    this.current += this.step;
    this.iterations++;
    return true;
  }
}

class SequenceCursor implements LoopCursor {
  iterations = 0;

  constructor(
    private env: Environment,
    private variable: string,
    private items: readonly Value[],
  ) {}

  next(): boolean {
    if (this.iterations >= this.items.length) return false;
    this.env.set(this.variable, this.items[this.iterations]);
    this.iterations++;
    return true;
  }
}

function openFor(spec: ForLoop, env: Environment): LoopCursor {
  const start = resolveNumber(spec.start, env, 'for loop start');
  const end = resolveNumber(spec.end, env, 'for loop end');
  const step = spec.step === undefined ? 1 : resolveNumber(spec.step, env, 'for loop step');
  if (step === 0) {
    throw new TypeMismatchError('for loop step must not be 0');
  }
  return new RangeCursor(env, spec.variable, start, end, step);
}

function openForEach(spec: ForEachLoop, env: Environment): LoopCursor {
  const items = resolveValue(spec.items, env);
  if (!Array.isArray(items)) {
    throw new TypeMismatchError(`for_each items must be a sequence, got ${describeValue(items)}`);
  }
  return new SequenceCursor(env, spec.variable, items);
}

function openRepeat(spec: RepeatLoop, env: Environment): LoopCursor {
  const times = resolveNumber(spec.times, env, 'repeat times');
  if (!Number.isInteger(times) || times < 0) {
    throw new TypeMismatchError(`repeat times must be a non-negative integer, got ${times}`);
  }
  return new RangeCursor(env, spec.variable, 1, times, 1);
}

/**
 * Resolve a loop spec's operands and return its cursor. Operands are
 * resolved once, here; only while conditions are re-evaluated per iteration.
 */
export function openLoop(spec: LoopSpec, env: Environment, hooks: LoopHooks = {}): LoopCursor {
  switch (spec.type) {
    case 'while':
      return new WhileCursor(spec, env, hooks);
    case 'for':
      return openFor(spec, env);
    case 'for_each':
      return openForEach(spec, env);
    case 'repeat':
      return openRepeat(spec, env);
  }
}
