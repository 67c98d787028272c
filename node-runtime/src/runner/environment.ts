import { TypeMismatchError, UnresolvedReferenceError } from '../exception/errors.js';
import { describeValue, type Value, type ValueMap } from '../types/value.js';
import type { VariableScope } from '../workflow/expression.js';

/**
 * The variable store threaded through one workflow execution.
 * Stored values are never mutated in place; writers replace them.
 */
export class Environment implements VariableScope {
  private values = new Map<string, Value>();

  constructor(seed: ValueMap = {}) {
    for (const [name, value] of Object.entries(seed)) {
      this.values.set(name, value);
    }
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): Value {
    const value = this.values.get(name);
    if (value === undefined) throw new UnresolvedReferenceError(name);
    return value;
  }

  set(name: string, value: Value): void {
    this.values.set(name, value);
  }

  /** Append to the sequence held by `name`, starting one when unbound. */
  append(name: string, value: Value): Value[] {
    const current = this.values.get(name);
    if (current === undefined) {
      const created = [value];
      this.values.set(name, created);
      return created;
    }
    if (!Array.isArray(current)) {
      throw new TypeMismatchError(`Cannot append to "${name}": it holds a ${describeValue(current)}, not a sequence`);
    }
    const next = [...current, value];
    this.values.set(name, next);
    return next;
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  /** Deep copy of the bound variables, optionally limited to `names`. */
  snapshot(names?: string[]): ValueMap {
    const result: ValueMap = {};
    const selected = names ?? this.names();
    for (const name of selected) {
      const value = this.values.get(name);
      if (value !== undefined) result[name] = structuredClone(value);
    }
    return result;
  }
}
