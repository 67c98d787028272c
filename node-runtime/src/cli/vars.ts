import { InvalidArgumentError } from 'commander';
import { isVariableName } from '../runner/step-executor.js';
import { toValue, type Value, type ValueMap } from '../types/value.js';

/** JSON when the text parses as JSON, the raw text otherwise. */
export function parseVarValue(raw: string): Value {
  try {
    const parsed: unknown = JSON.parse(raw);
    return toValue(parsed);
  } catch (error) {
    if (error instanceof SyntaxError) return raw;
    throw error;
  }
}

/** Collect repeated `--var name=value` options into a ValueMap. */
export function collectVar(assignment: string, previous: ValueMap = {}): ValueMap {
  const eq = assignment.indexOf('=');
  if (eq <= 0) {
    throw new InvalidArgumentError(`Expected name=value, got "${assignment}"`);
  }
  const name = assignment.slice(0, eq).trim();
  if (!isVariableName(name)) {
    throw new InvalidArgumentError(`"${name}" is not a valid variable name`);
  }
  return { ...previous, [name]: parseVarValue(assignment.slice(eq + 1)) };
}

export function parseNameList(list: string): string[] {
  return list
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name !== '');
}
