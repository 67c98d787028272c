import { isDeepStrictEqual } from 'node:util';
import { TypeMismatchError, UnresolvedReferenceError } from '../exception/errors.js';
import { describeValue, isValueMap, type Value } from '../types/value.js';
import { isComparison, type Comparison, type Condition } from '../types/workflow.js';
import type { VariableScope } from './expression.js';
import { resolveValue, stringifyValue } from './template.js';

function toNumber(value: number | string): number | undefined {
  if (typeof value === 'number') return value;
  if (value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function mismatch(operator: string, left: Value, right: Value): TypeMismatchError {
  return new TypeMismatchError(
    `Cannot apply "${operator}" to ${describeValue(left)} and ${describeValue(right)}`,
  );
}

function isEqual(left: Value, right: Value): boolean {
  if (typeof left === 'boolean' || typeof right === 'boolean' || left === null || right === null) {
    return left === right;
  }

  if (typeof left === 'object' || typeof right === 'object') {
    const bothSequences = Array.isArray(left) && Array.isArray(right);
    const bothMappings = isValueMap(left) && isValueMap(right);
    if (bothSequences || bothMappings) return isDeepStrictEqual(left, right);
    throw mismatch('equals', left, right);
  }

  const l = toNumber(left);
  const r = toNumber(right);
  if (l !== undefined && r !== undefined) return l === r;
  return String(left) === String(right);
}

function compareOrder(operator: string, left: Value, right: Value): number {
  const scalar = (v: Value): v is number | string => typeof v === 'number' || typeof v === 'string';
  if (!scalar(left) || !scalar(right)) throw mismatch(operator, left, right);

  const l = toNumber(left);
  const r = toNumber(right);
  if (l !== undefined && r !== undefined) return l - r;

  const a = String(left);
  const b = String(right);
  return a < b ? -1 : a > b ? 1 : 0;
}

function contains(left: Value, right: Value): boolean {
  if (typeof left === 'string') {
    if (right === null || typeof right === 'object') throw mismatch('contains', left, right);
    return left.includes(stringifyValue(right));
  }
  if (Array.isArray(left)) {
    return left.some((item) => isDeepStrictEqual(item, right));
  }
  if (isValueMap(left)) {
    if (typeof right !== 'string') throw mismatch('contains', left, right);
    return Object.prototype.hasOwnProperty.call(left, right);
  }
  throw mismatch('contains', left, right);
}

function textOperands(operator: string, left: Value, right: Value): [string, string] {
  const text = (v: Value): v is number | string => typeof v === 'number' || typeof v === 'string';
  if (!text(left) || !text(right)) throw mismatch(operator, left, right);
  return [String(left), String(right)];
}

function matches(left: Value, right: Value): boolean {
  const [subject, source] = textOperands('matches', left, right);
  let pattern: RegExp;
  try {
    pattern = new RegExp(source);
  } catch {
    throw new TypeMismatchError(`Invalid pattern ${JSON.stringify(source)} for "matches"`);
  }
  return pattern.test(subject);
}

function exists(operand: Value, scope: VariableScope): boolean {
  try {
    return resolveValue(operand, scope) !== null;
  } catch (error) {
    if (error instanceof UnresolvedReferenceError) return false;
    throw error;
  }
}

function compare(comparison: Comparison, scope: VariableScope): boolean {
  const { operator } = comparison;

  if (operator === 'exists') return exists(comparison.left, scope);
  if (operator === 'not_exists') return !exists(comparison.left, scope);

  const left = resolveValue(comparison.left, scope);
  const right = resolveValue(comparison.right ?? null, scope);

  switch (operator) {
    case 'equals':
      return isEqual(left, right);
    case 'not_equals':
      return !isEqual(left, right);
    case 'less_than':
      return compareOrder(operator, left, right) < 0;
    case 'less_than_or_equals':
      return compareOrder(operator, left, right) <= 0;
    case 'greater_than':
      return compareOrder(operator, left, right) > 0;
    case 'greater_than_or_equals':
      return compareOrder(operator, left, right) >= 0;
    case 'contains':
      return contains(left, right);
    case 'not_contains':
      return !contains(left, right);
    case 'starts_with': {
      const [subject, prefix] = textOperands(operator, left, right);
      return subject.startsWith(prefix);
    }
    case 'ends_with': {
      const [subject, suffix] = textOperands(operator, left, right);
      return subject.endsWith(suffix);
    }
    case 'matches':
      return matches(left, right);
  }
}

export function evaluateCondition(condition: Condition, scope: VariableScope): boolean {
  if (isComparison(condition)) return compare(condition, scope);
  if ('all' in condition) return condition.all.every((c) => evaluateCondition(c, scope));
  if ('any' in condition) return condition.any.some((c) => evaluateCondition(c, scope));
  return !evaluateCondition(condition.not, scope);
}

/** Templates referenced by a condition, for validation. */
export function conditionOperands(condition: Condition): Value[] {
  if (isComparison(condition)) {
    return condition.right === undefined ? [condition.left] : [condition.left, condition.right];
  }
  if ('all' in condition) return condition.all.flatMap(conditionOperands);
  if ('any' in condition) return condition.any.flatMap(conditionOperands);
  return conditionOperands(condition.not);
}
