import { TemplateSyntaxError, TypeMismatchError } from '../exception/errors.js';
import { describeValue, isValueMap, type Value, type ValueMap } from '../types/value.js';
import { evaluateExpression, parseExpression, type Expression, type VariableScope } from './expression.js';

type Segment = { kind: 'text'; text: string } | { kind: 'expression'; expression: Expression };

export interface ParsedTemplate {
  source: string;
  segments: Segment[];
}

const OPEN = '{{';
const CLOSE = '}}';
const CACHE_LIMIT = 1000;
const cache = new Map<string, ParsedTemplate>();

export function hasPlaceholders(source: string): boolean {
  return source.includes(OPEN);
}

export function parseTemplate(source: string): ParsedTemplate {
  const cached = cache.get(source);
  if (cached) return cached;

  const segments: Segment[] = [];
  let cursor = 0;

  while (cursor < source.length) {
    const open = source.indexOf(OPEN, cursor);
    if (open === -1) {
      segments.push({ kind: 'text', text: source.slice(cursor) });
      break;
    }
    if (open > cursor) {
      segments.push({ kind: 'text', text: source.slice(cursor, open) });
    }

    const close = source.indexOf(CLOSE, open + OPEN.length);
    if (close === -1) {
      throw new TemplateSyntaxError(source, `unterminated placeholder at ${open}`);
    }

    const body = source.slice(open + OPEN.length, close);
    if (body.trim() === '') {
      throw new TemplateSyntaxError(source, `empty placeholder at ${open}`);
    }
    if (body.includes(OPEN)) {
      throw new TemplateSyntaxError(source, `nested placeholder at ${open}`);
    }

    segments.push({ kind: 'expression', expression: parseExpression(body, source) });
    cursor = close + CLOSE.length;
  }

  const parsed = { source, segments };
  if (cache.size >= CACHE_LIMIT) cache.clear();
  cache.set(source, parsed);
  return parsed;
}

export function stringifyValue(value: Value): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Resolve a template string.
 * A string that is exactly one placeholder yields the typed value it refers
 * to; anything else yields a string. Strings without placeholders come back
 * unchanged.
 */
export function resolveTemplate(source: string, scope: VariableScope): Value {
  if (!hasPlaceholders(source)) return source;

  const { segments } = parseTemplate(source);
  if (segments.length === 1 && segments[0].kind === 'expression') {
    return evaluateExpression(segments[0].expression, scope);
  }

  return segments
    .map((segment) =>
      segment.kind === 'text' ? segment.text : stringifyValue(evaluateExpression(segment.expression, scope)),
    )
    .join('');
}

/** Like resolveTemplate, but always produces text (URLs, selectors, paths). */
export function interpolate(source: string, scope: VariableScope): string {
  return stringifyValue(resolveTemplate(source, scope));
}

/** Resolve a number-or-template field; numeric strings are accepted. */
export function resolveNumber(source: number | string, scope: VariableScope, label: string): number {
  if (typeof source === 'number') return source;
  const resolved = resolveTemplate(source, scope);
  if (typeof resolved === 'number') return resolved;
  if (typeof resolved === 'string' && resolved.trim() !== '') {
    const parsed = Number(resolved);
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new TypeMismatchError(`${label} must be a number, got ${describeValue(resolved)} ${stringifyValue(resolved)}`);
}

export function resolveValue(value: Value, scope: VariableScope): Value {
  if (typeof value === 'string') {
    return resolveTemplate(value, scope);
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveValue(item, scope));
  }
  if (isValueMap(value)) {
    const result: ValueMap = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = resolveValue(v, scope);
    }
    return result;
  }
  return value;
}

/** Every template string inside a value, depth first. */
export function collectTemplates(value: Value | undefined): string[] {
  if (typeof value === 'string') return hasPlaceholders(value) ? [value] : [];
  if (Array.isArray(value)) return value.flatMap((item) => collectTemplates(item));
  if (value !== null && value !== undefined && isValueMap(value)) {
    return Object.values(value).flatMap((item) => collectTemplates(item));
  }
  return [];
}
