export type Value = null | boolean | number | string | Value[] | ValueMap;

export interface ValueMap {
  [key: string]: Value;
}

export function isValueMap(value: Value): value is ValueMap {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function describeValue(value: Value): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'sequence';
  if (typeof value === 'object') return 'mapping';
  return typeof value;
}

/**
 * Coerce whatever a collaborator hands back into a Value.
 * undefined and non-finite numbers become null, dates become ISO strings,
 * and other objects are reduced to their enumerable own properties.
 */
export function toValue(input: unknown): Value {
  if (input === null || input === undefined) return null;

  switch (typeof input) {
    case 'string':
    case 'boolean':
      return input;
    case 'number':
      return Number.isFinite(input) ? input : null;
    case 'bigint':
      return Number(input);
    case 'object':
      break;
    default:
      return null;
  }

  if (input instanceof Date) return input.toISOString();
  if (Array.isArray(input)) return input.map((item) => toValue(item));
  if (Buffer.isBuffer(input)) return input.toString('base64');

  const result: ValueMap = {};
  for (const [key, item] of Object.entries(input)) {
    if (item === undefined || typeof item === 'function') continue;
    result[key] = toValue(item);
  }
  return result;
}
