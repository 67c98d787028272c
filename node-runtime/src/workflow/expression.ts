import { TemplateSyntaxError, TypeMismatchError, UnresolvedReferenceError } from '../exception/errors.js';
import { describeValue, isValueMap, type Value } from '../types/value.js';

/** Read access to variables; `get` throws UnresolvedReferenceError for unbound names. */
export interface VariableScope {
  has(name: string): boolean;
  get(name: string): Value;
}

type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';

export type Expression =
  | { type: 'literal'; value: Value }
  | { type: 'path'; root: string; segments: Array<string | number> }
  | { type: 'negate'; operand: Expression }
  | { type: 'binary'; operator: ArithmeticOperator; left: Expression; right: Expression };

type Token =
  | { kind: 'number'; value: number; at: number }
  | { kind: 'string'; value: string; at: number }
  | { kind: 'ident'; value: string; at: number }
  | { kind: 'punct'; value: string; at: number };

const PUNCTUATION = new Set(['.', '[', ']', '(', ')', '+', '-', '*', '/', '%']);
const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;
const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r' };

function tokenize(source: string, fail: (detail: string) => never): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (DIGIT.test(ch)) {
      const start = i;
      while (i < source.length && DIGIT.test(source[i])) i++;
      // After a dot only integer segments are allowed: `rows.0.name`.
      const afterDot = tokens.length > 0 && tokens[tokens.length - 1].value === '.';
      if (!afterDot && source[i] === '.' && DIGIT.test(source[i + 1] ?? '')) {
        i++;
        while (i < source.length && DIGIT.test(source[i])) i++;
      }
      tokens.push({ kind: 'number', value: Number(source.slice(start, i)), at: start });
      continue;
    }

    if (IDENT_START.test(ch)) {
      const start = i;
      while (i < source.length && IDENT_PART.test(source[i])) i++;
      tokens.push({ kind: 'ident', value: source.slice(start, i), at: start });
      continue;
    }

    if (ch === '"' || ch === "'") {
      const start = i;
      let text = '';
      i++;
      while (i < source.length && source[i] !== ch) {
        if (source[i] === '\\' && i + 1 < source.length) {
          const next = source[i + 1];
          text += ESCAPES[next] ?? next;
          i += 2;
        } else {
          text += source[i];
          i++;
        }
      }
      if (i >= source.length) fail(`unterminated string starting at ${start}`);
      i++;
      tokens.push({ kind: 'string', value: text, at: start });
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      tokens.push({ kind: 'punct', value: ch, at: i });
      i++;
      continue;
    }

    fail(`unexpected character "${ch}" at ${i}`);
  }

  return tokens;
}

class Parser {
  private pos = 0;

  constructor(
    private tokens: Token[],
    private fail: (detail: string) => never,
  ) {}

  parse(): Expression {
    if (this.tokens.length === 0) this.fail('empty expression');
    const expression = this.additive();
    const rest = this.peek();
    if (rest) this.fail(`unexpected "${rest.value}" at ${rest.at}`);
    return expression;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private next(): Token {
    const token = this.tokens[this.pos];
    if (!token) this.fail('unexpected end of expression');
    this.pos++;
    return token;
  }

  private matchPunct<T extends string>(...values: T[]): T | null {
    const token = this.peek();
    if (token?.kind !== 'punct') return null;
    const found = values.find((value) => value === token.value);
    if (found === undefined) return null;
    this.pos++;
    return found;
  }

  private expectPunct(value: string): void {
    const token = this.next();
    if (token.kind !== 'punct' || token.value !== value) {
      this.fail(`expected "${value}" at ${token.at}`);
    }
  }

  private additive(): Expression {
    let left = this.term();
    let op = this.matchPunct('+', '-');
    while (op) {
      left = { type: 'binary', operator: op, left, right: this.term() };
      op = this.matchPunct('+', '-');
    }
    return left;
  }

  private term(): Expression {
    let left = this.unary();
    let op = this.matchPunct('*', '/', '%');
    while (op) {
      left = { type: 'binary', operator: op, left, right: this.unary() };
      op = this.matchPunct('*', '/', '%');
    }
    return left;
  }

  private unary(): Expression {
    if (this.matchPunct('-')) {
      return { type: 'negate', operand: this.unary() };
    }
    return this.primary();
  }

  private primary(): Expression {
    const token = this.next();

    switch (token.kind) {
      case 'number':
      case 'string':
        return { type: 'literal', value: token.value };
      case 'ident':
        if (token.value === 'true') return { type: 'literal', value: true };
        if (token.value === 'false') return { type: 'literal', value: false };
        if (token.value === 'null') return { type: 'literal', value: null };
        return this.path(token.value);
      case 'punct':
        if (token.value === '(') {
          const inner = this.additive();
          this.expectPunct(')');
          return inner;
        }
        return this.fail(`unexpected "${token.value}" at ${token.at}`);
    }
  }

  private path(root: string): Expression {
    const segments: Array<string | number> = [];

    for (;;) {
      if (this.matchPunct('.')) {
        const token = this.next();
        if (token.kind === 'ident') {
          segments.push(token.value);
        } else if (token.kind === 'number' && Number.isInteger(token.value)) {
          segments.push(token.value);
        } else {
          this.fail(`expected a property name after "." at ${token.at}`);
        }
      } else if (this.matchPunct('[')) {
        const token = this.next();
        if (token.kind === 'string' || (token.kind === 'number' && Number.isInteger(token.value))) {
          segments.push(token.value);
        } else {
          this.fail(`expected an index or quoted key at ${token.at}`);
        }
        this.expectPunct(']');
      } else {
        return { type: 'path', root, segments };
      }
    }
  }
}

/**
 * Parse the body of a `{{ ... }}` placeholder. `template` is only used to
 * give errors some context.
 */
export function parseExpression(source: string, template: string = source): Expression {
  const fail = (detail: string): never => {
    throw new TemplateSyntaxError(template, detail);
  };
  return new Parser(tokenize(source, fail), fail).parse();
}

function formatPath(root: string, segments: Array<string | number>): string {
  return segments.reduce<string>((acc, seg) => {
    if (typeof seg === 'number') return `${acc}[${seg}]`;
    return IDENT_START.test(seg[0] ?? '') && [...seg].every((c) => IDENT_PART.test(c))
      ? `${acc}.${seg}`
      : `${acc}[${JSON.stringify(seg)}]`;
  }, root);
}

function readSegment(target: Value, segment: string | number, reference: string): Value {
  // A null along the path reads as a missing value.
  if (target === null) throw new UnresolvedReferenceError(reference);

  if (Array.isArray(target)) {
    if (segment === 'length') return target.length;
    const index = typeof segment === 'number' ? segment : Number.NaN;
    if (Number.isInteger(index) && index >= 0 && index < target.length) return target[index];
    throw new UnresolvedReferenceError(reference);
  }

  if (isValueMap(target)) {
    const key = String(segment);
    if (Object.prototype.hasOwnProperty.call(target, key)) return target[key];
    throw new UnresolvedReferenceError(reference);
  }

  if (typeof target === 'string' && segment === 'length') return target.length;

  throw new TypeMismatchError(`Cannot read "${segment}" of ${describeValue(target)} in "${reference}"`);
}

const OPERATIONS: Record<ArithmeticOperator, (a: number, b: number) => number> = {
  '+': (a, b) => a + b,
  '-': (a, b) => a - b,
  '*': (a, b) => a * b,
  '/': (a, b) => a / b,
  '%': (a, b) => a % b,
};

function arithmetic(operator: ArithmeticOperator, left: Value, right: Value): Value {
  if (operator === '+' && (typeof left === 'string' || typeof right === 'string')) {
    const concatenable = (v: Value) => typeof v === 'string' || typeof v === 'number';
    if (concatenable(left) && concatenable(right)) return `${left}${right}`;
  }

  if (typeof left !== 'number' || typeof right !== 'number') {
    throw new TypeMismatchError(
      `Operator "${operator}" cannot be applied to ${describeValue(left)} and ${describeValue(right)}`,
    );
  }

  if ((operator === '/' || operator === '%') && right === 0) {
    throw new TypeMismatchError('Division by zero');
  }

  const result = OPERATIONS[operator](left, right);
  if (!Number.isFinite(result)) {
    throw new TypeMismatchError(`Arithmetic result is not a finite number: ${left} ${operator} ${right}`);
  }
  return result;
}

export function evaluateExpression(expression: Expression, scope: VariableScope): Value {
  switch (expression.type) {
    case 'literal':
      return expression.value;

    case 'path': {
      let current = scope.get(expression.root);
      for (let i = 0; i < expression.segments.length; i++) {
        const reference = formatPath(expression.root, expression.segments.slice(0, i + 1));
        current = readSegment(current, expression.segments[i], reference);
      }
      return current;
    }

    case 'negate': {
      const operand = evaluateExpression(expression.operand, scope);
      if (typeof operand !== 'number') {
        throw new TypeMismatchError(`Cannot negate ${describeValue(operand)}`);
      }
      return -operand;
    }

    case 'binary':
      return arithmetic(
        expression.operator,
        evaluateExpression(expression.left, scope),
        evaluateExpression(expression.right, scope),
      );
  }
}
