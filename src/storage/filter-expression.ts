/**
 * Filter expression evaluator.
 *
 * Parses the backend filter grammar the filter builder emits and compiles it
 * into a predicate over an item's attributes, so the in-memory store answers
 * queries the same way the remote store does.
 *
 * Grammar:
 *   expr       := or
 *   or         := and (OR and)*
 *   and        := not (AND not)*
 *   not        := NOT not | primary
 *   primary    := '(' expr ')' | call | comparison
 *   call       := exists(attr) | contains(attr, str) | starts(attr, str) | ends(attr, str)
 *   comparison := operand (== | != | > | >= | < | <=) operand
 *   operand    := attr | 'str' | "str" | number | true | false
 *
 * A comparison involving a missing attribute is false.
 */

import { AttributeMap, AttributeValue } from '../domain/document';

export type FilterPredicate = (attributes: AttributeMap) => boolean;

export class FilterSyntaxError extends Error {
  constructor(message: string, public position: number) {
    super(`${message} at position ${position}`);
    this.name = 'FilterSyntaxError';
  }
}

type Token =
  | { type: 'ident'; value: string; pos: number }
  | { type: 'string'; value: string; pos: number }
  | { type: 'number'; value: number | bigint; pos: number }
  | { type: 'op'; value: string; pos: number }
  | { type: 'punct'; value: '(' | ')' | ','; pos: number };

type Operand =
  | { kind: 'attribute'; name: string }
  | { kind: 'literal'; value: string | number | bigint | boolean };

const COMPARISON_OPS = ['==', '!=', '>=', '<=', '>', '<'];
const FUNCTIONS = new Set(['exists', 'contains', 'starts', 'ends']);

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < input.length) {
    const char = input[i];
    if (/\s/.test(char)) {
      i++;
    } else if (char === '(' || char === ')' || char === ',') {
      tokens.push({ type: 'punct', value: char, pos: i });
      i++;
    } else if (char === "'" || char === '"') {
      const start = i;
      let value = '';
      i++;
      while (i < input.length && input[i] !== char) {
        if (input[i] === '\\' && i + 1 < input.length) i++;
        value += input[i];
        i++;
      }
      if (i >= input.length) throw new FilterSyntaxError('Unterminated string', start);
      i++;
      tokens.push({ type: 'string', value, pos: start });
    } else if (/[-\d]/.test(char)) {
      const match = /^-?\d+(\.\d+)?/.exec(input.slice(i));
      if (!match) throw new FilterSyntaxError(`Unexpected "${char}"`, i);
      const text = match[0];
      tokens.push({ type: 'number', value: match[1] ? Number(text) : BigInt(text), pos: i });
      i += text.length;
    } else if (/[A-Za-z_]/.test(char)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(input.slice(i));
      const text = match ? match[0] : char;
      tokens.push({ type: 'ident', value: text, pos: i });
      i += text.length;
    } else {
      const op = COMPARISON_OPS.find((candidate) => input.startsWith(candidate, i));
      if (!op) throw new FilterSyntaxError(`Unexpected "${char}"`, i);
      tokens.push({ type: 'op', value: op, pos: i });
      i += op.length;
    }
  }
  return tokens;
}

function isNumeric(value: AttributeValue | undefined): value is number | bigint {
  return typeof value === 'number' || typeof value === 'bigint';
}

/** -1, 0, 1 across number and bigint; NaN for non-comparable floats. */
function compareNumeric(a: number | bigint, b: number | bigint): number {
  if (typeof a === 'bigint' && typeof b === 'bigint') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : a > b ? 1 : a === b ? 0 : NaN;
  const big = typeof a === 'bigint' ? a : b;
  const num = typeof a === 'number' ? a : b;
  let result: number;
  if (Number.isInteger(num)) {
    const asBig = BigInt(num);
    result = big < asBig ? -1 : big > asBig ? 1 : 0;
  } else {
    const asNum = Number(big);
    result = asNum < num ? -1 : asNum > num ? 1 : 0;
  }
  return typeof a === 'bigint' ? result : -result;
}

function compare(left: AttributeValue | undefined, right: AttributeValue | undefined, op: string): boolean {
  if (left === undefined || right === undefined) return false;

  let order: number;
  if (isNumeric(left) && isNumeric(right)) {
    order = compareNumeric(left, right);
  } else if (typeof left === 'string' && typeof right === 'string') {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else if (typeof left === 'boolean' && typeof right === 'boolean') {
    if (op !== '==' && op !== '!=') return false;
    order = left === right ? 0 : 1;
  } else {
    // mismatched kinds are never equal and never ordered
    return op === '!=';
  }

  switch (op) {
    case '==':
      return order === 0;
    case '!=':
      return order !== 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
    default:
      return false;
  }
}

/** Compile a filter expression. An empty expression matches every item. */
export function compileFilter(expression: string | undefined): FilterPredicate {
  if (!expression || expression.trim() === '') {
    return () => true;
  }

  const tokens = tokenize(expression);
  let pos = 0;

  function current(): Token | undefined {
    return tokens[pos];
  }

  function position(): number {
    return current()?.pos ?? expression?.length ?? 0;
  }

  function isKeyword(word: string): boolean {
    const token = current();
    return token?.type === 'ident' && token.value.toUpperCase() === word;
  }

  function expectPunct(value: '(' | ')' | ','): void {
    const token = current();
    if (token?.type !== 'punct' || token.value !== value) {
      throw new FilterSyntaxError(`Expected "${value}"`, position());
    }
    pos++;
  }

  function parseOr(): FilterPredicate {
    let left = parseAnd();
    while (isKeyword('OR')) {
      pos++;
      const right = parseAnd();
      const prevLeft = left;
      left = (attrs) => prevLeft(attrs) || right(attrs);
    }
    return left;
  }

  function parseAnd(): FilterPredicate {
    let left = parseNot();
    while (isKeyword('AND')) {
      pos++;
      const right = parseNot();
      const prevLeft = left;
      left = (attrs) => prevLeft(attrs) && right(attrs);
    }
    return left;
  }

  function parseNot(): FilterPredicate {
    if (isKeyword('NOT')) {
      pos++;
      const inner = parseNot();
      return (attrs) => !inner(attrs);
    }
    return parsePrimary();
  }

  function parsePrimary(): FilterPredicate {
    const token = current();
    if (token?.type === 'punct' && token.value === '(') {
      pos++;
      const inner = parseOr();
      expectPunct(')');
      return inner;
    }
    const next = tokens[pos + 1];
    if (token?.type === 'ident' && FUNCTIONS.has(token.value) && next?.type === 'punct' && next.value === '(') {
      return parseCall(token.value);
    }
    return parseComparison();
  }

  function parseAttributeName(): string {
    const token = current();
    if (token?.type !== 'ident') throw new FilterSyntaxError('Expected attribute name', position());
    pos++;
    return token.value;
  }

  function parseStringLiteral(): string {
    const token = current();
    if (token?.type !== 'string') throw new FilterSyntaxError('Expected string literal', position());
    pos++;
    return token.value;
  }

  function parseCall(name: string): FilterPredicate {
    pos += 2;
    const attribute = parseAttributeName();
    if (name === 'exists') {
      expectPunct(')');
      return (attrs) => Object.prototype.hasOwnProperty.call(attrs, attribute);
    }
    expectPunct(',');
    const needle = parseStringLiteral();
    expectPunct(')');
    return (attrs) => {
      const value = attrs[attribute];
      if (typeof value !== 'string') return false;
      if (name === 'contains') return value.includes(needle);
      if (name === 'starts') return value.startsWith(needle);
      return value.endsWith(needle);
    };
  }

  function parseOperand(): Operand {
    const token = current();
    if (!token) throw new FilterSyntaxError('Unexpected end of expression', position());
    pos++;
    switch (token.type) {
      case 'string':
        return { kind: 'literal', value: token.value };
      case 'number':
        return { kind: 'literal', value: token.value };
      case 'ident':
        if (token.value === 'true') return { kind: 'literal', value: true };
        if (token.value === 'false') return { kind: 'literal', value: false };
        return { kind: 'attribute', name: token.value };
      default:
        throw new FilterSyntaxError(`Unexpected "${token.value}"`, token.pos);
    }
  }

  function parseComparison(): FilterPredicate {
    const left = parseOperand();
    const token = current();
    if (token?.type !== 'op') throw new FilterSyntaxError('Expected comparison operator', position());
    pos++;
    const op = token.value;
    const right = parseOperand();
    const resolve = (operand: Operand, attrs: AttributeMap): AttributeValue | undefined =>
      operand.kind === 'literal'
        ? operand.value
        : Object.prototype.hasOwnProperty.call(attrs, operand.name) ? attrs[operand.name] : undefined;
    return (attrs) => compare(resolve(left, attrs), resolve(right, attrs), op);
  }

  const predicate = parseOr();
  if (pos < tokens.length) {
    throw new FilterSyntaxError('Unexpected trailing input', position());
  }
  return predicate;
}
