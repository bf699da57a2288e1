/**
 * Scripted branch conditions.
 *
 * A deliberately small expression language evaluated over three read-only
 * bindings: `value` (the branch's resolved value), `vars` and `store`.
 *
 *   value >= 0.9 and vars.iteration < 5
 *   len(store.results.findings) == 0 or not store.results.passed
 *   'error' in value
 *
 * There is no assignment, no user-defined function and no access to
 * anything outside the bindings; a handful of builtins cover counting and
 * numeric clamping.
 */

import { conditionError } from '../domain/errors';
import {
  JsonValue,
  JsonObject,
  ReadonlyJsonObject,
  ReadonlyJsonValue,
  deepCopy,
  deepFreeze,
} from '../domain/json';

// ─── Tokenizer ────────────────────────────────────────────────────────────────

type TokenType = 'NUMBER' | 'STRING' | 'IDENT' | 'OP' | 'LPAREN' | 'RPAREN' | 'LBRACKET' | 'RBRACKET' | 'DOT' | 'COMMA' | 'EOF';

interface Token {
  type: TokenType;
  value: string;
  pos: number;
}

const TWO_CHAR_OPS = ['==', '!=', '<=', '>=', '&&', '||'];
const ONE_CHAR_OPS = ['<', '>', '+', '-', '*', '/', '%', '!'];
const PUNCTUATION: Record<string, TokenType> = {
  '(': 'LPAREN',
  ')': 'RPAREN',
  '[': 'LBRACKET',
  ']': 'RBRACKET',
  '.': 'DOT',
  ',': 'COMMA',
};

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];
    if (/\s/.test(ch)) { i++; continue; }

    const pos = i;

    if (/\d/.test(ch) || (ch === '.' && /\d/.test(source[i + 1] ?? ''))) {
      const match = /^(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?/.exec(source.slice(i));
      const text = match ? match[0] : ch;
      tokens.push({ type: 'NUMBER', value: text, pos });
      i += text.length;
      continue;
    }

    if (ch === '"' || ch === "'") {
      let str = '';
      i++;
      while (i < source.length && source[i] !== ch) {
        if (source[i] === '\\' && i + 1 < source.length) {
          i++;
          const escapes: Record<string, string> = { n: '\n', t: '\t', '\\': '\\', '"': '"', "'": "'" };
          str += escapes[source[i]] ?? source[i];
        } else {
          str += source[i];
        }
        i++;
      }
      if (i >= source.length) {
        throw conditionError(`Unterminated string starting at position ${pos}`, { source });
      }
      i++;
      tokens.push({ type: 'STRING', value: str, pos });
      continue;
    }

    if (/[A-Za-z_]/.test(ch)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(i));
      const text = match ? match[0] : ch;
      tokens.push({ type: 'IDENT', value: text, pos });
      i += text.length;
      continue;
    }

    const pair = source.slice(i, i + 2);
    if (TWO_CHAR_OPS.includes(pair)) {
      tokens.push({ type: 'OP', value: pair, pos });
      i += 2;
      continue;
    }
    if (ONE_CHAR_OPS.includes(ch)) {
      tokens.push({ type: 'OP', value: ch, pos });
      i++;
      continue;
    }
    const punct = PUNCTUATION[ch];
    if (punct) {
      tokens.push({ type: punct, value: ch, pos });
      i++;
      continue;
    }

    throw conditionError(`Unexpected character "${ch}" at position ${pos}`, { source });
  }

  tokens.push({ type: 'EOF', value: '', pos: source.length });
  return tokens;
}

// ─── AST ──────────────────────────────────────────────────────────────────────

type CompareOp = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in' | 'not in';
type ArithmeticOp = '+' | '-' | '*' | '/' | '%';

export type Expression =
  | { type: 'literal'; value: JsonValue }
  | { type: 'identifier'; name: string }
  | { type: 'member'; object: Expression; key: Expression }
  | { type: 'call'; callee: string; args: Expression[] }
  | { type: 'array'; items: Expression[] }
  | { type: 'not'; operand: Expression }
  | { type: 'negate'; operand: Expression }
  | { type: 'arithmetic'; op: ArithmeticOp; left: Expression; right: Expression }
  | { type: 'compare'; ops: CompareOp[]; operands: Expression[] }
  | { type: 'logical'; op: 'and' | 'or'; left: Expression; right: Expression };

const BINDINGS = new Set(['value', 'vars', 'store']);
const KEYWORD_LITERALS: Record<string, JsonValue> = {
  true: true,
  false: false,
  null: null,
  True: true,
  False: false,
  None: null,
};

// ─── Parser ───────────────────────────────────────────────────────────────────

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[], private readonly source: string) {}

  parse(): Expression {
    const expr = this.parseOr();
    if (this.peek().type !== 'EOF') {
      this.fail(`Unexpected "${this.peek().value}"`);
    }
    return expr;
  }

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    this.pos++;
    return token;
  }

  private isWord(word: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.type === 'IDENT' && token.value === word;
  }

  private isOp(...ops: string[]): boolean {
    const token = this.peek();
    return token.type === 'OP' && ops.includes(token.value);
  }

  private expect(type: TokenType, what: string): Token {
    const token = this.peek();
    if (token.type !== type) {
      this.fail(`Expected ${what} but found "${token.value || 'end of expression'}"`);
    }
    return this.next();
  }

  private fail(message: string): never {
    throw conditionError(`${message} at position ${this.peek().pos} in "${this.source}"`, {
      source: this.source,
    });
  }

  private parseOr(): Expression {
    let left = this.parseAnd();
    while (this.isWord('or') || this.isOp('||')) {
      this.next();
      left = { type: 'logical', op: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseNot();
    while (this.isWord('and') || this.isOp('&&')) {
      this.next();
      left = { type: 'logical', op: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): Expression {
    if (this.isWord('not')) {
      this.next();
      return { type: 'not', operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private readCompareOp(): CompareOp | undefined {
    const token = this.peek();
    if (token.type === 'OP' && ['==', '!=', '<', '<=', '>', '>='].includes(token.value)) {
      this.next();
      switch (token.value) {
        case '==': return '==';
        case '!=': return '!=';
        case '<': return '<';
        case '<=': return '<=';
        case '>': return '>';
        default: return '>=';
      }
    }
    if (this.isWord('in')) {
      this.next();
      return 'in';
    }
    if (this.isWord('not') && this.isWord('in', 1)) {
      this.pos += 2;
      return 'not in';
    }
    return undefined;
  }

  /** Comparisons chain: `a < b <= c` means `a < b and b <= c`. */
  private parseComparison(): Expression {
    const first = this.parseAdditive();
    const ops: CompareOp[] = [];
    const operands: Expression[] = [first];
    let op = this.readCompareOp();
    while (op) {
      ops.push(op);
      operands.push(this.parseAdditive());
      op = this.readCompareOp();
    }
    return ops.length === 0 ? first : { type: 'compare', ops, operands };
  }

  private parseAdditive(): Expression {
    let left = this.parseMultiplicative();
    while (this.isOp('+', '-')) {
      const op = this.next().value === '+' ? '+' : '-';
      left = { type: 'arithmetic', op, left, right: this.parseMultiplicative() };
    }
    return left;
  }

  private parseMultiplicative(): Expression {
    let left = this.parseUnary();
    while (this.isOp('*', '/', '%')) {
      const symbol = this.next().value;
      const op: ArithmeticOp = symbol === '*' ? '*' : symbol === '/' ? '/' : '%';
      left = { type: 'arithmetic', op, left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): Expression {
    if (this.isOp('-')) {
      this.next();
      return { type: 'negate', operand: this.parseUnary() };
    }
    if (this.isOp('!')) {
      this.next();
      return { type: 'not', operand: this.parseUnary() };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): Expression {
    let expr = this.parsePrimary();
    for (;;) {
      if (this.peek().type === 'DOT') {
        this.next();
        const name = this.expect('IDENT', 'a member name');
        expr = { type: 'member', object: expr, key: { type: 'literal', value: name.value } };
      } else if (this.peek().type === 'LBRACKET') {
        this.next();
        const key = this.parseOr();
        this.expect('RBRACKET', '"]"');
        expr = { type: 'member', object: expr, key };
      } else {
        return expr;
      }
    }
  }

  private parseList(close: TokenType, closeText: string): Expression[] {
    const items: Expression[] = [];
    if (this.peek().type === close) {
      this.next();
      return items;
    }
    for (;;) {
      items.push(this.parseOr());
      if (this.peek().type === 'COMMA') {
        this.next();
        continue;
      }
      this.expect(close, closeText);
      return items;
    }
  }

  private parsePrimary(): Expression {
    const token = this.peek();
    switch (token.type) {
      case 'NUMBER':
        this.next();
        return { type: 'literal', value: Number(token.value) };
      case 'STRING':
        this.next();
        return { type: 'literal', value: token.value };
      case 'LPAREN': {
        this.next();
        const inner = this.parseOr();
        this.expect('RPAREN', '")"');
        return inner;
      }
      case 'LBRACKET':
        this.next();
        return { type: 'array', items: this.parseList('RBRACKET', '"]"') };
      case 'IDENT': {
        this.next();
        if (Object.prototype.hasOwnProperty.call(KEYWORD_LITERALS, token.value)) {
          return { type: 'literal', value: KEYWORD_LITERALS[token.value] };
        }
        if (this.peek().type === 'LPAREN') {
          this.next();
          return { type: 'call', callee: token.value, args: this.parseList('RPAREN', '")"') };
        }
        return { type: 'identifier', name: token.value };
      }
      default:
        return this.fail(`Unexpected "${token.value || 'end of expression'}"`);
    }
  }
}

/** Parse an expression; throws a ConditionError on malformed input. */
export function parseExpression(source: string): Expression {
  if (!source.trim()) {
    throw conditionError('Expression is empty', { source });
  }
  return new Parser(tokenize(source), source).parse();
}

// ─── Evaluation ───────────────────────────────────────────────────────────────

export interface ExpressionBindings {
  value: ReadonlyJsonValue;
  vars: ReadonlyJsonObject;
  store: ReadonlyJsonObject;
}

const NUMERIC_STRING = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/** Numeric strings become numbers; everything else is returned as-is. */
export function coerceNumeric(value: JsonValue): JsonValue {
  if (typeof value === 'string' && NUMERIC_STRING.test(value.trim())) {
    return Number(value.trim());
  }
  return value;
}

/**
 * Build frozen, detached bindings. `value` and top-level variables that
 * hold numeric strings are coerced to numbers.
 */
export function createBindings(value: JsonValue, vars: JsonObject, store: JsonObject): ExpressionBindings {
  const coercedVars: JsonObject = {};
  for (const [key, item] of Object.entries(vars)) {
    coercedVars[key] = coerceNumeric(deepCopy(item));
  }
  return {
    value: deepFreeze(coerceNumeric(deepCopy(value))),
    vars: deepFreeze(coercedVars),
    store: deepFreeze(deepCopy(store)),
  };
}

export function isTruthy(value: ReadonlyJsonValue): boolean {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') return value.length > 0;
  if (isReadonlyArray(value)) return value.length > 0;
  return Object.keys(value).length > 0;
}

function isReadonlyArray(value: ReadonlyJsonValue): value is readonly ReadonlyJsonValue[] {
  return Array.isArray(value);
}

function typeName(value: ReadonlyJsonValue): string {
  if (value === null) return 'null';
  if (isReadonlyArray(value)) return 'list';
  return typeof value;
}

function deepEqual(a: ReadonlyJsonValue, b: ReadonlyJsonValue): boolean {
  if (a === b) return true;
  if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object') return false;
  if (isReadonlyArray(a) || isReadonlyArray(b)) {
    if (!isReadonlyArray(a) || !isReadonlyArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && deepEqual(a[key], b[key]));
}

function fromOrdering(op: CompareOp, ordering: number): boolean {
  switch (op) {
    case '<': return ordering < 0;
    case '<=': return ordering <= 0;
    case '>': return ordering > 0;
    default: return ordering >= 0;
  }
}

function compareOrdered(op: CompareOp, left: ReadonlyJsonValue, right: ReadonlyJsonValue): boolean {
  if (typeof left === 'number' && typeof right === 'number') {
    return fromOrdering(op, left - right);
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return fromOrdering(op, left < right ? -1 : left > right ? 1 : 0);
  }
  throw conditionError(`Cannot compare ${typeName(left)} ${op} ${typeName(right)}`);
}

function contains(container: ReadonlyJsonValue, item: ReadonlyJsonValue): boolean {
  if (typeof container === 'string') {
    if (typeof item !== 'string') {
      throw conditionError(`"in <string>" requires a string on the left, got ${typeName(item)}`);
    }
    return container.includes(item);
  }
  if (container !== null && isReadonlyArray(container)) {
    return container.some((candidate) => deepEqual(candidate, item));
  }
  if (container !== null && typeof container === 'object') {
    return typeof item === 'string' && Object.prototype.hasOwnProperty.call(container, item);
  }
  throw conditionError(`Right side of "in" must be a string, list or object, got ${typeName(container)}`);
}

function compare(op: CompareOp, left: ReadonlyJsonValue, right: ReadonlyJsonValue): boolean {
  switch (op) {
    case '==': return deepEqual(left, right);
    case '!=': return !deepEqual(left, right);
    case 'in': return contains(right, left);
    case 'not in': return !contains(right, left);
    default: return compareOrdered(op, left, right);
  }
}

function requireNumber(value: ReadonlyJsonValue, context: string): number {
  if (typeof value !== 'number') {
    throw conditionError(`${context} requires a number, got ${typeName(value)}`);
  }
  return value;
}

function arithmetic(op: ArithmeticOp, left: ReadonlyJsonValue, right: ReadonlyJsonValue): ReadonlyJsonValue {
  if (op === '+') {
    if (typeof left === 'string' && typeof right === 'string') return left + right;
    if (left !== null && right !== null && isReadonlyArray(left) && isReadonlyArray(right)) {
      return [...left, ...right];
    }
  }
  const a = requireNumber(left, `"${op}"`);
  const b = requireNumber(right, `"${op}"`);
  switch (op) {
    case '+': return a + b;
    case '-': return a - b;
    case '*': return a * b;
    case '/':
      if (b === 0) throw conditionError('Division by zero');
      return a / b;
    default:
      if (b === 0) throw conditionError('Modulo by zero');
      // Result takes the sign of the divisor.
      return a - b * Math.floor(a / b);
  }
}

function numericArgs(name: string, args: ReadonlyJsonValue[]): number[] {
  const [first] = args;
  const values = args.length === 1 && first !== null && isReadonlyArray(first) ? first : args;
  if (values.length === 0) {
    throw conditionError(`${name}() needs at least one value`);
  }
  return values.map((value) => requireNumber(value, `${name}()`));
}

function callBuiltin(name: string, args: ReadonlyJsonValue[]): ReadonlyJsonValue {
  switch (name) {
    case 'len': {
      const [subject] = args;
      if (args.length !== 1) throw conditionError('len() takes exactly one argument');
      if (typeof subject === 'string') return subject.length;
      if (subject !== null && isReadonlyArray(subject)) return subject.length;
      if (subject !== null && typeof subject === 'object') return Object.keys(subject).length;
      throw conditionError(`len() of ${typeName(subject)}`);
    }
    case 'abs':
      if (args.length !== 1) throw conditionError('abs() takes exactly one argument');
      return Math.abs(requireNumber(args[0], 'abs()'));
    case 'min':
      return Math.min(...numericArgs('min', args));
    case 'max':
      return Math.max(...numericArgs('max', args));
    case 'round': {
      const subject = requireNumber(args[0] ?? null, 'round()');
      const digits = args.length > 1 ? requireNumber(args[1], 'round() digits') : 0;
      const factor = 10 ** digits;
      return Math.round(subject * factor) / factor;
    }
    default:
      throw conditionError(`Unknown function "${name}"`);
  }
}

function member(object: ReadonlyJsonValue, key: ReadonlyJsonValue): ReadonlyJsonValue {
  if (object === null) return null;
  if (isReadonlyArray(object)) {
    if (typeof key !== 'number' || !Number.isInteger(key)) {
      throw conditionError(`List index must be an integer, got ${typeName(key)}`);
    }
    const index = key < 0 ? object.length + key : key;
    return object[index] ?? null;
  }
  if (typeof object === 'object') {
    if (typeof key !== 'string' && typeof key !== 'number') {
      throw conditionError(`Object key must be a string, got ${typeName(key)}`);
    }
    const name = String(key);
    return Object.prototype.hasOwnProperty.call(object, name) ? object[name] : null;
  }
  if (typeof object === 'string' && typeof key === 'number' && Number.isInteger(key)) {
    return object.charAt(key < 0 ? object.length + key : key) || null;
  }
  throw conditionError(`Cannot read "${String(key)}" of ${typeName(object)}`);
}

export function evaluateExpression(expr: Expression, bindings: ExpressionBindings): ReadonlyJsonValue {
  switch (expr.type) {
    case 'literal':
      return expr.value;
    case 'identifier':
      if (!BINDINGS.has(expr.name)) {
        throw conditionError(`Unknown name "${expr.name}"; only value, vars and store are available`);
      }
      return expr.name === 'value' ? bindings.value : expr.name === 'vars' ? bindings.vars : bindings.store;
    case 'member':
      return member(evaluateExpression(expr.object, bindings), evaluateExpression(expr.key, bindings));
    case 'call':
      return callBuiltin(expr.callee, expr.args.map((arg) => evaluateExpression(arg, bindings)));
    case 'array':
      return expr.items.map((item) => evaluateExpression(item, bindings));
    case 'not':
      return !isTruthy(evaluateExpression(expr.operand, bindings));
    case 'negate':
      return -requireNumber(evaluateExpression(expr.operand, bindings), 'Unary "-"');
    case 'arithmetic':
      return arithmetic(expr.op, evaluateExpression(expr.left, bindings), evaluateExpression(expr.right, bindings));
    case 'compare': {
      let left = evaluateExpression(expr.operands[0], bindings);
      for (let i = 0; i < expr.ops.length; i++) {
        const right = evaluateExpression(expr.operands[i + 1], bindings);
        if (!compare(expr.ops[i], left, right)) return false;
        left = right;
      }
      return true;
    }
    case 'logical': {
      const left = evaluateExpression(expr.left, bindings);
      if (expr.op === 'and') return isTruthy(left) ? evaluateExpression(expr.right, bindings) : left;
      return isTruthy(left) ? left : evaluateExpression(expr.right, bindings);
    }
  }
}

/** Parse and evaluate an expression, coercing the result by truthiness. */
export function evaluateScript(source: string, bindings: ExpressionBindings): boolean {
  return isTruthy(evaluateExpression(parseExpression(source), bindings));
}
