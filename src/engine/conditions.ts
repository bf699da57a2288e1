/**
 * Conditional node evaluation.
 *
 * Branches are tried strictly in list order; the first match wins and later
 * branches are never evaluated. With no match the node's `else` target is
 * taken. Conditional nodes never write: templates render against a scratch
 * copy of the variables, so even an increment inside a branch is dropped.
 */

import { JsonObject, JsonValue, deepCopy, isJsonObject } from '../domain/json';
import { Branch, ComparatorOp, ConditionalNode } from '../domain/workflow';
import { tryResolvePath } from '../storage/path-accessor';
import { createBindings, evaluateScript } from './expression';
import { parseLiteral, renderString, stringify } from './template';

export interface ConditionalOutcome {
  target: string;
  /** Index of the matching branch; undefined when `else` was taken. */
  branchIndex?: number;
}

function lookupVariablePath(vars: JsonObject, path: string): JsonValue | undefined {
  const parts = path.split('.').map((part) => part.trim()).filter(Boolean);
  if (parts.length === 0) return undefined;
  let current: JsonValue = vars;
  for (const part of parts) {
    if (!isJsonObject(current) || !Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Turn a rendered branch operand into a value: a variable path, then a
 * store path, then a literal, and finally the string itself.
 */
export function resolveOperand(rendered: JsonValue, vars: JsonObject, store: JsonObject): JsonValue {
  if (typeof rendered !== 'string') return rendered;

  const variable = rendered.startsWith('vars.') ? rendered.slice('vars.'.length) : rendered;
  const fromVars = lookupVariablePath(vars, variable);
  if (fromVars !== undefined) return fromVars;

  const fromStore = tryResolvePath(store, rendered);
  if (fromStore !== undefined) return fromStore;

  const literal = parseLiteral(rendered);
  return literal !== undefined ? literal : rendered;
}

function toNumber(value: JsonValue): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const literal = parseLiteral(value);
    if (typeof literal === 'number') return literal;
  }
  return undefined;
}

function toBoolean(value: JsonValue): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const literal = parseLiteral(value);
    if (typeof literal === 'boolean') return literal;
  }
  return undefined;
}

function applyNumeric(op: ComparatorOp, a: number, b: number): boolean {
  switch (op) {
    case '==': return a === b;
    case '!=': return a !== b;
    case '>': return a > b;
    case '>=': return a >= b;
    case '<': return a < b;
    case '<=': return a <= b;
  }
}

function applyString(op: ComparatorOp, a: string, b: string): boolean {
  switch (op) {
    case '==': return a === b;
    case '!=': return a !== b;
    case '>': return a > b;
    case '>=': return a >= b;
    case '<': return a < b;
    case '<=': return a <= b;
  }
}

/**
 * Compare two operands, coercing both to the richer type present: numbers
 * when either side is (or parses as) a number, then booleans, then strings.
 */
export function compareValues(op: ComparatorOp, left: JsonValue, right: JsonValue): boolean {
  const leftNumber = toNumber(left);
  const rightNumber = toNumber(right);
  if (leftNumber !== undefined || rightNumber !== undefined) {
    return applyNumeric(op, leftNumber ?? Number.NaN, rightNumber ?? Number.NaN);
  }

  if (typeof left === 'boolean' || typeof right === 'boolean') {
    const leftBool = toBoolean(left);
    const rightBool = toBoolean(right);
    if (leftBool === undefined || rightBool === undefined) return op === '!=';
    return applyNumeric(op, Number(leftBool), Number(rightBool));
  }

  return applyString(op, stringify(left), stringify(right));
}

function branchValue(branch: Branch, vars: JsonObject, store: JsonObject): JsonValue {
  if (branch.value === undefined) return null;
  return resolveOperand(renderString(branch.value, vars, store), vars, store);
}

export function branchMatches(branch: Branch, vars: JsonObject, store: JsonObject): boolean {
  const { condition } = branch;
  if (!condition) return true;

  const value = branchValue(branch, vars, store);
  if (condition.kind === 'script') {
    const source = stringify(renderString(condition.expression, vars, store));
    return evaluateScript(source, createBindings(value, vars, store));
  }

  const compareTo = resolveOperand(renderString(condition.compareTo, vars, store), vars, store);
  return compareValues(condition.op, value, compareTo);
}

/** Pick the next node id (or END) for a conditional node. */
export function evaluateConditionalNode(
  node: ConditionalNode,
  vars: JsonObject,
  store: JsonObject,
): ConditionalOutcome {
  const scratch = deepCopy(vars);
  for (let i = 0; i < node.branches.length; i++) {
    const branch = node.branches[i];
    if (branchMatches(branch, scratch, store)) {
      return { target: branch.goto, branchIndex: i };
    }
  }
  return { target: node.else };
}
