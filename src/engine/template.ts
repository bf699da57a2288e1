/**
 * Template resolution.
 *
 * Expands `{{...}}` placeholders against the run's variable mapping and the
 * store document. Placeholder forms:
 *
 *   {{name}}          current value of a variable
 *   {{vars.a.b}}      nested variable path
 *   {{store.a.b}}     value read from the store document
 *   {{++name}}        increment, then substitute the new value
 *   {{name++}}        substitute, then increment
 *   {{3}} {{true}}    literals
 *
 * Resolution is a single left-to-right pass. Increments mutate `vars` in
 * place, so they are visible to every later placeholder in the same pass
 * and to every later template rendered against the same mapping.
 */

import { templateError, unresolvedVariableError } from '../domain/errors';
import { JsonObject, JsonPrimitive, JsonValue, isJsonObject } from '../domain/json';
import { resolvePath } from '../storage/path-accessor';

const PLACEHOLDER_PATTERN = /\{\{([^{}]+)\}\}/g;
const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export function hasPlaceholders(template: string): boolean {
  return new RegExp(PLACEHOLDER_PATTERN.source).test(template);
}

/** Coerce a bare token into a JSON literal, or undefined if it is not one. */
export function parseLiteral(expr: string): JsonPrimitive | undefined {
  const lowered = expr.trim().toLowerCase();
  if (lowered === 'true') return true;
  if (lowered === 'false') return false;
  if (lowered === 'null' || lowered === 'none') return null;
  if (NUMBER_PATTERN.test(expr.trim())) return Number(expr.trim());
  return undefined;
}

/** String form used when a value is concatenated into a larger template. */
export function stringify(value: JsonValue): string {
  if (value === null) return 'null';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** Split a dotted variable path; empty parts are ignored. */
function variablePath(name: string): string[] {
  return name.split('.').map((part) => part.trim()).filter(Boolean);
}

function lookupVariable(vars: JsonObject, name: string): JsonValue | undefined {
  let current: JsonValue = vars;
  for (const part of variablePath(name)) {
    if (!isJsonObject(current) || !Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

function incrementVariable(vars: JsonObject, rawName: string, post: boolean, template: string): number {
  const trimmed = rawName.trim();
  const name = trimmed.startsWith('vars.') ? trimmed.slice('vars.'.length) : trimmed;
  const parts = variablePath(name);
  if (parts.length === 0) {
    throw templateError(`Invalid variable name for increment in "${template}"`, template);
  }
  let container: JsonValue = vars;
  for (const part of parts.slice(0, -1)) {
    if (!isJsonObject(container) || !Object.prototype.hasOwnProperty.call(container, part)) {
      throw unresolvedVariableError(name, template);
    }
    container = container[part];
  }
  const key = parts[parts.length - 1];
  if (!isJsonObject(container) || !Object.prototype.hasOwnProperty.call(container, key)) {
    throw unresolvedVariableError(name, template);
  }
  const current = container[key];
  if (typeof current !== 'number') {
    throw templateError(`Variable "${name}" must be numeric to increment, found ${stringify(current)}`, template);
  }
  container[key] = current + 1;
  return post ? current : current + 1;
}

function evaluatePlaceholder(
  rawExpr: string,
  vars: JsonObject,
  store: JsonObject,
  template: string,
): JsonValue {
  const expr = rawExpr.trim();
  if (!expr) {
    throw templateError(`Empty placeholder in "${template}"`, template);
  }

  if (expr.startsWith('++')) {
    return incrementVariable(vars, expr.slice(2), false, template);
  }
  if (expr.endsWith('++')) {
    return incrementVariable(vars, expr.slice(0, -2), true, template);
  }

  if (expr.startsWith('vars.')) {
    const value = lookupVariable(vars, expr.slice('vars.'.length));
    if (value === undefined) throw unresolvedVariableError(expr, template);
    return value;
  }

  if (expr.startsWith('store.')) {
    const value = resolvePath(store, expr.slice('store.'.length));
    if (value === undefined) throw unresolvedVariableError(expr, template);
    return value;
  }

  if (Object.prototype.hasOwnProperty.call(vars, expr)) {
    return vars[expr];
  }

  const literal = parseLiteral(expr);
  if (literal !== undefined) return literal;

  throw unresolvedVariableError(expr, template);
}

/**
 * Render a single template string.
 *
 * A template that is exactly one placeholder (surrounding whitespace
 * ignored) yields the placeholder's typed value; anything else yields a
 * string. Templates without placeholders come back unchanged.
 */
export function renderString(template: string, vars: JsonObject, store: JsonObject): JsonValue {
  const matches = [...template.matchAll(PLACEHOLDER_PATTERN)];
  if (matches.length === 0) return template;

  let rendered = '';
  let cursor = 0;
  let lastValue: JsonValue = null;
  for (const match of matches) {
    const start = match.index ?? 0;
    rendered += template.slice(cursor, start);
    lastValue = evaluatePlaceholder(match[1], vars, store, template);
    rendered += stringify(lastValue);
    cursor = start + match[0].length;
  }
  rendered += template.slice(cursor);

  if (matches.length === 1) {
    const only = matches[0];
    const start = only.index ?? 0;
    const prefix = template.slice(0, start).trim();
    const suffix = template.slice(start + only[0].length).trim();
    if (!prefix && !suffix) return lastValue;
  }
  return rendered;
}

/** Render placeholders inside nested arrays and objects. */
export function renderValue(value: JsonValue, vars: JsonObject, store: JsonObject): JsonValue {
  if (typeof value === 'string') return renderString(value, vars, store);
  if (Array.isArray(value)) return value.map((item) => renderValue(item, vars, store));
  if (isJsonObject(value)) {
    const result: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = renderValue(item, vars, store);
    }
    return result;
  }
  return value;
}

/**
 * Render a template whose result is used as a store path. Non-string
 * results (say, a lone numeric placeholder) are converted with stringify.
 */
export function renderPath(template: string, vars: JsonObject, store: JsonObject): string {
  return stringify(renderString(template, vars, store));
}
