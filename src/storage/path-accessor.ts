/**
 * Dotted-path access into the store document.
 *
 * Paths look like `results.evaluation_2.score` or `history[0].code`
 * (equivalently `history.0.code`). A segment made only of digits is an
 * index: writes require a list there, reads also accept an object key.
 */

import { isEngineError, pathError } from '../domain/errors';
import { JsonObject, JsonValue, deepCopy, isJsonObject } from '../domain/json';

export interface PathSegment {
  key: string;
  /** Set when the segment is a list index. */
  index?: number;
}

const SEGMENT_PATTERN = /^([^[\]]*)((?:\[\d+\])*)$/;
const INDEX_PATTERN = /^\d+$/;
const FORBIDDEN_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

function toSegment(key: string): PathSegment {
  return INDEX_PATTERN.test(key) ? { key, index: Number(key) } : { key };
}

/** Split a path into segments. Empty dotted parts are ignored. */
export function parsePath(path: string): PathSegment[] {
  const segments: PathSegment[] = [];
  for (const rawPart of path.split('.')) {
    const part = rawPart.trim();
    if (!part) continue;
    const match = SEGMENT_PATTERN.exec(part);
    if (!match) {
      throw pathError(path, `malformed segment "${part}"`);
    }
    const [, name, brackets] = match;
    if (name) segments.push(toSegment(name.trim()));
    for (const indexMatch of brackets.matchAll(/\[(\d+)\]/g)) {
      segments.push(toSegment(indexMatch[1]));
    }
  }
  if (segments.length === 0) {
    throw pathError(path, 'path is empty');
  }
  return segments;
}

function readChild(container: JsonValue, segment: PathSegment): JsonValue | undefined {
  if (Array.isArray(container)) {
    return segment.index === undefined ? undefined : container[segment.index];
  }
  if (isJsonObject(container) && Object.prototype.hasOwnProperty.call(container, segment.key)) {
    return container[segment.key];
  }
  return undefined;
}

/**
 * Resolve a path against a document.
 * Returns undefined when any segment is missing; never throws for absence.
 */
export function resolvePath(doc: JsonValue, path: string): JsonValue | undefined {
  let current: JsonValue | undefined = doc;
  for (const segment of parsePath(path)) {
    if (current === undefined || current === null) return undefined;
    current = readChild(current, segment);
  }
  return current;
}

/**
 * Resolve a string that may or may not be a path. Strings that do not parse
 * as a path resolve to undefined instead of raising a PathError.
 */
export function tryResolvePath(doc: JsonValue, candidate: string): JsonValue | undefined {
  try {
    return resolvePath(doc, candidate);
  } catch (err) {
    if (isEngineError(err) && err.kind === 'PathError') return undefined;
    throw err;
  }
}

/** True when the path holds a value other than null. */
export function hasValue(doc: JsonValue, path: string): boolean {
  const value = resolvePath(doc, path);
  return value !== undefined && value !== null;
}

type Container = JsonObject | JsonValue[];

function isContainer(value: JsonValue | undefined): value is Container {
  return Array.isArray(value) || isJsonObject(value);
}

function assertSegmentFits(container: Container, segment: PathSegment, path: string): void {
  if (segment.index !== undefined && !Array.isArray(container)) {
    throw pathError(path, `numeric segment "${segment.key}" indexes a non-list`);
  }
  if (segment.index === undefined && Array.isArray(container)) {
    throw pathError(path, `named segment "${segment.key}" used on a list`);
  }
}

function setChild(container: Container, segment: PathSegment, value: JsonValue): void {
  if (Array.isArray(container)) {
    const index = segment.index ?? 0;
    while (container.length < index) container.push(null);
    container[index] = value;
    return;
  }
  container[segment.key] = value;
}

/**
 * Walk to the parent of the path's last segment, creating objects for named
 * segments and lists for numeric ones along the way.
 */
function ensureParent(doc: JsonObject, path: string): { parent: Container; leaf: PathSegment } {
  const segments = parsePath(path);
  const forbidden = segments.find((segment) => FORBIDDEN_KEYS.has(segment.key));
  if (forbidden) {
    throw pathError(path, `segment "${forbidden.key}" cannot be written`);
  }
  let current: Container = doc;
  for (let i = 0; i < segments.length - 1; i++) {
    const segment = segments[i];
    assertSegmentFits(current, segment, path);
    const child = readChild(current, segment);
    if (child === undefined || child === null) {
      const created: Container = segments[i + 1].index !== undefined ? [] : {};
      setChild(current, segment, created);
      current = created;
    } else if (isContainer(child)) {
      current = child;
    } else {
      throw pathError(path, `segment "${segment.key}" holds a ${typeof child}, not a container`);
    }
  }
  const leaf = segments[segments.length - 1];
  assertSegmentFits(current, leaf, path);
  return { parent: current, leaf };
}

/** Write a copy of `value` at `path`, overwriting any existing leaf. */
export function writePath(doc: JsonObject, path: string, value: JsonValue): void {
  const { parent, leaf } = ensureParent(doc, path);
  setChild(parent, leaf, deepCopy(value));
}

export interface OutputMetadata {
  createdAt: string;
  /** Provenance entries: output name → resolved reference string. */
  provenance?: Record<string, string>;
}

/**
 * Write a node output and annotate it.
 *
 * Objects receive `created_at` and provenance keys in place (existing keys
 * win). Other values get a `<leaf>_metadata` sibling object instead; a
 * value written into a list has nowhere to put one and is left bare.
 */
export function writeWithMetadata(
  doc: JsonObject,
  path: string,
  value: JsonValue,
  metadata: OutputMetadata,
): void {
  const { parent, leaf } = ensureParent(doc, path);
  const stored = deepCopy(value);
  setChild(parent, leaf, stored);

  const annotations: JsonObject = { created_at: metadata.createdAt, ...metadata.provenance };
  if (isJsonObject(stored)) {
    for (const [key, annotation] of Object.entries(annotations)) {
      if (!(key in stored)) stored[key] = annotation;
    }
  } else if (!Array.isArray(parent)) {
    parent[`${leaf.key}_metadata`] = annotations;
  }
}
