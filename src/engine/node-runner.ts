/**
 * Node runner: executes a single execute node against the loaded store.
 *
 * Order of operations for a node that runs:
 *   1. render `inputs` (increments apply), dereferencing store paths
 *   2. call the capability with a frozen snapshot of the store
 *   3. check the result covers every required output
 *   4. render `outputs` in declared order and write them
 *
 * A node whose primary output already holds a value is skipped instead.
 * Its templates are still rendered against the live variable mapping, so
 * increments and `vars.*` outputs replay exactly as on the first run.
 *
 * Everything mutates the `vars` and `store` objects handed in; the caller
 * decides whether to flush them.
 */

import { capabilityError, describeError, isEngineError } from '../domain/errors';
import { JsonObject, JsonValue, deepCopy, deepFreeze, isJsonObject, isJsonValue } from '../domain/json';
import { ExecuteNode } from '../domain/workflow';
import { Logger, logger as rootLogger } from '../logger';
import { hasValue, tryResolvePath, writePath, writeWithMetadata } from '../storage/path-accessor';
import { CapabilityRegistry } from './capability';
import { renderPath, renderString, stringify } from './template';

const VARS_PREFIX = 'vars.';

export interface NodeRunnerOptions {
  registry: CapabilityRegistry;
  /** Output-name suffix marking a provenance output. */
  provenanceSuffix: string;
  /** Timestamp source for `created_at`; defaults to the wall clock. */
  now?: () => string;
  logger?: Logger;
}

export interface ExecuteOutcome {
  action: 'executed' | 'skipped';
  /** Store paths written, in write order. */
  written: string[];
}

interface RenderedOutputs {
  /** Value outputs: output name → destination path. */
  destinations: Array<{ name: string; path: string }>;
  /** Provenance outputs: output name → resolved reference string. */
  provenance: Record<string, string>;
}

export function isVariableOutput(name: string): boolean {
  return name.startsWith(VARS_PREFIX);
}

export function isProvenanceOutput(name: string, suffix: string): boolean {
  return !isVariableOutput(name) && name.endsWith(suffix);
}

/** Outputs the capability itself must return. */
export function requiredOutputKeys(node: ExecuteNode, suffix: string): string[] {
  return Object.keys(node.outputs).filter(
    (name) => !isVariableOutput(name) && !isProvenanceOutput(name, suffix),
  );
}

/** `result` when declared, otherwise the first value output. */
export function primaryOutputName(node: ExecuteNode, suffix: string): string | undefined {
  if (Object.prototype.hasOwnProperty.call(node.outputs, 'result')) return 'result';
  return requiredOutputKeys(node, suffix)[0];
}

/** Snapshot handed to capabilities: a frozen copy of the store with current vars. */
export function buildCapabilityContext(vars: JsonObject, store: JsonObject): JsonObject {
  return deepFreeze({ ...deepCopy(store), vars: deepCopy(vars) });
}

export class NodeRunner {
  private readonly registry: CapabilityRegistry;
  private readonly provenanceSuffix: string;
  private readonly now: () => string;
  private readonly log: Logger;

  constructor(options: NodeRunnerOptions) {
    this.registry = options.registry;
    this.provenanceSuffix = options.provenanceSuffix;
    this.now = options.now ?? (() => new Date().toISOString());
    this.log = options.logger ?? rootLogger.child({ component: 'node-runner' });
  }

  async runExecuteNode(node: ExecuteNode, vars: JsonObject, store: JsonObject): Promise<ExecuteOutcome> {
    if (this.primaryOutputPresent(node, vars, store)) {
      this.renderInputs(node, vars, store);
      this.renderOutputs(node, vars, store);
      this.log.debug('Primary output present, replayed templates', { nodeId: node.id });
      return { action: 'skipped', written: [] };
    }

    const params = this.renderInputs(node, vars, store);
    const result = await this.invoke(node, params, buildCapabilityContext(vars, store));
    this.checkResult(node, result);

    const rendered = this.renderOutputs(node, vars, store);
    const written = this.writeOutputs(node, result, rendered, vars, store);
    return { action: 'executed', written };
  }

  /** Skip check; renders against a copy so a miss leaves increments for the real run. */
  private primaryOutputPresent(node: ExecuteNode, vars: JsonObject, store: JsonObject): boolean {
    if (!node.skipIfOutputPresent) return false;
    const primary = primaryOutputName(node, this.provenanceSuffix);
    if (!primary) return false;

    const path = renderPath(node.outputs[primary], deepCopy(vars), store);
    if (path.startsWith(VARS_PREFIX)) {
      return hasValue(vars, path.slice(VARS_PREFIX.length));
    }
    const present = hasValue(store, path);
    this.log.debug('Checked primary output', { nodeId: node.id, path, present });
    return present;
  }

  private renderInputs(node: ExecuteNode, vars: JsonObject, store: JsonObject): JsonObject {
    const params: JsonObject = {};
    for (const [name, template] of Object.entries(node.inputs)) {
      const rendered = renderString(template, vars, store);
      if (typeof rendered === 'string') {
        const referenced = tryResolvePath(store, rendered);
        params[name] = referenced === undefined ? rendered : deepCopy(referenced);
      } else {
        params[name] = rendered;
      }
    }
    return params;
  }

  private async invoke(node: ExecuteNode, params: JsonObject, context: JsonObject): Promise<unknown> {
    const capability = this.registry.get(node.node);
    if (!capability) {
      throw capabilityError('NOT_REGISTERED', `No capability registered under "${node.node}"`, {
        capability: node.node,
        available: this.registry.names(),
      });
    }

    try {
      return await capability.evaluate(context, params);
    } catch (err) {
      if (isEngineError(err)) throw err;
      throw capabilityError('INVOCATION_FAILED', `Capability "${node.node}" failed: ${describeError(err)}`, {
        capability: node.node,
      });
    }
  }

  private checkResult(node: ExecuteNode, result: unknown): asserts result is JsonObject {
    if (!isJsonObject(result) || !isJsonValue(result)) {
      throw capabilityError('INVALID_RESULT', `Capability "${node.node}" must return a JSON object`, {
        capability: node.node,
      });
    }
    const missing = requiredOutputKeys(node, this.provenanceSuffix).filter(
      (key) => !Object.prototype.hasOwnProperty.call(result, key),
    );
    if (missing.length > 0) {
      throw capabilityError(
        'MISSING_OUTPUT',
        `Capability "${node.node}" did not return: ${missing.join(', ')}`,
        { capability: node.node, missing },
      );
    }
  }

  /** Render every output template in declared order, applying `vars.*` outputs. */
  private renderOutputs(node: ExecuteNode, vars: JsonObject, store: JsonObject): RenderedOutputs {
    const rendered: RenderedOutputs = { destinations: [], provenance: {} };
    for (const [name, template] of Object.entries(node.outputs)) {
      const value = renderString(template, vars, store);
      if (isVariableOutput(name)) {
        writePath(vars, name.slice(VARS_PREFIX.length), value);
      } else if (isProvenanceOutput(name, this.provenanceSuffix)) {
        rendered.provenance[name] = stringify(value);
      } else {
        rendered.destinations.push({ name, path: stringify(value) });
      }
    }
    return rendered;
  }

  private writeOutputs(
    node: ExecuteNode,
    result: JsonObject,
    rendered: RenderedOutputs,
    vars: JsonObject,
    store: JsonObject,
  ): string[] {
    const primary = primaryOutputName(node, this.provenanceSuffix);
    const createdAt = this.now();
    const written: string[] = [];

    for (const { name, path } of rendered.destinations) {
      const value: JsonValue = result[name];
      if (path.startsWith(VARS_PREFIX)) {
        writePath(vars, path.slice(VARS_PREFIX.length), value);
      } else {
        const provenance = name === primary ? rendered.provenance : undefined;
        writeWithMetadata(store, path, value, { createdAt, provenance });
      }
      written.push(path);
      this.log.debug('Wrote output', { nodeId: node.id, output: name, path });
    }
    return written;
  }
}
