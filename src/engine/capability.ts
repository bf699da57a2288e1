/**
 * Capabilities: the external work units execute nodes dispatch to.
 *
 * The engine knows capabilities only by name. A capability is anything with
 * an `evaluate(context, params)` method (or a bare function of the same
 * shape) that returns an outputs mapping, synchronously or not. Scorers,
 * code transformers and validators all plug in here; tests register
 * deterministic stand-ins.
 */

import { JsonObject, ReadonlyJsonObject } from '../domain/json';

/**
 * Read-only snapshot of the store handed to a capability, with `vars`
 * reflecting the variables as of the call.
 */
export type CapabilityContext = ReadonlyJsonObject;

export type CapabilityResult = JsonObject | Promise<JsonObject>;

export interface Capability {
  evaluate(context: CapabilityContext, params: JsonObject): CapabilityResult;
}

export type CapabilityFunction = (context: CapabilityContext, params: JsonObject) => CapabilityResult;

export type CapabilityLike = Capability | CapabilityFunction;

function toCapability(candidate: CapabilityLike): Capability {
  return typeof candidate === 'function' ? { evaluate: candidate } : candidate;
}

/** Registry of capabilities by name, resolved at node-dispatch time. */
export class CapabilityRegistry {
  private readonly capabilities = new Map<string, Capability>();

  constructor(entries: Record<string, CapabilityLike> = {}) {
    for (const [name, capability] of Object.entries(entries)) {
      this.register(name, capability);
    }
  }

  /** Register (or replace) a capability. Returns the registry for chaining. */
  register(name: string, capability: CapabilityLike): this {
    if (!name.trim()) {
      throw new Error('Capability name must be a non-empty string');
    }
    this.capabilities.set(name, toCapability(capability));
    return this;
  }

  get(name: string): Capability | undefined {
    return this.capabilities.get(name);
  }

  has(name: string): boolean {
    return this.capabilities.has(name);
  }

  names(): string[] {
    return [...this.capabilities.keys()].sort();
  }
}
