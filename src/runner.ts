/**
 * File-based runs: the glue between the invocation surface and the engine.
 *
 * Everything that can fail before the first node (capability modules,
 * definition file, store file) fails here with an EngineError; only then
 * does the executor take over.
 */

import { isAbsolute, resolve } from 'path';
import { EngineConfig, createEngineConfig } from './config';
import { EngineError, createTypedError, describeError } from './domain/errors';
import { RunReport } from './domain/run';
import { WorkflowDefinition } from './domain/workflow';
import { loadWorkflowDefinition } from './dsl/loader';
import { CapabilityRegistry } from './engine/capability';
import { WorkflowExecutor } from './engine/executor';
import { logger } from './logger';
import { FileStateStore } from './storage/file-store';

/** What a capability module exports, as `register` or as its default export. */
export type RegisterCapabilities = (registry: CapabilityRegistry) => unknown;

export interface FileRunOptions {
  workflowPath: string;
  storePath: string;
  /** Module paths (relative to cwd) or package names exporting `register`. */
  capabilityModules?: string[];
  /** Pre-populated registry; modules register into it as well. */
  registry?: CapabilityRegistry;
  config?: Partial<EngineConfig>;
}

export interface PreparedRun {
  config: EngineConfig;
  registry: CapabilityRegistry;
  definition: WorkflowDefinition;
  store: FileStateStore;
}

const log = logger.child({ module: 'runner' });

function isRegisterFunction(value: unknown): value is RegisterCapabilities {
  return typeof value === 'function';
}

function findRegister(loaded: unknown): RegisterCapabilities | undefined {
  if (typeof loaded !== 'object' || loaded === null) return undefined;
  if ('register' in loaded && isRegisterFunction(loaded.register)) return loaded.register;
  if (!('default' in loaded)) return undefined;

  const fallback = loaded.default;
  if (isRegisterFunction(fallback)) return fallback;
  if (typeof fallback === 'object' && fallback !== null && 'register' in fallback && isRegisterFunction(fallback.register)) {
    return fallback.register;
  }
  return undefined;
}

function moduleLoadError(specifier: string, message: string): EngineError {
  return new EngineError(
    createTypedError({
      code: 'CAPABILITY.MODULE_LOAD_FAILED',
      kind: 'CapabilityError',
      message: `Cannot load capability module "${specifier}": ${message}`,
      details: { module: specifier },
    }),
  );
}

/** Import each module and let it register its capabilities. */
export async function loadCapabilityModules(registry: CapabilityRegistry, specifiers: string[]): Promise<void> {
  for (const specifier of specifiers) {
    const target = specifier.startsWith('.') || isAbsolute(specifier) ? resolve(specifier) : specifier;

    let loaded: unknown;
    try {
      loaded = await import(target);
    } catch (err) {
      throw moduleLoadError(specifier, describeError(err));
    }

    const register = findRegister(loaded);
    if (!register) {
      throw moduleLoadError(specifier, 'module does not export a register(registry) function');
    }
    try {
      await register(registry);
    } catch (err) {
      throw moduleLoadError(specifier, describeError(err));
    }
    log.debug('Capability module loaded', { module: specifier, capabilities: registry.names() });
  }
}

/** Load and check every input without running anything. */
export async function prepareFileRun(options: FileRunOptions): Promise<PreparedRun> {
  const config = createEngineConfig(options.config);
  const registry = options.registry ?? new CapabilityRegistry();
  await loadCapabilityModules(registry, options.capabilityModules ?? []);

  const definition = await loadWorkflowDefinition(options.workflowPath, {
    capabilities: registry.names(),
    provenanceSuffix: config.provenanceSuffix,
  });
  const store = new FileStateStore(options.storePath, { keepBackup: config.keepBackup });
  await store.load();

  return { config, registry, definition, store };
}

export async function runFromFiles(options: FileRunOptions): Promise<RunReport> {
  const { config, registry, definition, store } = await prepareFileRun(options);
  const executor = new WorkflowExecutor(registry, store, { config });
  return executor.run(definition);
}
