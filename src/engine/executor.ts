/**
 * Workflow Executor: the execution loop.
 *
 * Walks the definition's flow one node at a time against a single store
 * document. The only state kept between nodes is the current position:
 * before each node the store is reloaded from its backing location, the
 * variable mapping is seeded from it, and after an execute node the
 * mutated document (with `vars` updated) is flushed. Every run starts at
 * the first node with the definition's initial variables; nodes whose
 * output already exists are skipped and replay their increments, so a
 * rerun retraces the earlier trajectory and resumes where it stopped.
 */

import { v4 as uuid } from 'uuid';
import { EngineConfig, createEngineConfig } from '../config';
import { EngineError, TypedError, createTypedError, definitionError, isEngineError } from '../domain/errors';
import { JsonObject, deepCopy, isJsonObject } from '../domain/json';
import { EndReason, NodeAction, RunReport, RunStatus, TranscriptEntry } from '../domain/run';
import { END, WorkflowDefinition, WorkflowNode, isConditionalNode } from '../domain/workflow';
import { assertValidWorkflow } from '../dsl/validator';
import { Logger, logger as rootLogger } from '../logger';
import { StateStore } from '../storage/store';
import { CapabilityRegistry } from './capability';
import { evaluateConditionalNode } from './conditions';
import { NodeRunner } from './node-runner';

export interface ExecutorOptions {
  config?: Partial<EngineConfig>;
  /** Timestamp source for transcripts and `created_at`. */
  now?: () => string;
  logger?: Logger;
}

interface NodeResult {
  action: NodeAction;
  /** Next node id, or END. Undefined means the sequential successor. */
  target?: string;
  written?: string[];
}

/**
 * Working variable mapping for one node.
 *
 * Mid-run, the store's persisted vars win over the definition's initial
 * values. Until a run's first flush it is the other way round: a run
 * always starts at position 0, so variables the definition declares
 * restart from their initial values and skip replay rebuilds them.
 * Persisted variables the definition does not declare are kept.
 */
export function seedVariables(definition: WorkflowDefinition, store: JsonObject, restart = false): JsonObject {
  const persisted: JsonObject = isJsonObject(store.vars) ? deepCopy(store.vars) : {};
  return restart ? { ...persisted, ...definition.vars } : { ...definition.vars, ...persisted };
}

/** The workflow executor. */
export class WorkflowExecutor {
  private readonly config: EngineConfig;
  private readonly now: () => string;
  private readonly log: Logger;
  private readonly runner: NodeRunner;
  /** Guard against overlapping run() calls on the same store. */
  private running = false;

  constructor(
    private readonly registry: CapabilityRegistry,
    private readonly stateStore: StateStore,
    options: ExecutorOptions = {},
  ) {
    this.config = createEngineConfig(options.config);
    this.now = options.now ?? (() => new Date().toISOString());
    this.log = options.logger ?? rootLogger.child({ component: 'executor' });
    this.runner = new NodeRunner({
      registry,
      provenanceSuffix: this.config.provenanceSuffix,
      now: this.now,
      logger: this.log,
    });
  }

  /**
   * Run a definition to END or to the end of its flow.
   *
   * Definition problems and an unreadable store are thrown before anything
   * runs. A failing node does not throw: the report comes back `failed`
   * with the node id and typed error, and the store keeps the state left
   * by the last successful node.
   */
  async run(definition: WorkflowDefinition): Promise<RunReport> {
    if (this.running) {
      throw new EngineError(
        createTypedError({
          code: 'STORE.ALREADY_RUNNING',
          kind: 'StoreError',
          message: `A run is already in progress against ${this.stateStore.location}`,
          details: { location: this.stateStore.location },
        }),
      );
    }
    this.running = true;
    try {
      return await this.runInternal(definition);
    } finally {
      this.running = false;
    }
  }

  private async runInternal(definition: WorkflowDefinition): Promise<RunReport> {
    assertValidWorkflow(definition, {
      capabilities: this.registry.names(),
      provenanceSuffix: this.config.provenanceSuffix,
    });
    await this.stateStore.load();

    const runId = `run_${uuid()}`;
    const log = this.log.child({ runId, workflow: definition.name });
    const positions = new Map(definition.flow.map((node, index): [string, number] => [node.id, index]));
    const transcript: TranscriptEntry[] = [];
    const report = (status: RunStatus, extra: Partial<RunReport> = {}): RunReport => ({
      runId,
      workflow: definition.name,
      status,
      transcript,
      ...extra,
    });

    log.info('Run started', { store: this.stateStore.location, nodes: definition.flow.length });

    let index = 0;
    // Until the first execute node flushes, vars come from the definition.
    let restart = true;
    while (index < definition.flow.length) {
      const node = definition.flow[index];
      const startedAt = Date.now();
      log.info('Node started', { nodeId: node.id, type: node.type });

      let result: NodeResult;
      try {
        result = await this.runNode(node, definition, restart);
      } catch (err) {
        const error = toNodeError(err, node.id);
        transcript.push({ nodeId: node.id, action: 'failed', timestamp: this.now(), durationMs: Date.now() - startedAt });
        log.error('Node failed', { nodeId: node.id, kind: error.kind, code: error.code, error: error.message });
        return report(RunStatus.Failed, { failedNodeId: node.id, error });
      }

      transcript.push({
        nodeId: node.id,
        action: result.action,
        timestamp: this.now(),
        target: result.target,
        written: result.written,
        durationMs: Date.now() - startedAt,
      });
      log.info(`Node ${result.action}`, { nodeId: node.id, target: result.target, written: result.written });
      if (result.action !== 'branched') restart = false;

      if (result.target === END) {
        return this.finish(log, report, 'end');
      }
      if (result.target !== undefined) {
        const next = positions.get(result.target);
        // Targets are checked at load time; a miss here means the definition changed under us.
        if (next === undefined) {
          throw new EngineError(
            definitionError('UNKNOWN_TARGET', `Unknown target "${result.target}" from node "${node.id}"`, {
              nodeId: node.id,
              target: result.target,
            }),
          );
        }
        index = next;
      } else {
        index++;
      }
    }

    return this.finish(log, report, 'exhausted');
  }

  private finish(
    log: Logger,
    report: (status: RunStatus, extra?: Partial<RunReport>) => RunReport,
    endReason: EndReason,
  ): RunReport {
    log.info('Run completed', { endReason });
    return report(RunStatus.Completed, { endReason });
  }

  private async runNode(node: WorkflowNode, definition: WorkflowDefinition, restart: boolean): Promise<NodeResult> {
    const store = await this.stateStore.load();
    const vars = seedVariables(definition, store, restart);

    if (isConditionalNode(node)) {
      const outcome = evaluateConditionalNode(node, vars, store);
      return { action: 'branched', target: outcome.target };
    }

    const outcome = await this.runner.runExecuteNode(node, vars, store);
    store.vars = vars;
    await this.stateStore.save(store);
    return { action: outcome.action, written: outcome.written };
  }
}

/** Attribute an engine error to the failing node; anything else is a bug and propagates. */
function toNodeError(err: unknown, nodeId: string): TypedError {
  if (isEngineError(err)) return err.forNode(nodeId).typedError;
  throw err;
}
