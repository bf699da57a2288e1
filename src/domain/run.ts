/**
 * Run domain model.
 *
 * A run is one engine invocation against one store document. Nothing here
 * is persisted: the store document is the only durable record, the report
 * exists for the caller and the logs.
 */

import { TypedError } from './errors';

export enum RunStatus {
  Completed = 'completed',
  Failed = 'failed',
}

/** How a completed run ended. */
export type EndReason = 'end' | 'exhausted';

export type NodeAction = 'executed' | 'skipped' | 'branched' | 'failed';

/** A single entry in the execution transcript. */
export interface TranscriptEntry {
  nodeId: string;
  action: NodeAction;
  timestamp: string;
  /** Branch target chosen by a conditional node. */
  target?: string;
  /** Store paths written by an execute node. */
  written?: string[];
  durationMs?: number;
}

export interface RunReport {
  runId: string;
  workflow: string;
  status: RunStatus;
  endReason?: EndReason;
  transcript: TranscriptEntry[];
  failedNodeId?: string;
  error?: TypedError;
}
