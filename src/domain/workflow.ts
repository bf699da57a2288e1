/**
 * Workflow definition domain model.
 *
 * A definition is immutable for the duration of a run: an ordered `flow`
 * of execute and conditional nodes, plus the initial variable mapping.
 */

import { JsonPrimitive } from './json';

/** Reserved branch target that terminates the run. */
export const END = 'END';

/** Declarative comparison against `compare_to`. */
export interface ComparatorCondition {
  kind: 'comparator';
  op: ComparatorOp;
  compareTo: string;
}

/** Restricted scripted boolean expression. */
export interface ScriptCondition {
  kind: 'script';
  expression: string;
}

export type BranchCondition = ComparatorCondition | ScriptCondition;

export type ComparatorOp = '>=' | '<=' | '>' | '<' | '==' | '!=';

export interface Branch {
  /** Template string; either a literal or a path. */
  value?: string;
  /** A branch without a condition always matches. */
  condition?: BranchCondition;
  goto: string;
}

export interface ExecuteNode {
  type: 'execute';
  id: string;
  /** Registered capability name. */
  node: string;
  skipIfOutputPresent: boolean;
  /** Parameter name → template. */
  inputs: Record<string, string>;
  /** Logical output name → destination template. */
  outputs: Record<string, string>;
}

export interface ConditionalNode {
  type: 'conditional';
  id: string;
  branches: Branch[];
  else: string;
}

export type WorkflowNode = ExecuteNode | ConditionalNode;

export interface WorkflowDefinition {
  name: string;
  /** Free-form tag describing the artifact under optimization. */
  codeType: string;
  vars: Record<string, JsonPrimitive>;
  flow: WorkflowNode[];
}

export function isExecuteNode(node: WorkflowNode): node is ExecuteNode {
  return node.type === 'execute';
}

export function isConditionalNode(node: WorkflowNode): node is ConditionalNode {
  return node.type === 'conditional';
}
