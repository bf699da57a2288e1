/**
 * Workflow definition validator.
 *
 * Semantic checks over a parsed definition. Everything here runs before
 * the first node, so a definition that fails never touches the store.
 */

import { DEFAULT_CONFIG } from '../config';
import { EngineError, TypedError, definitionError, isEngineError } from '../domain/errors';
import { END, ExecuteNode, WorkflowDefinition, isConditionalNode, isExecuteNode } from '../domain/workflow';
import { parseExpression } from '../engine/expression';
import { primaryOutputName } from '../engine/node-runner';
import { hasPlaceholders } from '../engine/template';

/** Validation result. */
export interface ValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
}

export interface ValidateOptions {
  /** Registered capability names; when given, execute nodes must use one of them. */
  capabilities?: readonly string[];
  provenanceSuffix?: string;
}

/** Validate a workflow definition. */
export function validateWorkflow(
  definition: WorkflowDefinition,
  options: ValidateOptions = {},
): ValidationResult {
  const errors: TypedError[] = [];
  const warnings: string[] = [];

  if (definition.flow.length === 0) {
    errors.push(
      definitionError('EMPTY_FLOW', 'Workflow must contain at least one node in "flow"', undefined, [
        { type: 'ADD_NODE', params: {}, description: 'Add an execute or conditional node to "flow"' },
      ]),
    );
    return { valid: false, errors, warnings };
  }

  const ids = validateNodeIds(definition, errors);
  validateTargets(definition, ids, errors);
  validateExecuteNodes(definition, options, errors);
  validateConditionalNodes(definition, errors, warnings);

  return { valid: errors.length === 0, errors, warnings };
}

/** Build the error thrown for an invalid definition, carrying every problem found. */
export function invalidDefinitionError(errors: TypedError[]): EngineError {
  const [first] = errors;
  const more = errors.length > 1 ? ` (and ${errors.length - 1} more)` : '';
  return new EngineError(
    definitionError('INVALID', `Workflow definition is invalid: ${first?.message ?? 'unknown problem'}${more}`, {
      errors,
    }),
  );
}

/** Validate and throw on the first failing result. */
export function assertValidWorkflow(definition: WorkflowDefinition, options: ValidateOptions = {}): void {
  const result = validateWorkflow(definition, options);
  if (!result.valid) {
    throw invalidDefinitionError(result.errors);
  }
}

function validateNodeIds(definition: WorkflowDefinition, errors: TypedError[]): Set<string> {
  const ids = new Set<string>();
  for (const node of definition.flow) {
    if (!node.id.trim()) {
      errors.push(definitionError('REQUIRED_FIELD', 'Node id must be a non-empty string'));
      continue;
    }
    if (node.id === END) {
      errors.push(
        definitionError('RESERVED_ID', `Node id "${END}" is reserved for ending the run`, { nodeId: node.id }),
      );
    }
    if (ids.has(node.id)) {
      errors.push(
        definitionError('DUPLICATE_NODE_ID', `Duplicate node id detected: "${node.id}"`, { nodeId: node.id }, [
          { type: 'RENAME_NODE', params: { nodeId: node.id }, description: 'Give every node a unique id' },
        ]),
      );
    }
    ids.add(node.id);
  }
  return ids;
}

function validateTargets(definition: WorkflowDefinition, ids: Set<string>, errors: TypedError[]): void {
  const available = [...ids];
  const check = (nodeId: string, field: string, target: string): void => {
    if (target === END || ids.has(target)) return;
    errors.push(
      definitionError(
        'DANGLING_TARGET',
        `Node "${nodeId}" ${field} target "${target}" is neither "${END}" nor a node id`,
        { nodeId, field, target },
        [
          {
            type: 'FIX_TARGET',
            params: { target, available: [...available, END] },
            description: `Use one of: ${[...available, END].join(', ')}`,
          },
        ],
      ),
    );
  };

  for (const node of definition.flow) {
    if (!isConditionalNode(node)) continue;
    node.branches.forEach((branch, index) => check(node.id, `branches[${index}].goto`, branch.goto));
    check(node.id, 'else', node.else);
  }
}

function validateExecuteNodes(
  definition: WorkflowDefinition,
  options: ValidateOptions,
  errors: TypedError[],
): void {
  const suffix = options.provenanceSuffix ?? DEFAULT_CONFIG.provenanceSuffix;
  const known = options.capabilities ? new Set(options.capabilities) : undefined;

  for (const node of definition.flow) {
    if (!isExecuteNode(node)) continue;

    if (known && !known.has(node.node)) {
      errors.push(
        definitionError(
          'UNKNOWN_CAPABILITY',
          `Node "${node.id}" references unregistered capability "${node.node}"`,
          { nodeId: node.id, capability: node.node },
          [
            {
              type: 'REGISTER_CAPABILITY',
              params: { capability: node.node, available: [...known].sort() },
              description: `Register "${node.node}" or use a registered capability`,
            },
          ],
        ),
      );
    }

    if (node.skipIfOutputPresent && !hasPrimaryOutput(node, suffix)) {
      errors.push(
        definitionError(
          'NO_PRIMARY_OUTPUT',
          `Node "${node.id}" sets skipIfOutputPresent but declares no value output to check`,
          { nodeId: node.id },
          [{ type: 'ADD_OUTPUT', params: { output: 'result' }, description: 'Declare a "result" output' }],
        ),
      );
    }
  }
}

function hasPrimaryOutput(node: ExecuteNode, suffix: string): boolean {
  return primaryOutputName(node, suffix) !== undefined;
}

function validateConditionalNodes(definition: WorkflowDefinition, errors: TypedError[], warnings: string[]): void {
  for (const node of definition.flow) {
    if (!isConditionalNode(node)) continue;

    if (node.branches.length === 0) {
      errors.push(
        definitionError('EMPTY_BRANCHES', `Conditional node "${node.id}" requires at least one branch`, {
          nodeId: node.id,
        }),
      );
    }

    node.branches.forEach((branch, index) => {
      if (!branch.condition && index < node.branches.length - 1) {
        warnings.push(
          `Node "${node.id}" branch ${index} has no condition; later branches can never be taken`,
        );
      }
      const condition = branch.condition;
      if (condition?.kind !== 'script' || hasPlaceholders(condition.expression)) return;
      try {
        parseExpression(condition.expression);
      } catch (err) {
        if (!isEngineError(err)) throw err;
        errors.push(
          definitionError(
            'INVALID_EXPRESSION',
            `Node "${node.id}" branch ${index}: ${err.message}`,
            { nodeId: node.id, branch: index, expression: condition.expression },
          ),
        );
      }
    });
  }
}
