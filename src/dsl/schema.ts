/**
 * Workflow definition document schema.
 *
 * Definitions are JSON documents; these constants are the source of truth
 * for which fields each object may carry.
 */

/** Node variants recognized by the schema. */
export const VALID_NODE_TYPES = ['execute', 'conditional'] as const;

/** Comparator operators a branch condition may use. */
export const VALID_COMPARATOR_OPS = ['>=', '<=', '>', '<', '==', '!='] as const;

/** Fields allowed on the workflow document. */
export const WORKFLOW_FIELDS = ['name', 'code_type', 'vars', 'flow'] as const;

/** Required fields for a workflow document. */
export const REQUIRED_WORKFLOW_FIELDS = ['name', 'code_type', 'flow'] as const;

export const EXECUTE_NODE_FIELDS = ['id', 'type', 'node', 'inputs', 'outputs', 'skipIfOutputPresent'] as const;

export const REQUIRED_EXECUTE_NODE_FIELDS = ['id', 'type', 'node'] as const;

export const CONDITIONAL_NODE_FIELDS = ['id', 'type', 'branches', 'else'] as const;

export const REQUIRED_CONDITIONAL_NODE_FIELDS = ['id', 'type', 'branches', 'else'] as const;

export const BRANCH_FIELDS = ['value', 'condition', 'goto'] as const;

/**
 * Condition fields. `python` is the legacy spelling of `expression` and is
 * read the same way.
 */
export const CONDITION_FIELDS = ['op', 'compare_to', 'expression', 'python'] as const;
