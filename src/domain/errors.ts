/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure the engine reports carries a namespaced code and one of a
 * small set of kinds, so the CLI (and any wrapping batch tooling) can tell
 * a broken workflow definition apart from a node that failed mid-run.
 */

/** Error taxonomy. */
export type ErrorKind =
  | 'DefinitionError'
  | 'UnresolvedVariable'
  | 'TemplateError'
  | 'PathError'
  | 'CapabilityError'
  | 'ConditionError'
  | 'StoreError';

/** Typed suggested fix an operator (or agent) can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "TEMPLATE.UNRESOLVED_VARIABLE"). */
  code: string;
  kind: ErrorKind;
  /** Human-readable error message. */
  message: string;
  /** Node being resolved or run when the error occurred. */
  nodeId?: string;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  kind: ErrorKind;
  message: string;
  nodeId?: string;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    kind: params.kind,
    message: params.message,
    nodeId: params.nodeId,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/**
 * The single exception type thrown inside the engine.
 * Wraps a TypedError so callers can branch on `typedError.kind`.
 */
export class EngineError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'EngineError';
  }

  get kind(): ErrorKind {
    return this.typedError.kind;
  }

  /** Copy of this error attributed to a node, unless it already names one. */
  forNode(nodeId: string): EngineError {
    if (this.typedError.nodeId) return this;
    return new EngineError({ ...this.typedError, nodeId });
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

// --- Factory functions ---

export function definitionError(
  code: string,
  message: string,
  details?: Record<string, unknown>,
  fixes?: SuggestedFix[],
): TypedError {
  return createTypedError({
    code: `DEFINITION.${code}`,
    kind: 'DefinitionError',
    message,
    details,
    suggestedFixes: fixes,
  });
}

export function unresolvedVariableError(reference: string, template: string): EngineError {
  return new EngineError(
    createTypedError({
      code: 'TEMPLATE.UNRESOLVED_VARIABLE',
      kind: 'UnresolvedVariable',
      message: `Unresolved reference "${reference}" in template "${template}"`,
      details: { reference, template },
      suggestedFixes: [
        {
          type: 'DECLARE_VARIABLE',
          params: { name: reference },
          description: `Declare "${reference}" under the workflow's vars`,
        },
      ],
    }),
  );
}

export function templateError(message: string, template: string): EngineError {
  return new EngineError(
    createTypedError({
      code: 'TEMPLATE.INVALID_EXPRESSION',
      kind: 'TemplateError',
      message,
      details: { template },
    }),
  );
}

export function pathError(path: string, message: string): EngineError {
  return new EngineError(
    createTypedError({
      code: 'STORE.INVALID_PATH',
      kind: 'PathError',
      message: `Cannot use path "${path}": ${message}`,
      details: { path },
    }),
  );
}

export function capabilityError(
  code: string,
  message: string,
  details?: Record<string, unknown>,
): EngineError {
  return new EngineError(
    createTypedError({
      code: `CAPABILITY.${code}`,
      kind: 'CapabilityError',
      message,
      details,
    }),
  );
}

export function conditionError(message: string, details?: Record<string, unknown>): EngineError {
  return new EngineError(
    createTypedError({
      code: 'CONDITION.INVALID',
      kind: 'ConditionError',
      message,
      details,
    }),
  );
}

export function storeError(code: string, location: string, message: string): EngineError {
  return new EngineError(
    createTypedError({
      code: `STORE.${code}`,
      kind: 'StoreError',
      message,
      details: { location },
    }),
  );
}

/** Message text for an arbitrary thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}
