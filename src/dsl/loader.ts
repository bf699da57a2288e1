/**
 * Workflow definition loader.
 *
 * Reads the JSON document, checks its shape against the schema and maps it
 * onto the domain model (`code_type` → `codeType`, `compare_to` →
 * `compareTo`, `python`/`expression` → a script condition). Structural and
 * semantic problems are collected together and thrown as one
 * DefinitionError, so an author sees every mistake in a single pass.
 */

import { promises as fs } from 'fs';
import { EngineError, TypedError, definitionError, describeError } from '../domain/errors';
import { JsonObject, JsonPrimitive, JsonValue, isJsonObject, isJsonPrimitive } from '../domain/json';
import {
  Branch,
  BranchCondition,
  ComparatorOp,
  ConditionalNode,
  ExecuteNode,
  WorkflowDefinition,
  WorkflowNode,
} from '../domain/workflow';
import {
  BRANCH_FIELDS,
  CONDITIONAL_NODE_FIELDS,
  CONDITION_FIELDS,
  EXECUTE_NODE_FIELDS,
  REQUIRED_CONDITIONAL_NODE_FIELDS,
  REQUIRED_EXECUTE_NODE_FIELDS,
  REQUIRED_WORKFLOW_FIELDS,
  VALID_COMPARATOR_OPS,
  VALID_NODE_TYPES,
  WORKFLOW_FIELDS,
} from './schema';
import { ValidateOptions, invalidDefinitionError, validateWorkflow } from './validator';

function checkFields(
  raw: JsonObject,
  allowed: readonly string[],
  required: readonly string[],
  location: string,
  errors: TypedError[],
): void {
  for (const field of required) {
    if (raw[field] === undefined || raw[field] === null) {
      errors.push(
        definitionError('REQUIRED_FIELD', `${location}: missing required field "${field}"`, { location, field }, [
          { type: 'ADD_FIELD', params: { field }, description: `Provide the "${field}" field` },
        ]),
      );
    }
  }
  for (const field of Object.keys(raw)) {
    if (!allowed.includes(field)) {
      errors.push(
        definitionError('UNKNOWN_FIELD', `${location}: unknown field "${field}"`, { location, field }, [
          { type: 'REMOVE_FIELD', params: { field, allowed: [...allowed] }, description: `Remove "${field}"` },
        ]),
      );
    }
  }
}

function typeMismatch(location: string, expected: string, errors: TypedError[]): void {
  errors.push(definitionError('INVALID_TYPE', `${location} must be ${expected}`, { location, expected }));
}

function readString(raw: JsonObject, field: string, location: string, errors: TypedError[]): string | undefined {
  const value = raw[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    typeMismatch(`${location}.${field}`, 'a string', errors);
    return undefined;
  }
  return value;
}

/** Scalars written as JSON numbers or booleans are kept as template text. */
function readScalarText(value: JsonValue, location: string, errors: TypedError[]): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  typeMismatch(location, 'a string, number or boolean', errors);
  return undefined;
}

function readTemplateMap(
  raw: JsonObject,
  field: string,
  location: string,
  errors: TypedError[],
): Record<string, string> {
  const value = raw[field];
  const templates: Record<string, string> = {};
  if (value === undefined || value === null) return templates;
  if (!isJsonObject(value)) {
    typeMismatch(`${location}.${field}`, 'an object of template strings', errors);
    return templates;
  }
  for (const [name, template] of Object.entries(value)) {
    if (typeof template === 'string') {
      templates[name] = template;
    } else {
      typeMismatch(`${location}.${field}.${name}`, 'a template string', errors);
    }
  }
  return templates;
}

function readVars(raw: JsonObject, errors: TypedError[]): Record<string, JsonPrimitive> {
  const value = raw.vars;
  const vars: Record<string, JsonPrimitive> = {};
  if (value === undefined || value === null) return vars;
  if (!isJsonObject(value)) {
    typeMismatch('vars', 'an object', errors);
    return vars;
  }
  for (const [name, initial] of Object.entries(value)) {
    if (isJsonPrimitive(initial)) {
      vars[name] = initial;
    } else {
      typeMismatch(`vars.${name}`, 'a string, number, boolean or null', errors);
    }
  }
  return vars;
}

function toComparatorOp(op: string): ComparatorOp | undefined {
  return VALID_COMPARATOR_OPS.find((candidate) => candidate === op);
}

function readCondition(raw: JsonValue, location: string, errors: TypedError[]): BranchCondition | undefined {
  if (!isJsonObject(raw)) {
    typeMismatch(location, 'an object', errors);
    return undefined;
  }
  checkFields(raw, CONDITION_FIELDS, [], location, errors);

  const invalid = (message: string): undefined => {
    errors.push(definitionError('INVALID_CONDITION', `${location}: ${message}`, { location }));
    return undefined;
  };

  if (raw.expression !== undefined && raw.python !== undefined) {
    return invalid('use either "expression" or "python", not both');
  }
  const script = raw.expression ?? raw.python;
  const hasComparison = raw.op !== undefined || raw.compare_to !== undefined;

  if (script !== undefined) {
    if (hasComparison) return invalid('cannot mix a scripted expression with comparator fields');
    if (typeof script !== 'string' || !script.trim()) return invalid('scripted expression must be a non-empty string');
    return { kind: 'script', expression: script };
  }

  if (!hasComparison) return invalid('define either a scripted expression or an op/compare_to pair');
  if (raw.op === undefined || raw.compare_to === undefined) {
    return invalid('comparator conditions require both "op" and "compare_to"');
  }

  const opText = readString(raw, 'op', location, errors);
  const compareTo = readScalarText(raw.compare_to, `${location}.compare_to`, errors);
  if (opText === undefined || compareTo === undefined) return undefined;

  const op = toComparatorOp(opText);
  if (!op) {
    errors.push(
      definitionError('UNKNOWN_OPERATOR', `${location}: unknown comparator "${opText}"`, { location, op: opText }, [
        {
          type: 'USE_OPERATOR',
          params: { valid: [...VALID_COMPARATOR_OPS] },
          description: `Use one of ${VALID_COMPARATOR_OPS.join(' ')}`,
        },
      ]),
    );
    return undefined;
  }
  return { kind: 'comparator', op, compareTo };
}

function readBranch(raw: JsonValue, location: string, errors: TypedError[]): Branch | undefined {
  if (!isJsonObject(raw)) {
    typeMismatch(location, 'an object', errors);
    return undefined;
  }
  checkFields(raw, BRANCH_FIELDS, ['goto'], location, errors);

  const goto = readString(raw, 'goto', location, errors);
  const value = raw.value === undefined ? undefined : readScalarText(raw.value, `${location}.value`, errors);
  const condition =
    raw.condition === undefined ? undefined : readCondition(raw.condition, `${location}.condition`, errors);

  if (condition?.kind === 'comparator' && value === undefined) {
    errors.push(
      definitionError('MISSING_VALUE', `${location}: comparator branches must provide a "value"`, { location }),
    );
  }
  if (goto === undefined) return undefined;
  return { value, condition, goto };
}

function readExecuteNode(raw: JsonObject, location: string, errors: TypedError[]): ExecuteNode | undefined {
  checkFields(raw, EXECUTE_NODE_FIELDS, REQUIRED_EXECUTE_NODE_FIELDS, location, errors);

  const id = readString(raw, 'id', location, errors);
  const capability = readString(raw, 'node', location, errors);
  let skipIfOutputPresent = false;
  if (raw.skipIfOutputPresent !== undefined) {
    if (typeof raw.skipIfOutputPresent === 'boolean') {
      skipIfOutputPresent = raw.skipIfOutputPresent;
    } else {
      typeMismatch(`${location}.skipIfOutputPresent`, 'a boolean', errors);
    }
  }
  const inputs = readTemplateMap(raw, 'inputs', location, errors);
  const outputs = readTemplateMap(raw, 'outputs', location, errors);

  if (id === undefined || capability === undefined) return undefined;
  return { type: 'execute', id, node: capability, skipIfOutputPresent, inputs, outputs };
}

function readConditionalNode(raw: JsonObject, location: string, errors: TypedError[]): ConditionalNode | undefined {
  checkFields(raw, CONDITIONAL_NODE_FIELDS, REQUIRED_CONDITIONAL_NODE_FIELDS, location, errors);

  const id = readString(raw, 'id', location, errors);
  const elseTarget = readString(raw, 'else', location, errors);
  const branches: Branch[] = [];
  if (raw.branches !== undefined && raw.branches !== null) {
    if (Array.isArray(raw.branches)) {
      raw.branches.forEach((item, index) => {
        const branch = readBranch(item, `${location}.branches[${index}]`, errors);
        if (branch) branches.push(branch);
      });
    } else {
      typeMismatch(`${location}.branches`, 'an array', errors);
    }
  }

  if (id === undefined || elseTarget === undefined) return undefined;
  return { type: 'conditional', id, branches, else: elseTarget };
}

function readNode(raw: JsonValue, location: string, errors: TypedError[]): WorkflowNode | undefined {
  if (!isJsonObject(raw)) {
    typeMismatch(location, 'an object', errors);
    return undefined;
  }
  if (raw.type === 'execute') return readExecuteNode(raw, location, errors);
  if (raw.type === 'conditional') return readConditionalNode(raw, location, errors);

  if (raw.type === undefined) {
    errors.push(definitionError('REQUIRED_FIELD', `${location}: missing required field "type"`, { location }));
  } else {
    errors.push(
      definitionError(
        'UNKNOWN_NODE_TYPE',
        `${location}: unknown node type ${JSON.stringify(raw.type)}`,
        { location, type: raw.type },
        [{ type: 'USE_NODE_TYPE', params: { valid: [...VALID_NODE_TYPES] }, description: 'Use "execute" or "conditional"' }],
      ),
    );
  }
  return undefined;
}

function readDefinition(raw: unknown, errors: TypedError[]): WorkflowDefinition | undefined {
  if (!isJsonObject(raw)) {
    typeMismatch('Workflow definition', 'a JSON object', errors);
    return undefined;
  }
  checkFields(raw, WORKFLOW_FIELDS, REQUIRED_WORKFLOW_FIELDS, 'workflow', errors);

  const name = readString(raw, 'name', 'workflow', errors);
  const codeType = readString(raw, 'code_type', 'workflow', errors);
  const vars = readVars(raw, errors);
  const flow: WorkflowNode[] = [];
  if (Array.isArray(raw.flow)) {
    raw.flow.forEach((item, index) => {
      const node = readNode(item, `flow[${index}]`, errors);
      if (node) flow.push(node);
    });
  } else if (raw.flow !== undefined && raw.flow !== null) {
    typeMismatch('workflow.flow', 'an array', errors);
  }

  if (name === undefined || codeType === undefined) return undefined;
  return { name, codeType, vars, flow };
}

/**
 * Turn a parsed JSON document into a validated definition.
 * Throws a DefinitionError EngineError listing every problem in `details.errors`.
 */
export function parseWorkflowDefinition(raw: unknown, options: ValidateOptions = {}): WorkflowDefinition {
  const errors: TypedError[] = [];
  const definition = readDefinition(raw, errors);
  if (!definition || errors.length > 0) {
    throw invalidDefinitionError(errors);
  }

  const validation = validateWorkflow(definition, options);
  if (!validation.valid) {
    throw invalidDefinitionError(validation.errors);
  }
  return definition;
}

/** Read a definition file from disk. */
export async function loadWorkflowDefinition(
  location: string,
  options: ValidateOptions = {},
): Promise<WorkflowDefinition> {
  let text: string;
  try {
    text = await fs.readFile(location, 'utf-8');
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    throw new EngineError(
      definitionError(
        missing ? 'NOT_FOUND' : 'READ_FAILED',
        missing
          ? `Workflow definition not found: ${location}`
          : `Cannot read workflow definition ${location}: ${describeError(err)}`,
        { location },
      ),
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new EngineError(
      definitionError('INVALID_JSON', `Workflow definition ${location} is not valid JSON: ${describeError(err)}`, {
        location,
      }),
    );
  }
  return parseWorkflowDefinition(raw, options);
}
