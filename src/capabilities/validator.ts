/**
 * Validator capabilities.
 *
 * A validator is a capability that checks manifest content (inline, on
 * disk or already in the store) and reports a structured verdict.
 * `content_fix_required` separates "the content under test is wrong"
 * from "the tooling could not run", so a workflow can route the first
 * back to a transform node and halt on the second.
 *
 *   registry.register('validate', defineValidator(async (manifest) => ({
 *     passed: manifest.content.includes('kind:'),
 *     content_fix_required: true,
 *     reason: 'manifest has no kind',
 *     findings: [],
 *   })));
 */

import { promises as fs } from 'fs';
import { capabilityError, describeError, isEngineError } from '../domain/errors';
import { JsonObject, ReadonlyJsonObject, ReadonlyJsonValue, isJsonObject } from '../domain/json';
import { Capability, CapabilityContext } from '../engine/capability';
import { PathSegment, parsePath } from '../storage/path-accessor';

export const FINDING_SEVERITIES = ['error', 'warning', 'info'] as const;

export type FindingSeverity = (typeof FINDING_SEVERITIES)[number];

export interface ValidatorFinding {
  tool: string;
  severity: FindingSeverity;
  message: string;
}

export interface ValidatorResult {
  passed: boolean;
  /** True when the failure is caused by the content under test, not the environment. */
  content_fix_required: boolean;
  reason: string;
  findings: ValidatorFinding[];
}

export type ManifestSource = 'inline' | 'file' | 'store' | 'original';

export interface ManifestInput {
  content: string;
  source: ManifestSource;
  /** File path or store path the content came from. */
  location?: string;
}

export type ValidatorCheck = (
  manifest: ManifestInput,
  params: JsonObject,
  context: CapabilityContext,
) => unknown;

function nonEmptyString(value: ReadonlyJsonValue | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isReadonlyObject(value: ReadonlyJsonValue | undefined): value is ReadonlyJsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isReadonlyList(value: ReadonlyJsonValue | undefined): value is readonly ReadonlyJsonValue[] {
  return Array.isArray(value);
}

/** Path lookup over the frozen context, with the store accessor's path syntax. */
function lookup(context: CapabilityContext, path: string): ReadonlyJsonValue | undefined {
  let segments: PathSegment[];
  try {
    segments = parsePath(path);
  } catch (err) {
    if (isEngineError(err) && err.kind === 'PathError') return undefined;
    throw err;
  }

  let current: ReadonlyJsonValue | undefined = context;
  for (const segment of segments) {
    if (isReadonlyList(current)) {
      current = segment.index === undefined ? undefined : current[segment.index];
    } else if (isReadonlyObject(current) && Object.prototype.hasOwnProperty.call(current, segment.key)) {
      current = current[segment.key];
    } else {
      return undefined;
    }
  }
  return current;
}

function fromStore(context: CapabilityContext, key: string, param: string): ManifestInput {
  const location = key.trim();
  const stored = lookup(context, location);
  if (!nonEmptyString(stored)) {
    throw capabilityError('MISSING_MANIFEST', `${param} "${location}" does not name manifest content in the store`, {
      [param]: location,
    });
  }
  return { content: stored, source: 'store', location };
}

/**
 * Find the manifest to validate, in order: `manifest` (inline content),
 * `manifest_path` (file), `manifest_key` or `vars.latest_manifest_key`
 * (store path), then the store's `original_manifest` or `original_code`.
 *
 * Execute nodes dereference inputs that name a store path, so a workflow
 * passes stored content as `manifest: 'results.fix_{{iter}}'` (or
 * `'{{latest_manifest_key}}'`). `manifest_key` is for direct callers; a
 * key that does not resolve fails instead of falling back to the original.
 */
export async function resolveManifestContent(
  context: CapabilityContext,
  params: JsonObject,
): Promise<ManifestInput> {
  if (nonEmptyString(params.manifest)) {
    return { content: params.manifest, source: 'inline' };
  }

  if (nonEmptyString(params.manifest_path)) {
    const location = params.manifest_path;
    try {
      return { content: await fs.readFile(location, 'utf-8'), source: 'file', location };
    } catch (err) {
      throw capabilityError('MANIFEST_UNREADABLE', `Cannot read manifest ${location}: ${describeError(err)}`, {
        location,
      });
    }
  }

  if (params.manifest_key !== undefined) {
    if (!nonEmptyString(params.manifest_key)) {
      throw capabilityError('MISSING_MANIFEST', 'manifest_key must be a non-empty store path', {
        manifest_key: params.manifest_key,
      });
    }
    return fromStore(context, params.manifest_key, 'manifest_key');
  }

  const latest = lookup(context, 'vars.latest_manifest_key');
  if (nonEmptyString(latest)) {
    return fromStore(context, latest, 'vars.latest_manifest_key');
  }

  for (const fallback of ['original_manifest', 'original_code']) {
    const original = context[fallback];
    if (typeof original === 'string') {
      return { content: original, source: 'original', location: fallback };
    }
  }

  throw capabilityError('MISSING_MANIFEST', 'No manifest content: pass manifest, manifest_path or manifest_key', {
    params: Object.keys(params),
  });
}

function invalid(message: string): never {
  throw capabilityError('INVALID_VALIDATOR_RESULT', `Validator result ${message}`);
}

function normalizeFinding(raw: unknown, index: number): ValidatorFinding {
  if (typeof raw === 'string') {
    return { tool: 'validator', severity: 'error', message: raw };
  }
  if (!isJsonObject(raw)) invalid(`findings[${index}] must be an object or string`);

  const { tool, severity, message } = raw;
  if (typeof message !== 'string') invalid(`findings[${index}].message must be a string`);
  const level = FINDING_SEVERITIES.find((candidate) => candidate === severity);
  if (severity !== undefined && !level) {
    invalid(`findings[${index}].severity must be one of ${FINDING_SEVERITIES.join(', ')}`);
  }
  return {
    tool: typeof tool === 'string' && tool ? tool : 'validator',
    severity: level ?? 'error',
    message,
  };
}

/** Check and fill in a raw validator verdict. */
export function normalizeValidatorResult(raw: unknown): ValidatorResult {
  if (!isJsonObject(raw)) invalid('must be an object');

  const { passed, content_fix_required: contentFixRequired, reason, findings } = raw;
  if (typeof passed !== 'boolean') invalid('"passed" must be a boolean');
  if (contentFixRequired !== undefined && typeof contentFixRequired !== 'boolean') {
    invalid('"content_fix_required" must be a boolean');
  }
  if (reason !== undefined && typeof reason !== 'string') invalid('"reason" must be a string');
  if (findings !== undefined && !Array.isArray(findings)) invalid('"findings" must be a list');

  return {
    passed,
    content_fix_required: contentFixRequired ?? false,
    reason: reason ?? '',
    findings: (findings ?? []).map(normalizeFinding),
  };
}

export function validatorResultToJson(result: ValidatorResult): JsonObject {
  return {
    passed: result.passed,
    content_fix_required: result.content_fix_required,
    reason: result.reason,
    findings: result.findings.map((finding) => ({
      tool: finding.tool,
      severity: finding.severity,
      message: finding.message,
    })),
  };
}

/** Wrap a check function into a capability returning `{ result: ValidatorResult }`. */
export function defineValidator(check: ValidatorCheck): Capability {
  return {
    async evaluate(context, params) {
      const manifest = await resolveManifestContent(context, params);
      const verdict = normalizeValidatorResult(await check(manifest, params, context));
      return { result: validatorResultToJson(verdict) };
    },
  };
}
