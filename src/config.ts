/**
 * Engine configuration.
 *
 * Defaults, overridable from the environment and then from explicit
 * options (CLI flags or programmatic callers):
 *
 *   const config = createEngineConfig({ ...loadConfigFromEnv(process.env), keepBackup: true });
 */

import { LogLevel, parseLogLevel } from './logger';

export interface EngineConfig {
  /** Output-name suffix marking a provenance output (stored as the resolved string). */
  provenanceSuffix: string;
  /** Keep `<store>.bak` holding the previous version on every flush. */
  keepBackup: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: EngineConfig = {
  provenanceSuffix: '_key',
  keepBackup: false,
  logLevel: LogLevel.Info,
};

const TRUTHY_FLAGS = new Set(['1', 'true', 'yes', 'on']);

/** Read overrides from `LOOPFLOW_*` environment variables. */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv): Partial<EngineConfig> {
  const overrides: Partial<EngineConfig> = {};

  const level = parseLogLevel(env.LOOPFLOW_LOG_LEVEL);
  if (level) overrides.logLevel = level;

  if (env.LOOPFLOW_KEEP_BACKUP !== undefined) {
    overrides.keepBackup = TRUTHY_FLAGS.has(env.LOOPFLOW_KEEP_BACKUP.trim().toLowerCase());
  }

  const suffix = env.LOOPFLOW_PROVENANCE_SUFFIX?.trim();
  if (suffix) overrides.provenanceSuffix = suffix;

  return overrides;
}

/** Merge overrides over the defaults; keys set to undefined keep the default. */
export function createEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    provenanceSuffix: overrides.provenanceSuffix ?? DEFAULT_CONFIG.provenanceSuffix,
    keepBackup: overrides.keepBackup ?? DEFAULT_CONFIG.keepBackup,
    logLevel: overrides.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
}
