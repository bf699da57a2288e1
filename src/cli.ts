#!/usr/bin/env node
/**
 * loopflow command line.
 *
 *   loopflow <workflow.json> <store.json> [--capabilities <module>]...
 *            [--check] [--keep-backup] [--log-level <level>]
 *
 * Exit status: 0 when the run completed (END or end of flow), 1 when a node
 * failed, 2 for bad arguments or inputs that fail before the first node.
 * Nothing is written to stdout; logs go to stderr.
 */

import { parseArgs } from 'node:util';
import { EngineConfig, createEngineConfig, loadConfigFromEnv } from './config';
import { describeError, isEngineError } from './domain/errors';
import { RunStatus } from './domain/run';
import { logger, parseLogLevel, setLogLevel } from './logger';
import { prepareFileRun, runFromFiles } from './runner';

export const EXIT_COMPLETED = 0;
export const EXIT_NODE_FAILURE = 1;
export const EXIT_INPUT_ERROR = 2;

export const USAGE = `Usage: loopflow <workflow.json> <store.json> [options]

Options:
  --capabilities <module>  Module exporting register(registry); repeatable
  --check                  Validate the workflow and store, then exit
  --keep-backup            Keep <store>.bak with the previous version
  --log-level <level>      debug, info, warn, error or silent
  -h, --help               Show this help
`;

const log = logger.child({ module: 'cli' });

interface CliOptions {
  workflowPath: string;
  storePath: string;
  capabilityModules: string[];
  check: boolean;
  config: EngineConfig;
}

class UsageError extends Error {}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        capabilities: { type: 'string', multiple: true },
        check: { type: 'boolean', default: false },
        'keep-backup': { type: 'boolean' },
        'log-level': { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    throw new UsageError(describeError(err));
  }
}

function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv): CliOptions | 'help' {
  const { values, positionals } = readArgs(argv);
  if (values.help) return 'help';

  if (positionals.length !== 2) {
    throw new UsageError(`Expected a workflow path and a store path, got ${positionals.length} argument(s)`);
  }

  const overrides: Partial<EngineConfig> = loadConfigFromEnv(env);
  if (values['keep-backup'] !== undefined) overrides.keepBackup = values['keep-backup'];
  const levelFlag = values['log-level'];
  if (levelFlag !== undefined) {
    const level = parseLogLevel(levelFlag);
    if (!level) throw new UsageError(`Unknown log level "${levelFlag}"`);
    overrides.logLevel = level;
  }

  const [workflowPath, storePath] = positionals;
  return {
    workflowPath,
    storePath,
    capabilityModules: values.capabilities ?? [],
    check: values.check ?? false,
    config: createEngineConfig(overrides),
  };
}

/** Run the command line; resolves to the process exit status. */
export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let options: CliOptions | 'help';
  try {
    options = parseCliArgs(argv, env);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    process.stderr.write(`loopflow: ${err.message}\n\n${USAGE}`);
    return EXIT_INPUT_ERROR;
  }
  if (options === 'help') {
    process.stderr.write(USAGE);
    return EXIT_COMPLETED;
  }

  setLogLevel(options.config.logLevel);
  const fileOptions = {
    workflowPath: options.workflowPath,
    storePath: options.storePath,
    capabilityModules: options.capabilityModules,
    config: options.config,
  };

  try {
    if (options.check) {
      const { definition } = await prepareFileRun(fileOptions);
      log.info('Workflow and store are valid', { workflow: definition.name, nodes: definition.flow.length });
      return EXIT_COMPLETED;
    }

    const report = await runFromFiles(fileOptions);
    if (report.status === RunStatus.Failed) {
      log.error('Run halted', {
        runId: report.runId,
        nodeId: report.failedNodeId,
        kind: report.error?.kind,
        error: report.error?.message,
      });
      return EXIT_NODE_FAILURE;
    }
    return EXIT_COMPLETED;
  } catch (err) {
    if (!isEngineError(err)) throw err;
    log.error('Cannot start run', { kind: err.kind, code: err.typedError.code, error: err.message });
    return EXIT_INPUT_ERROR;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      log.error('Unexpected failure', { error: err instanceof Error ? err.stack : String(err) });
      process.exitCode = EXIT_NODE_FAILURE;
    });
}
