import { promises as fsp } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { EXIT_COMPLETED, EXIT_INPUT_ERROR, EXIT_NODE_FAILURE, USAGE, runCli } from '../src/cli';
import { LogLevel, getLogLevel, setLogLevel } from '../src/logger';

const CAPABILITIES = join(__dirname, 'fixtures', 'capabilities.ts');

function workflow(capability: string): Record<string, unknown> {
  return {
    name: 'cli-test',
    code_type: 'k8s',
    vars: { iter: 0 },
    flow: [
      {
        id: 'evaluate',
        type: 'execute',
        node: capability,
        skipIfOutputPresent: true,
        inputs: { code: 'original_manifest' },
        outputs: { result: 'results.evaluation_{{++iter}}', code_key: 'original_manifest' },
      },
    ],
  };
}

describe('loopflow CLI', () => {
  let dir: string;
  let workflowPath: string;
  let storePath: string;
  let stderr: jest.SpyInstance;
  let previousLevel: LogLevel;

  beforeEach(async () => {
    previousLevel = getLogLevel();
    dir = await fsp.mkdtemp(join(tmpdir(), 'loopflow-cli-'));
    workflowPath = join(dir, 'workflow.json');
    storePath = join(dir, 'store.json');
    await fsp.writeFile(workflowPath, JSON.stringify(workflow('scorer')));
    await fsp.writeFile(storePath, JSON.stringify({ original_manifest: 'kind: Pod' }));
    stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    stderr.mockRestore();
    setLogLevel(previousLevel);
    await fsp.rm(dir, { recursive: true, force: true });
  });

  async function readStore(): Promise<unknown> {
    return JSON.parse(await fsp.readFile(storePath, 'utf-8'));
  }

  test('runs the workflow and exits 0', async () => {
    const code = await runCli([workflowPath, storePath, '--capabilities', CAPABILITIES, '--log-level', 'silent'], {});

    expect(code).toBe(EXIT_COMPLETED);
    expect(await readStore()).toMatchObject({
      original_manifest: 'kind: Pod',
      results: { evaluation_1: { score: 0.5, code_key: 'original_manifest' } },
      vars: { iter: 1 },
    });
  });

  test('exits 1 when a node fails and leaves the store as it was', async () => {
    await fsp.writeFile(workflowPath, JSON.stringify(workflow('broken')));

    const code = await runCli([workflowPath, storePath, '--capabilities', CAPABILITIES, '--log-level', 'silent'], {});

    expect(code).toBe(EXIT_NODE_FAILURE);
    expect(await readStore()).toEqual({ original_manifest: 'kind: Pod' });
  });

  test('exits 2 when the definition references an unknown capability', async () => {
    const code = await runCli([workflowPath, storePath, '--log-level', 'silent'], {});
    expect(code).toBe(EXIT_INPUT_ERROR);
  });

  test('exits 2 when the store is missing', async () => {
    const code = await runCli(
      [workflowPath, join(dir, 'absent.json'), '--capabilities', CAPABILITIES, '--log-level', 'silent'],
      {},
    );
    expect(code).toBe(EXIT_INPUT_ERROR);
  });

  test('--check validates without running', async () => {
    const code = await runCli(
      [workflowPath, storePath, '--capabilities', CAPABILITIES, '--check', '--log-level', 'silent'],
      {},
    );

    expect(code).toBe(EXIT_COMPLETED);
    expect(await readStore()).toEqual({ original_manifest: 'kind: Pod' });
  });

  test('takes the log level from the environment', async () => {
    await runCli([workflowPath, storePath, '--capabilities', CAPABILITIES, '--check'], { LOOPFLOW_LOG_LEVEL: 'silent' });
    expect(getLogLevel()).toBe(LogLevel.Silent);
  });

  test('usage errors exit 2 and print usage', async () => {
    expect(await runCli([workflowPath], {})).toBe(EXIT_INPUT_ERROR);
    expect(stderr).toHaveBeenCalledWith(
      `loopflow: Expected a workflow path and a store path, got 1 argument(s)\n\n${USAGE}`,
    );

    expect(await runCli([workflowPath, storePath, '--verbose'], {})).toBe(EXIT_INPUT_ERROR);
    expect(await runCli([workflowPath, storePath, '--log-level', 'loud'], {})).toBe(EXIT_INPUT_ERROR);
    expect(stderr).toHaveBeenLastCalledWith(`loopflow: Unknown log level "loud"\n\n${USAGE}`);
  });

  test('--help prints usage and exits 0', async () => {
    expect(await runCli(['--help'], {})).toBe(EXIT_COMPLETED);
    expect(stderr).toHaveBeenCalledWith(USAGE);
  });
});
