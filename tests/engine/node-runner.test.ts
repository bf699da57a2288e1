import { JsonObject } from '../../src/domain/json';
import { ExecuteNode } from '../../src/domain/workflow';
import { CapabilityContext, CapabilityRegistry } from '../../src/engine/capability';
import { NodeRunner, primaryOutputName, requiredOutputKeys } from '../../src/engine/node-runner';

const NOW = '2026-01-01T00:00:00.000Z';

function executeNode(overrides: Partial<ExecuteNode> = {}): ExecuteNode {
  return {
    type: 'execute',
    id: 'evaluate',
    node: 'scorer',
    skipIfOutputPresent: false,
    inputs: {},
    outputs: { result: 'results.evaluation_{{++iter}}' },
    ...overrides,
  };
}

describe('NodeRunner', () => {
  let registry: CapabilityRegistry;
  let runner: NodeRunner;
  let scorer: jest.Mock<JsonObject, [CapabilityContext, JsonObject]>;

  beforeEach(() => {
    scorer = jest.fn((_context: CapabilityContext, _params: JsonObject): JsonObject => ({ result: { score: 0.5 } }));
    registry = new CapabilityRegistry({ scorer });
    runner = new NodeRunner({ registry, provenanceSuffix: '_key', now: () => NOW });
  });

  test('runs the capability and writes outputs with metadata and provenance', async () => {
    const store: JsonObject = { latest_code: 'replicas: 3', instruction: 'shrink' };
    const vars: JsonObject = { iter: 0 };
    const node = executeNode({
      inputs: { code: 'latest_code', instruction: '{{store.instruction}}' },
      outputs: { result: 'results.evaluation_{{++iter}}', code_key: 'latest_code' },
    });

    const outcome = await runner.runExecuteNode(node, vars, store);

    expect(outcome).toEqual({ action: 'executed', written: ['results.evaluation_1'] });
    expect(scorer).toHaveBeenCalledWith(
      { latest_code: 'replicas: 3', instruction: 'shrink', vars: { iter: 0 } },
      { code: 'replicas: 3', instruction: 'shrink' },
    );
    expect(store.results).toEqual({
      evaluation_1: { score: 0.5, created_at: NOW, code_key: 'latest_code' },
    });
    expect(vars).toEqual({ iter: 1 });
  });

  test('hands the capability a frozen snapshot', async () => {
    let frozen = false;
    registry.register('inspect', (context) => {
      frozen = Object.isFrozen(context) && Object.isFrozen(context.vars);
      return { result: 'ok' };
    });
    await runner.runExecuteNode(executeNode({ node: 'inspect', outputs: { result: 'out' } }), {}, {});
    expect(frozen).toBe(true);
  });

  test('skips when the primary output exists and replays increments', async () => {
    const store: JsonObject = { results: { evaluation_1: { score: 0.9 } } };
    const vars: JsonObject = { iter: 0 };
    const node = executeNode({ skipIfOutputPresent: true });

    const outcome = await runner.runExecuteNode(node, vars, store);

    expect(outcome).toEqual({ action: 'skipped', written: [] });
    expect(scorer).not.toHaveBeenCalled();
    expect(store).toEqual({ results: { evaluation_1: { score: 0.9 } } });
    expect(vars).toEqual({ iter: 1 });
  });

  test('the skip check does not consume an increment when the node runs', async () => {
    const store: JsonObject = {};
    const vars: JsonObject = { iter: 0 };

    const outcome = await runner.runExecuteNode(executeNode({ skipIfOutputPresent: true }), vars, store);

    expect(outcome.written).toEqual(['results.evaluation_1']);
    expect(vars).toEqual({ iter: 1 });
  });

  test('vars outputs assign variables without a capability value', async () => {
    const vars: JsonObject = {};
    const node = executeNode({
      outputs: { result: 'results.fix_{{attempt}}', 'vars.latest_code_key': 'results.fix_{{attempt}}' },
    });
    vars.attempt = 2;

    await runner.runExecuteNode(node, vars, {});

    expect(vars).toEqual({ attempt: 2, latest_code_key: 'results.fix_2' });
  });

  test('value outputs with a vars destination write into the variables', async () => {
    registry.register('scorer', () => ({ result: { score: 0.7 }, score: 0.7 }));
    const vars: JsonObject = {};
    const store: JsonObject = {};
    const node = executeNode({ outputs: { result: 'results.latest', score: 'vars.last_score' } });

    const outcome = await runner.runExecuteNode(node, vars, store);

    expect(outcome.written).toEqual(['results.latest', 'vars.last_score']);
    expect(vars).toEqual({ last_score: 0.7 });
    expect(store).toEqual({ results: { latest: { score: 0.7, created_at: NOW } } });
  });

  test('primitive primary outputs get a metadata sibling', async () => {
    registry.register('scorer', () => ({ result: 0.7 }));
    const store: JsonObject = {};
    const node = executeNode({ outputs: { result: 'results.score', source_key: 'original_manifest' } });

    await runner.runExecuteNode(node, {}, store);

    expect(store).toEqual({
      results: { score: 0.7, score_metadata: { created_at: NOW, source_key: 'original_manifest' } },
    });
  });

  test('secondary outputs get created_at but not provenance', async () => {
    registry.register('scorer', () => ({ result: { score: 1 }, report: { text: 'ok' } }));
    const store: JsonObject = {};
    const node = executeNode({
      outputs: { result: 'results.eval', report: 'reports.latest', code_key: 'latest_code' },
    });

    await runner.runExecuteNode(node, {}, store);

    expect(store).toEqual({
      results: { eval: { score: 1, created_at: NOW, code_key: 'latest_code' } },
      reports: { latest: { text: 'ok', created_at: NOW } },
    });
  });

  test('accepts async capabilities', async () => {
    registry.register('scorer', async () => ({ result: 'done' }));
    const store: JsonObject = {};
    await runner.runExecuteNode(executeNode({ outputs: { result: 'out' } }), {}, store);
    expect(store).toEqual({ out: 'done', out_metadata: { created_at: NOW } });
  });

  test('a missing output fails the node without writing', async () => {
    const store: JsonObject = { untouched: true };
    const node = executeNode({ outputs: { result: 'results.a', report: 'reports.a' } });

    await expect(runner.runExecuteNode(node, { iter: 0 }, store)).rejects.toMatchObject({
      typedError: { kind: 'CapabilityError', code: 'CAPABILITY.MISSING_OUTPUT', details: { missing: ['report'] } },
    });
    expect(store).toEqual({ untouched: true });
  });

  test('wraps errors thrown by the capability', async () => {
    registry.register('scorer', () => {
      throw new Error('boom');
    });
    await expect(runner.runExecuteNode(executeNode(), { iter: 0 }, {})).rejects.toMatchObject({
      message: 'Capability "scorer" failed: boom',
      typedError: { kind: 'CapabilityError', code: 'CAPABILITY.INVOCATION_FAILED' },
    });
  });

  test('rejects a result that is not an object', async () => {
    registry.register('scorer', () => JSON.parse('[1, 2]'));
    await expect(runner.runExecuteNode(executeNode(), { iter: 0 }, {})).rejects.toMatchObject({
      typedError: { code: 'CAPABILITY.INVALID_RESULT' },
    });
  });

  test('fails for an unregistered capability', async () => {
    await expect(runner.runExecuteNode(executeNode({ node: 'nope' }), { iter: 0 }, {})).rejects.toMatchObject({
      typedError: { code: 'CAPABILITY.NOT_REGISTERED', details: { capability: 'nope', available: ['scorer'] } },
    });
  });

  test('an unresolved input variable fails before the capability runs', async () => {
    const node = executeNode({ inputs: { code: '{{missing}}' } });
    await expect(runner.runExecuteNode(node, { iter: 0 }, {})).rejects.toMatchObject({
      typedError: { kind: 'UnresolvedVariable' },
    });
    expect(scorer).not.toHaveBeenCalled();
  });
});

describe('output classification', () => {
  const node = executeNode({
    outputs: { report: 'reports.a', code_key: 'latest', 'vars.n': '{{n}}', result: 'results.a' },
  });

  test('required keys exclude provenance and vars outputs', () => {
    expect(requiredOutputKeys(node, '_key')).toEqual(['report', 'result']);
  });

  test('result is primary when declared, else the first value output', () => {
    expect(primaryOutputName(node, '_key')).toBe('result');
    expect(primaryOutputName(executeNode({ outputs: { report: 'r', code_key: 'c' } }), '_key')).toBe('report');
    expect(primaryOutputName(executeNode({ outputs: { code_key: 'c' } }), '_key')).toBeUndefined();
  });
});
