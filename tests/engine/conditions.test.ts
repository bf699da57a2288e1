import { JsonObject } from '../../src/domain/json';
import { ConditionalNode } from '../../src/domain/workflow';
import {
  branchMatches,
  compareValues,
  evaluateConditionalNode,
  resolveOperand,
} from '../../src/engine/conditions';

const store: JsonObject = {
  results: { evaluation_1: { score: 0.5 }, evaluation_2: { score: 0.95 } },
};

describe('evaluateConditionalNode', () => {
  test('takes the first true branch and never evaluates later ones', () => {
    const node: ConditionalNode = {
      type: 'conditional',
      id: 'route',
      branches: [
        { value: '1', condition: { kind: 'comparator', op: '>', compareTo: '2' }, goto: 'b1' },
        { value: '3', condition: { kind: 'comparator', op: '>', compareTo: '2' }, goto: 'b2' },
        // Would raise "Division by zero" if it were ever evaluated.
        { value: '1', condition: { kind: 'script', expression: 'value / 0' }, goto: 'b3' },
      ],
      else: 'fallback',
    };
    expect(evaluateConditionalNode(node, {}, store)).toEqual({ target: 'b2', branchIndex: 1 });
  });

  test('falls back to else when no branch matches', () => {
    const node: ConditionalNode = {
      type: 'conditional',
      id: 'check',
      branches: [{ value: '5', condition: { kind: 'comparator', op: '>=', compareTo: '10' }, goto: 'END' }],
      else: 'X',
    };
    expect(evaluateConditionalNode(node, {}, store)).toEqual({ target: 'X' });
  });

  test('routes on a store value read through a dynamic path', () => {
    const node: ConditionalNode = {
      type: 'conditional',
      id: 'check_score',
      branches: [
        {
          value: 'results.evaluation_{{iter}}.score',
          condition: { kind: 'comparator', op: '>=', compareTo: '0.9' },
          goto: 'END',
        },
      ],
      else: 'evaluate',
    };
    expect(evaluateConditionalNode(node, { iter: 1 }, store).target).toBe('evaluate');
    expect(evaluateConditionalNode(node, { iter: 2 }, store).target).toBe('END');
  });

  test('discards increments made while evaluating', () => {
    const vars: JsonObject = { iter: 1 };
    const node: ConditionalNode = {
      type: 'conditional',
      id: 'peek',
      branches: [{ value: '{{++iter}}', condition: { kind: 'comparator', op: '==', compareTo: '2' }, goto: 'END' }],
      else: 'loop',
    };
    expect(evaluateConditionalNode(node, vars, store).target).toBe('END');
    expect(vars).toEqual({ iter: 1 });
  });
});

describe('branchMatches', () => {
  test('a branch without a condition always matches', () => {
    expect(branchMatches({ goto: 'next' }, {}, store)).toBe(true);
  });

  test('renders scripted expressions before evaluating them', () => {
    const vars: JsonObject = { threshold: 0.4 };
    const branch = {
      value: 'results.evaluation_1.score',
      condition: { kind: 'script' as const, expression: 'value >= {{threshold}}' },
      goto: 'END',
    };
    expect(branchMatches(branch, vars, store)).toBe(true);
  });

  test('scripted expressions see vars and store', () => {
    const branch = {
      condition: { kind: 'script' as const, expression: 'vars.iter >= 3 or store.results.evaluation_2.score > 0.9' },
      goto: 'END',
    };
    expect(branchMatches(branch, { iter: 1 }, store)).toBe(true);
  });
});

describe('resolveOperand', () => {
  const vars: JsonObject = { iter: 3 };

  test('prefers variables, then store paths, then literals', () => {
    expect(resolveOperand('iter', vars, store)).toBe(3);
    expect(resolveOperand('vars.iter', vars, store)).toBe(3);
    expect(resolveOperand('results.evaluation_1.score', vars, store)).toBe(0.5);
    expect(resolveOperand('0.9', vars, store)).toBe(0.9);
    expect(resolveOperand('hello', vars, store)).toBe('hello');
  });

  test('passes typed values through', () => {
    expect(resolveOperand(7, vars, store)).toBe(7);
    expect(resolveOperand(null, vars, store)).toBeNull();
  });
});

describe('compareValues', () => {
  test('numeric when either side is a number', () => {
    expect(compareValues('>=', '0.95', 0.9)).toBe(true);
    expect(compareValues('<', 2, '10')).toBe(true);
    expect(compareValues('==', 'x', 1)).toBe(false);
    expect(compareValues('!=', 'x', 1)).toBe(true);
  });

  test('boolean when either side is a boolean', () => {
    expect(compareValues('==', true, 'true')).toBe(true);
    expect(compareValues('==', 'yes', true)).toBe(false);
    expect(compareValues('!=', 'yes', true)).toBe(true);
  });

  test('string otherwise', () => {
    expect(compareValues('==', 'abc', 'abc')).toBe(true);
    expect(compareValues('<', 'abc', 'abd')).toBe(true);
  });
});
