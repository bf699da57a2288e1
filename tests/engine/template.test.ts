import { EngineError, ErrorKind } from '../../src/domain/errors';
import { JsonObject } from '../../src/domain/json';
import {
  hasPlaceholders,
  parseLiteral,
  renderPath,
  renderString,
  renderValue,
} from '../../src/engine/template';

function kindOf(fn: () => unknown): ErrorKind {
  try {
    fn();
  } catch (err) {
    if (err instanceof EngineError) return err.kind;
    throw err;
  }
  throw new Error('expected an EngineError');
}

describe('renderString', () => {
  test('pre-increment then post-increment is deterministic', () => {
    const vars: JsonObject = { n: 0 };

    expect(renderString('{{++n}}', vars, {})).toBe(1);
    expect(vars.n).toBe(1);

    expect(renderString('{{n++}}', vars, {})).toBe(1);
    expect(vars.n).toBe(2);
  });

  test('increments are visible to later placeholders in the same pass', () => {
    expect(renderString('{{++n}}-{{n}}', { n: 0 }, {})).toBe('1-1');
    expect(renderString('{{n++}}-{{n}}', { n: 0 }, {})).toBe('0-1');
  });

  test('interpolates dynamic store paths', () => {
    expect(renderString('results.evaluation_{{k}}', { k: 3 }, {})).toBe('results.evaluation_3');
  });

  test('a lone placeholder keeps its type', () => {
    expect(renderString('{{flag}}', { flag: true }, {})).toBe(true);
    expect(renderString('  {{n}} ', { n: 4 }, {})).toBe(4);
    expect(renderString('{{nothing}}', { nothing: null }, {})).toBeNull();
  });

  test('stringifies values inside longer templates', () => {
    const vars: JsonObject = { obj: { a: 1 }, f: false, z: null };
    expect(renderString('x={{obj}}', vars, {})).toBe('x={"a":1}');
    expect(renderString('b={{f}} z={{z}}', vars, {})).toBe('b=false z=null');
  });

  test('reads nested variables and store values', () => {
    const vars: JsonObject = { cfg: { depth: 2 } };
    const store: JsonObject = { results: { latest: 'evaluation_2' } };
    expect(renderString('{{vars.cfg.depth}}', vars, store)).toBe(2);
    expect(renderString('results.{{store.results.latest}}', vars, store)).toBe('results.evaluation_2');
  });

  test('accepts literals', () => {
    expect(renderString('{{3}}', {}, {})).toBe(3);
    expect(renderString('{{TRUE}}', {}, {})).toBe(true);
    expect(renderString('{{none}}', {}, {})).toBeNull();
  });

  test('increments through the vars prefix and dotted paths', () => {
    const vars: JsonObject = { n: 4, loop: { pass: 1 } };
    expect(renderString('{{vars.n++}}', vars, {})).toBe(4);
    expect(renderString('{{++loop.pass}}', vars, {})).toBe(2);
    expect(vars).toEqual({ n: 5, loop: { pass: 2 } });
  });

  test('leaves templates without placeholders untouched', () => {
    expect(renderString('plain text', {}, {})).toBe('plain text');
  });

  test('fails on a referenced variable that does not exist', () => {
    expect(kindOf(() => renderString('{{missing}}', {}, {}))).toBe('UnresolvedVariable');
    expect(kindOf(() => renderString('{{store.results.none}}', {}, { results: {} }))).toBe('UnresolvedVariable');
    expect(kindOf(() => renderString('{{++missing}}', {}, {}))).toBe('UnresolvedVariable');
  });

  test('fails on a non-numeric increment and on an empty placeholder', () => {
    expect(kindOf(() => renderString('{{++s}}', { s: 'a' }, {}))).toBe('TemplateError');
    expect(kindOf(() => renderString('{{ }}', {}, {}))).toBe('TemplateError');
  });
});

describe('renderValue', () => {
  test('renders nested arrays and objects', () => {
    const vars: JsonObject = { n: 1 };
    expect(renderValue({ a: ['{{n}}', 'k{{n}}'], b: 2 }, vars, {})).toEqual({ a: [1, 'k1'], b: 2 });
  });
});

describe('helpers', () => {
  test('renderPath stringifies typed results', () => {
    expect(renderPath('{{k}}', { k: 3 }, {})).toBe('3');
  });

  test('hasPlaceholders', () => {
    expect(hasPlaceholders('value >= {{threshold}}')).toBe(true);
    expect(hasPlaceholders('value >= 0.9')).toBe(false);
  });

  test('parseLiteral', () => {
    expect(parseLiteral('0.9')).toBe(0.9);
    expect(parseLiteral('False')).toBe(false);
    expect(parseLiteral('results.a')).toBeUndefined();
  });
});
