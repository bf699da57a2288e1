import { CapabilityRegistry } from '../../src/engine/capability';

describe('CapabilityRegistry', () => {
  test('wraps bare functions and keeps objects as they are', async () => {
    const validator = { evaluate: () => ({ result: { passed: true } }) };
    const registry = new CapabilityRegistry({ scorer: () => ({ result: 1 }) }).register('validator', validator);

    expect(registry.names()).toEqual(['scorer', 'validator']);
    expect(registry.get('validator')).toBe(validator);
    expect(await registry.get('scorer')?.evaluate({}, {})).toEqual({ result: 1 });
  });

  test('later registrations replace earlier ones', () => {
    const registry = new CapabilityRegistry();
    registry.register('scorer', () => ({ result: 1 }));
    registry.register('scorer', () => ({ result: 2 }));
    expect(registry.get('scorer')?.evaluate({}, {})).toEqual({ result: 2 });
    expect(registry.has('scorer')).toBe(true);
    expect(registry.has('transformer')).toBe(false);
  });

  test('rejects blank names', () => {
    expect(() => new CapabilityRegistry().register('  ', () => ({}))).toThrow(
      'Capability name must be a non-empty string',
    );
  });
});
