/**
 * Capability module loaded by the CLI tests through --capabilities.
 */

import { CapabilityRegistry } from '../../src/engine/capability';

export function register(registry: CapabilityRegistry): void {
  registry
    .register('scorer', () => ({ result: { score: 0.5 } }))
    .register('broken', () => {
      throw new Error('quota exceeded');
    });
}
