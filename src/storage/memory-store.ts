/**
 * In-memory state store.
 *
 * Reference implementation for development and testing. Documents are
 * deep-copied on the way in and out so callers can never alias the held
 * version; that keeps "reload before each node" meaningful in tests.
 */

import { JsonObject, deepCopy } from '../domain/json';
import { StateStore } from './store';

export class MemoryStateStore implements StateStore {
  readonly location: string;
  private document: JsonObject;
  private saveCount = 0;

  constructor(initial: JsonObject = {}, location = 'memory://store') {
    this.document = deepCopy(initial);
    this.location = location;
  }

  async load(): Promise<JsonObject> {
    return deepCopy(this.document);
  }

  async save(document: JsonObject): Promise<void> {
    this.document = deepCopy(document);
    this.saveCount++;
  }

  /** Copy of the currently held document. */
  snapshot(): JsonObject {
    return deepCopy(this.document);
  }

  /** Replace the held document out of band, as another process might. */
  replace(document: JsonObject): void {
    this.document = deepCopy(document);
  }

  get saves(): number {
    return this.saveCount;
  }
}
