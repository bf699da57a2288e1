/**
 * Storage layer interface.
 *
 * A state store owns exactly one store document. The engine reads it fresh
 * before every node and writes it back wholesale after every node that
 * changed it; backends decide how that write is made atomic.
 */

import { JsonObject } from '../domain/json';

export interface StateStore {
  /** Human-readable location, used in logs and errors. */
  readonly location: string;
  /** Read the current document. Callers own the returned copy. */
  load(): Promise<JsonObject>;
  /** Replace the document; readers see either the old or the new version. */
  save(document: JsonObject): Promise<void>;
}
