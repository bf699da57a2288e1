/**
 * JSON file persistence for store documents.
 *
 * Each save writes a temp file beside the target, syncs it, then renames it
 * over the target. A process killed at any point leaves either the previous
 * complete document or the new one on disk.
 */

import { promises as fs } from 'fs';
import { basename, dirname, join } from 'path';
import { v4 as uuid } from 'uuid';
import { describeError, storeError } from '../domain/errors';
import { JsonObject, isJsonObject } from '../domain/json';
import { logger } from '../logger';
import { StateStore } from './store';

export interface FileStateStoreOptions {
  /** Copy the previous version to `<path>.bak` before replacing it. */
  keepBackup?: boolean;
}

const log = logger.child({ module: 'file-store' });

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export class FileStateStore implements StateStore {
  private readonly keepBackup: boolean;

  constructor(public readonly location: string, options: FileStateStoreOptions = {}) {
    this.keepBackup = options.keepBackup ?? false;
  }

  get backupLocation(): string {
    return `${this.location}.bak`;
  }

  async load(): Promise<JsonObject> {
    let raw: string;
    try {
      raw = await fs.readFile(this.location, 'utf-8');
    } catch (err) {
      if (errorCode(err) === 'ENOENT') {
        throw storeError('NOT_FOUND', this.location, `Store document not found: ${this.location}`);
      }
      throw storeError('READ_FAILED', this.location, `Could not read store document: ${describeError(err)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw storeError('INVALID_JSON', this.location, `Store document is not valid JSON: ${describeError(err)}`);
    }
    if (!isJsonObject(parsed)) {
      throw storeError('NOT_AN_OBJECT', this.location, 'Store document must be a JSON object');
    }
    return parsed;
  }

  async save(document: JsonObject): Promise<void> {
    const payload = `${JSON.stringify(document, null, 2)}\n`;
    const tmp = join(dirname(this.location), `.${basename(this.location)}.${uuid()}.tmp`);

    try {
      const handle = await fs.open(tmp, 'wx');
      try {
        await handle.writeFile(payload, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      if (this.keepBackup) {
        await this.backupCurrent();
      }
      await fs.rename(tmp, this.location);
    } catch (err) {
      await this.discardTemp(tmp);
      throw storeError('WRITE_FAILED', this.location, `Could not write store document: ${describeError(err)}`);
    }
    log.debug('Store flushed', { location: this.location, bytes: payload.length });
  }

  private async backupCurrent(): Promise<void> {
    try {
      await fs.copyFile(this.location, this.backupLocation);
    } catch (err) {
      // First save of a new document has nothing to back up.
      if (errorCode(err) !== 'ENOENT') throw err;
    }
  }

  private async discardTemp(tmp: string): Promise<void> {
    try {
      await fs.unlink(tmp);
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') {
        log.warn('Could not remove temp file', { tmp, error: describeError(err) });
      }
    }
  }
}
