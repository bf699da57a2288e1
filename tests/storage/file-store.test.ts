import { promises as fsp } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { isEngineError } from '../../src/domain/errors';
import { FileStateStore } from '../../src/storage/file-store';

async function storeErrorCode(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    if (isEngineError(err)) {
      expect(err.kind).toBe('StoreError');
      return err.typedError.code;
    }
    throw err;
  }
  throw new Error('expected a StoreError');
}

describe('FileStateStore', () => {
  let dir: string;
  let location: string;

  beforeEach(async () => {
    dir = await fsp.mkdtemp(join(tmpdir(), 'loopflow-store-'));
    location = join(dir, 'store.json');
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fsp.rm(dir, { recursive: true, force: true });
  });

  test('reports a missing document', async () => {
    const store = new FileStateStore(location);
    expect(await storeErrorCode(store.load())).toBe('STORE.NOT_FOUND');
  });

  test('rejects invalid JSON and non-object documents', async () => {
    const store = new FileStateStore(location);
    await fsp.writeFile(location, '{ not json');
    expect(await storeErrorCode(store.load())).toBe('STORE.INVALID_JSON');

    await fsp.writeFile(location, '[1, 2]');
    expect(await storeErrorCode(store.load())).toBe('STORE.NOT_AN_OBJECT');
  });

  test('saves and reloads the whole document', async () => {
    const store = new FileStateStore(location);
    await store.save({ instruction: 'shrink it', vars: { iter: 2 } });

    expect(await store.load()).toEqual({ instruction: 'shrink it', vars: { iter: 2 } });
    const text = await fsp.readFile(location, 'utf-8');
    expect(text.endsWith('}\n')).toBe(true);
  });

  test('leaves no temp files behind after a save', async () => {
    const store = new FileStateStore(location);
    await store.save({ a: 1 });
    await store.save({ a: 2 });
    expect(await fsp.readdir(dir)).toEqual(['store.json']);
  });

  test('keeps the previous version as a backup when asked', async () => {
    const store = new FileStateStore(location, { keepBackup: true });
    await store.save({ version: 1 });
    expect(await fsp.readdir(dir)).toEqual(['store.json']);

    await store.save({ version: 2 });
    const backup = JSON.parse(await fsp.readFile(store.backupLocation, 'utf-8'));
    expect(backup).toEqual({ version: 1 });
    expect(await store.load()).toEqual({ version: 2 });
  });

  test('a save interrupted before the replace leaves the previous document intact', async () => {
    const store = new FileStateStore(location);
    await store.save({ results: { evaluation_1: { score: 0.5 } } });
    const before = await fsp.readFile(location, 'utf-8');

    jest.spyOn(fsp, 'rename').mockRejectedValueOnce(new Error('simulated crash'));

    expect(await storeErrorCode(store.save({ results: {}, vars: { iter: 9 } }))).toBe('STORE.WRITE_FAILED');
    expect(await fsp.readFile(location, 'utf-8')).toBe(before);
    expect(await fsp.readdir(dir)).toEqual(['store.json']);
  });
});
