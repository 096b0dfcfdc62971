import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { computeProperties, contentHash } from '../src/analysis/properties';
import { StorageError } from '../src/errors';
import { JsonFileStore } from '../src/storage/jsonFileStore';
import { createRecordStore } from '../src/storage';

describe('JsonFileStore', () => {
  let dir: string;
  let file: string;
  let store: JsonFileStore;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'strings-store-'));
    file = path.join(dir, 'data', 'strings.json');
    store = new JsonFileStore(file);
    await store.open();
  });

  afterEach(async () => {
    await store.close();
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty when the document does not exist', async () => {
    expect(await store.list()).toEqual([]);
    expect(await store.health()).toBe('ok');
  });

  it('put -> get returns freshly computed properties', async () => {
    const { record, created } = await store.put('level');
    expect(created).toBe(true);
    expect(record.id).toBe(contentHash('level'));
    expect(record.version).toBe(1);
    expect(record.created_at).toBe(record.updated_at);

    const read = await store.get('level');
    expect(read).toEqual(record);
    expect(read?.properties).toEqual(computeProperties('level'));
    expect(await store.getById(record.id)).toEqual(record);
  });

  it('upserts the same value instead of duplicating it', async () => {
    const first = await store.put('same');
    const second = await store.put('same');

    expect(second.created).toBe(false);
    expect(second.record.id).toBe(first.record.id);
    expect(second.record.version).toBe(2);
    expect(second.record.created_at).toBe(first.record.created_at);
    expect(Date.parse(second.record.updated_at)).toBeGreaterThan(Date.parse(second.record.created_at));
    expect(await store.list()).toHaveLength(1);
  });

  it('lists in insertion order, keeping position on overwrite', async () => {
    await store.put('b');
    await store.put('a');
    await store.put('c');
    await store.put('b');
    expect((await store.list()).map((r) => r.value)).toEqual(['b', 'a', 'c']);
  });

  it('persists every mutation to the document', async () => {
    const { record } = await store.put('persisted');
    const doc = JSON.parse(await readFile(file, 'utf8')) as Record<string, { value: string }>;
    expect(Object.keys(doc)).toEqual([record.id]);
    expect(doc[record.id].value).toBe('persisted');

    const reopened = new JsonFileStore(file);
    expect(await reopened.get('persisted')).toEqual(record);
  });

  it('leaves no temp files behind', async () => {
    await store.put('one');
    await store.put('two');
    await store.delete('one');
    expect(await readdir(path.dirname(file))).toEqual(['strings.json']);
  });

  it('delete reports whether a record existed', async () => {
    await store.put('gone');
    expect(await store.delete('gone')).toBe(true);
    expect(await store.get('gone')).toBeNull();
    expect(await store.delete('gone')).toBe(false);
  });

  it('frees the id for reuse after delete', async () => {
    await store.put('again');
    await store.put('again');
    await store.delete('again');
    const { record, created } = await store.put('again');
    expect(created).toBe(true);
    expect(record.version).toBe(1);
  });

  it('serializes concurrent writers', async () => {
    const values = Array.from({ length: 10 }, (_, i) => `value-${i}`);
    await Promise.all(values.map((v) => store.put(v)));
    expect((await store.list()).map((r) => r.value).sort()).toEqual([...values].sort());

    const doc = JSON.parse(await readFile(file, 'utf8')) as Record<string, unknown>;
    expect(Object.keys(doc)).toHaveLength(10);
  });

  it('fails loudly on a corrupt document and does not rewrite it', async () => {
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, '{not json', 'utf8');

    const fresh = new JsonFileStore(file);
    await expect(fresh.list()).rejects.toBeInstanceOf(StorageError);
    await expect(store.put('x')).rejects.toBeInstanceOf(StorageError);
    expect(await store.health()).toBe('error');
    expect(await readFile(file, 'utf8')).toBe('{not json');
  });

  it('rejects a document with the wrong shape', async () => {
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, JSON.stringify({ abc: { value: 1 } }), 'utf8');
    await expect(new JsonFileStore(file).open()).rejects.toThrow(/does not contain a record document/);
  });

  it('keeps serving the last good snapshot to readers', async () => {
    await store.put('kept');
    await writeFile(file, '[]', 'utf8');
    await expect(store.put('next')).rejects.toBeInstanceOf(StorageError);
    expect((await store.list()).map((r) => r.value)).toEqual(['kept']);
  });
});

describe('createRecordStore', () => {
  it('defaults to the JSON file store', () => {
    expect(createRecordStore()).toBeInstanceOf(JsonFileStore);
  });
});
