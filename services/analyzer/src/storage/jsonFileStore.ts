import { mkdir, open, readFile, rename, rm } from 'fs/promises';
import path from 'path';
import type { Logger } from 'pino';
import { contentHash } from '../analysis/properties';
import { StorageError } from '../errors';
import { createLogger } from '../logger';
import { buildRecord, recordDocumentSchema } from '../records';
import type { PutResult, RecordStore, StoreHealth } from '../contracts/recordStore';
import type { RecordId, StringRecord } from '../types';

type Snapshot = ReadonlyMap<RecordId, StringRecord>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * `RecordStore` over a single JSON document mapping content hash to record.
 *
 * Mutations are serialized: each one reloads the document, applies its change
 * to a copy, writes and fsyncs a temp file, renames it into place, fsyncs the
 * directory, and only then publishes the copy as the new read snapshot. Readers therefore see
 * either the previous or the next committed state, never a partial one.
 */
export class JsonFileStore implements RecordStore {
  private snapshot: Snapshot = new Map();
  private loaded = false;
  private tail: Promise<void> = Promise.resolve();
  private tmpSeq = 0;

  constructor(
    private readonly filePath: string,
    private readonly log: Logger = createLogger({ module: 'json-file-store' }),
  ) {}

  async open() {
    this.snapshot = await this.load();
    this.loaded = true;
    this.log.debug({ file: this.filePath, records: this.snapshot.size }, 'record store loaded');
  }

  put(value: string): Promise<PutResult> {
    return this.mutate((records) => {
      const id = contentHash(value);
      const previous = records.get(id) ?? null;
      const record = buildRecord(value, previous);
      records.set(id, record);
      return { result: { record, created: previous === null }, changed: true };
    });
  }

  async get(value: string) {
    return this.getById(contentHash(value));
  }

  async getById(id: RecordId) {
    const records = await this.read();
    return records.get(id) ?? null;
  }

  async list() {
    const records = await this.read();
    return Array.from(records.values());
  }

  delete(value: string): Promise<boolean> {
    return this.mutate((records) => {
      const removed = records.delete(contentHash(value));
      return { result: removed, changed: removed };
    });
  }

  async health(): Promise<StoreHealth> {
    try {
      await this.load();
      return 'ok';
    } catch (err) {
      this.log.error({ err }, 'record store health check failed');
      return 'error';
    }
  }

  async close() {
    // let queued writes land before the process lets go of the file
    await this.tail;
  }

  private async read(): Promise<Snapshot> {
    if (!this.loaded) await this.open();
    return this.snapshot;
  }

  private mutate<T>(apply: (records: Map<RecordId, StringRecord>) => { result: T; changed: boolean }): Promise<T> {
    const run = this.tail.then(async () => {
      const records = new Map(await this.load());
      const { result, changed } = apply(records);
      if (changed) await this.flush(records);
      this.snapshot = records;
      this.loaded = true;
      return result;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async load(): Promise<Snapshot> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return new Map();
      throw new StorageError(`Unable to read ${this.filePath}`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StorageError(`${this.filePath} is not valid JSON`, { cause: err });
    }

    const parsed = recordDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError(`${this.filePath} does not contain a record document`, {
        details: { issues: parsed.error.flatten() },
      });
    }
    return new Map(Object.entries(parsed.data));
  }

  private async flush(records: Snapshot) {
    const dir = path.dirname(this.filePath);
    this.tmpSeq += 1;
    const tmp = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.${this.tmpSeq}.tmp`);
    const body = JSON.stringify(Object.fromEntries(records), null, 2);

    try {
      await mkdir(dir, { recursive: true });
      const handle = await open(tmp, 'w');
      try {
        await handle.writeFile(body, 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmp, this.filePath);
      // the rename itself is only durable once the directory entry is synced
      await this.syncDirectory(dir);
    } catch (err) {
      await rm(tmp, { force: true });
      this.log.error({ err, file: this.filePath }, 'failed to persist record document');
      throw new StorageError(`Unable to write ${this.filePath}`, { cause: err });
    }
    this.log.debug({ file: this.filePath, records: records.size }, 'record document flushed');
  }

  private async syncDirectory(dir: string) {
    const handle = await open(dir, 'r');
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  }
}
