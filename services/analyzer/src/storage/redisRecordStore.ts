import type { Logger } from 'pino';
import { contentHash } from '../analysis/properties';
import { StorageError } from '../errors';
import { createLogger } from '../logger';
import { buildRecord, stringRecordSchema } from '../records';
import type { PutResult, RecordStore, StoreHealth } from '../contracts/recordStore';
import type { RecordId, StringRecord } from '../types';

/** The slice of the ioredis client this store relies on. */
export interface RecordHashClient {
  hget(key: string, field: string): Promise<string | null>;
  hgetall(key: string): Promise<Record<string, string>>;
  hset(key: string, field: string, value: string): Promise<number>;
  hdel(key: string, field: string): Promise<number>;
  ping(): Promise<string>;
}

/**
 * `RecordStore` keeping every record as a JSON field of one Redis hash.
 * Each mutation is a single command, but a read-then-write upsert from two
 * processes at once is last-write-wins for that record.
 */
export class RedisRecordStore implements RecordStore {
  constructor(
    private readonly redis: RecordHashClient,
    private readonly key: string,
    private readonly log: Logger = createLogger({ module: 'redis-record-store' }),
    private readonly onClose: () => Promise<void> = async () => {},
  ) {}

  async open() {
    await this.redis.ping();
  }

  async put(value: string): Promise<PutResult> {
    const id = contentHash(value);
    const previous = await this.getById(id);
    const record = buildRecord(value, previous);
    await this.run('hset', () => this.redis.hset(this.key, id, JSON.stringify(record)));
    this.log.debug({ id, version: record.version }, 'record stored');
    return { record, created: previous === null };
  }

  async get(value: string) {
    return this.getById(contentHash(value));
  }

  async getById(id: RecordId) {
    const raw = await this.run('hget', () => this.redis.hget(this.key, id));
    return raw === null ? null : this.decode(id, raw);
  }

  async list() {
    const all = await this.run('hgetall', () => this.redis.hgetall(this.key));
    const records = Object.entries(all).map(([id, raw]) => this.decode(id, raw));
    // hash field order is not guaranteed by redis
    return records.sort((a, b) => a.created_at.localeCompare(b.created_at) || a.id.localeCompare(b.id));
  }

  async delete(value: string) {
    const removed = await this.run('hdel', () => this.redis.hdel(this.key, contentHash(value)));
    return removed === 1;
  }

  async health(): Promise<StoreHealth> {
    try {
      await this.redis.ping();
      return 'ok';
    } catch (err) {
      this.log.error({ err }, 'Redis health check failed');
      return 'error';
    }
  }

  async close() {
    await this.onClose();
  }

  private async run<T>(command: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      this.log.error({ err, command }, 'redis command failed');
      throw new StorageError(`Redis ${command} failed`, { cause: err });
    }
  }

  private decode(id: RecordId, raw: string): StringRecord {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StorageError(`Record ${id} is not valid JSON`, { cause: err });
    }
    const parsed = stringRecordSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError(`Record ${id} has an unexpected shape`, {
        details: { issues: parsed.error.flatten() },
      });
    }
    return parsed.data;
  }
}
