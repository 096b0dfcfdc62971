import type { RecordId, StringRecord } from '../types';

/** Result of an upsert: the stored record and whether it was newly created. */
export interface PutResult {
  record: StringRecord;
  created: boolean;
}

export type StoreHealth = 'ok' | 'error';

/**
 * Keyed persistence for analyzed strings. Records are addressed by the
 * content hash of their value, so writing the same value twice overwrites
 * rather than duplicates.
 */
export interface RecordStore {
  open(): Promise<void>;
  put(value: string): Promise<PutResult>;
  get(value: string): Promise<StringRecord | null>;
  getById(id: RecordId): Promise<StringRecord | null>;
  /** Stable order within a process. */
  list(): Promise<StringRecord[]>;
  delete(value: string): Promise<boolean>;
  health(): Promise<StoreHealth>;
  close(): Promise<void>;
}
