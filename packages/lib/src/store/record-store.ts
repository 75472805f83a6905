/**
 * Keyed Record Store
 *
 * Minimal persistence seam shared by every agent. A store holds one
 * collection of records keyed by string id, plus a monotonically
 * increasing sequence for auto-increment keys.
 *
 * A put() of a single record is atomic: readers see either the previous
 * value or the new one, never a partial write.
 *
 * @module store/record-store
 */

import type { z } from 'zod';

// ===========================================
// Interfaces
// ===========================================

export interface RecordStore<T> {
  /** Collection name, used in logs and key prefixes */
  readonly collection: string;

  get(id: string): Promise<T | null>;

  put(id: string, value: T): Promise<void>;

  delete(id: string): Promise<boolean>;

  list(): Promise<T[]>;

  /** Next value of the collection's auto-increment sequence (starts at 1) */
  nextSequence(): Promise<number>;
}

/** Schema used to validate records read back from a store */
export type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Creates stores for named collections. Agents receive a factory so the
 * same code runs against memory in tests and Redis in production.
 */
export type RecordStoreFactory = <T>(
  collection: string,
  schema: RecordSchema<T>
) => RecordStore<T>;

// ===========================================
// In-Memory Implementation
// ===========================================

/**
 * Process-local store. Values are cloned on the way in and out so callers
 * never share references with the committed snapshot.
 */
export class MemoryRecordStore<T> implements RecordStore<T> {
  private records = new Map<string, T>();
  private sequence = 0;

  constructor(readonly collection: string) {}

  async get(id: string): Promise<T | null> {
    const value = this.records.get(id);
    return value === undefined ? null : structuredClone(value);
  }

  async put(id: string, value: T): Promise<void> {
    this.records.set(id, structuredClone(value));
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  async list(): Promise<T[]> {
    return Array.from(this.records.values(), (value) => structuredClone(value));
  }

  async nextSequence(): Promise<number> {
    this.sequence += 1;
    return this.sequence;
  }
}

/**
 * Factory producing a fresh memory store each time a collection is opened;
 * every component opens its collections once, at construction
 */
export function createMemoryStoreFactory(): RecordStoreFactory {
  return <T>(collection: string): RecordStore<T> => new MemoryRecordStore<T>(collection);
}
