/**
 * Upstash Redis Record Store
 *
 * Key patterns:
 * - {prefix}:{collection}:{id}  - record value (JSON)
 * - {prefix}:{collection}:ids   - set of ids in the collection
 * - {prefix}:{collection}:seq   - auto-increment counter
 *
 * Records are validated against their schema when read back, so a
 * garbled value surfaces as a ZodError instead of a mistyped object.
 *
 * @module store/redis-store
 */

import { Redis } from '@upstash/redis';
import type { RecordStore, RecordSchema, RecordStoreFactory } from './record-store';

// =============================================================================
// Configuration
// =============================================================================

export const KEY_PREFIX = 'prospector';

export interface RedisConfig {
  url: string;
  token: string;
}

/**
 * Create an Upstash client, or null when the REST credentials are missing
 */
export function createRedisClient(config: Partial<RedisConfig>): Redis | null {
  if (!config.url || !config.token) {
    return null;
  }
  return new Redis({ url: config.url, token: config.token });
}

// =============================================================================
// Key Builders
// =============================================================================

export function recordKey(collection: string, id: string, prefix: string = KEY_PREFIX): string {
  return `${prefix}:${collection}:${id}`;
}

export function indexKey(collection: string, prefix: string = KEY_PREFIX): string {
  return `${prefix}:${collection}:ids`;
}

export function sequenceKey(collection: string, prefix: string = KEY_PREFIX): string {
  return `${prefix}:${collection}:seq`;
}

// =============================================================================
// Store
// =============================================================================

export class RedisRecordStore<T> implements RecordStore<T> {
  constructor(
    private readonly client: Redis,
    readonly collection: string,
    private readonly schema: RecordSchema<T>,
    private readonly prefix: string = KEY_PREFIX
  ) {}

  async get(id: string): Promise<T | null> {
    const raw = await this.client.get<unknown>(recordKey(this.collection, id, this.prefix));
    return raw === null ? null : this.schema.parse(raw);
  }

  async put(id: string, value: T): Promise<void> {
    const pipeline = this.client.pipeline();
    pipeline.set(recordKey(this.collection, id, this.prefix), value);
    pipeline.sadd(indexKey(this.collection, this.prefix), id);
    await pipeline.exec();
  }

  async delete(id: string): Promise<boolean> {
    const pipeline = this.client.pipeline();
    pipeline.del(recordKey(this.collection, id, this.prefix));
    pipeline.srem(indexKey(this.collection, this.prefix), id);
    const [deleted] = await pipeline.exec();
    return typeof deleted === 'number' && deleted > 0;
  }

  async list(): Promise<T[]> {
    const ids = await this.client.smembers(indexKey(this.collection, this.prefix));
    if (ids.length === 0) return [];

    const keys = ids.map((id) => recordKey(this.collection, id, this.prefix));
    const values = await this.client.mget<unknown[]>(...keys);

    return values
      .filter((value) => value !== null && value !== undefined)
      .map((value) => this.schema.parse(value));
  }

  async nextSequence(): Promise<number> {
    return this.client.incr(sequenceKey(this.collection, this.prefix));
  }
}

/**
 * Factory producing Redis-backed stores that share one client
 */
export function createRedisStoreFactory(
  client: Redis,
  prefix: string = KEY_PREFIX
): RecordStoreFactory {
  return <T>(collection: string, schema: RecordSchema<T>): RecordStore<T> =>
    new RedisRecordStore(client, collection, schema, prefix);
}
