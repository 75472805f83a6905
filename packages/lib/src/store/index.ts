/**
 * Record Stores
 *
 * @module store
 */

export {
  MemoryRecordStore,
  createMemoryStoreFactory,
  type RecordStore,
  type RecordSchema,
  type RecordStoreFactory,
} from './record-store';

export {
  RedisRecordStore,
  createRedisClient,
  createRedisStoreFactory,
  recordKey,
  indexKey,
  sequenceKey,
  KEY_PREFIX,
  type RedisConfig,
} from './redis-store';
