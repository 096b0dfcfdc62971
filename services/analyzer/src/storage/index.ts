import { config } from '../config';
import { closeRedis, getRedis } from '../redis/client';
import { JsonFileStore } from './jsonFileStore';
import { RedisRecordStore } from './redisRecordStore';
import type { RecordStore } from '../contracts/recordStore';

export function createRecordStore(): RecordStore {
  switch (config.storage.driver) {
    case 'file':
      return new JsonFileStore(config.storage.dataFile);
    case 'redis':
      return new RedisRecordStore(getRedis(), config.storage.redisKey, undefined, closeRedis);
  }
}
