import 'dotenv/config';

export type StorageDriver = 'file' | 'redis';

const STORAGE_DRIVERS: readonly StorageDriver[] = ['file', 'redis'];

function parseDriver(raw: string | undefined): StorageDriver {
  const value = (raw || 'file').toLowerCase();
  const driver = STORAGE_DRIVERS.find((d) => d === value);
  if (!driver) {
    throw new Error(`Unsupported storage driver: ${raw}`);
  }
  return driver;
}

export const config = {
  port: parseInt(process.env.PORT || '8080', 10),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  storage: {
    driver: parseDriver(process.env.STORAGE_DRIVER),
    dataFile: process.env.DATA_FILE || 'data/strings.json',
    redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
    // single hash holding every record as a JSON field
    redisKey: process.env.REDIS_RECORDS_KEY || 'strings:records',
  },
};
