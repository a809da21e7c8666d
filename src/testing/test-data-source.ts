import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { DateTime, Settings } from 'luxon';
import { ENTITIES } from '../database/entities';

/** Fresh in-memory database with the production entities, indexes and cascades. */
export function createTestDataSource() {
  const ds = new DataSource({
    type: 'better-sqlite3',
    database: ':memory:',
    entities: ENTITIES,
    synchronize: true,
  });
  return ds.initialize();
}

export function testConfig(values: Record<string, string> = {}) {
  return new ConfigService({
    JWT_SECRET: 'test-secret',
    APP_TIMEZONE: 'Asia/Kolkata',
    ...values,
  });
}

/** Pins luxon's clock to a wall-clock time in Asia/Kolkata. */
export function freezeTime(localIso: string) {
  const millis = DateTime.fromISO(localIso, { zone: 'Asia/Kolkata' }).toMillis();
  Settings.now = () => millis;
}

export function unfreezeTime() {
  Settings.now = () => Date.now();
}
