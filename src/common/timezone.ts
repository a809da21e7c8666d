import { ConfigService } from '@nestjs/config';
import { DateTime, IANAZone } from 'luxon';

export const DEFAULT_TIMEZONE = 'Asia/Kolkata';

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

export function resolveTimezone(cfg: ConfigService) {
  const zone = cfg.get<string>('APP_TIMEZONE')?.trim();
  return zone && IANAZone.isValidZone(zone) ? zone : DEFAULT_TIMEZONE;
}

export function isoDay(dt: DateTime) {
  const day = dt.toISODate();
  if (!day) throw new Error(`invalid date: ${dt.invalidReason ?? 'unknown'}`);
  return day;
}

export function todayIn(zone: string) {
  return isoDay(DateTime.now().setZone(zone));
}

/**
 * Strict `YYYY-MM-DD` parse into the start of that day in `zone`.
 * Returns null for anything else, including impossible dates like 2025-02-30.
 */
export function parseDay(value: string, zone: string): DateTime | null {
  if (!ISO_DAY.test(value)) return null;
  const dt = DateTime.fromISO(value, { zone });
  return dt.isValid ? dt.startOf('day') : null;
}

export function shiftDay(day: string, days: number, zone: string) {
  const parsed = parseDay(day, zone);
  if (!parsed) throw new Error(`invalid day: ${day}`);
  return isoDay(parsed.plus({ days }));
}
