import { DateTime } from 'luxon';
import type { Machine, TimeRange } from './machine.entity';
import { ConfigurationError } from './machine.errors';

export type SlotDescriptor = {
  date: string;
  slotNumber: number;
  timeRange: TimeRange;
  label: string;
};

type SlotConfig = Pick<Machine, 'slotCount' | 'slotTemplate'>;

const HH_MM = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function minutesOf(hm: string): number | null {
  const m = HH_MM.exec(hm);
  if (!m) return null;
  return Number(m[1]) * 60 + Number(m[2]);
}

export function formatRange(range: TimeRange) {
  return `${range.start}-${range.end}`;
}

function isValidRange(range: TimeRange) {
  const start = minutesOf(range.start);
  const end = minutesOf(range.end);
  return start !== null && end !== null && end > start;
}

/**
 * Expands a machine's daily template into the concrete slots of `date`.
 * Does not look at bookings.
 */
export function resolveSlots(machine: SlotConfig, date: string): SlotDescriptor[] {
  const template = machine.slotTemplate;
  if (!Array.isArray(template) || template.length !== machine.slotCount) {
    throw new ConfigurationError('slot_template_mismatch');
  }
  return template.map((range, index) => {
    if (!isValidRange(range)) throw new ConfigurationError('invalid_slot_template');
    return {
      date,
      slotNumber: index + 1,
      timeRange: { start: range.start, end: range.end },
      label: formatRange(range),
    };
  });
}

/**
 * Parses admin input such as ["07:00-08:30", "08:30-10:00"].
 * Ranges must be ascending and may touch but not overlap.
 */
export function parseSlotTemplate(raw: string[]): TimeRange[] {
  const ranges: TimeRange[] = [];
  let previousEnd = -1;
  for (const entry of raw) {
    const [start, end, ...rest] = entry.split('-').map((part) => part.trim());
    if (!start || !end || rest.length > 0) throw new ConfigurationError('invalid_slot_template');
    const range = { start, end };
    if (!isValidRange(range)) throw new ConfigurationError('invalid_slot_template');
    const startMinutes = minutesOf(start) ?? 0;
    if (startMinutes < previousEnd) throw new ConfigurationError('invalid_slot_template');
    previousEnd = minutesOf(end) ?? 0;
    ranges.push(range);
  }
  if (ranges.length === 0) throw new ConfigurationError('invalid_slot_template');
  return ranges;
}

export function slotStart(date: string, range: TimeRange, zone: string) {
  const minutes = minutesOf(range.start) ?? 0;
  return DateTime.fromISO(date, { zone })
    .startOf('day')
    .plus({ minutes });
}
