import { ConfigurationError } from './machine.errors';
import { parseSlotTemplate, resolveSlots, slotStart } from './slot-template';

const template = [
  { start: '07:00', end: '08:30' },
  { start: '08:30', end: '10:00' },
  { start: '10:00', end: '11:30' },
];

describe('resolveSlots', () => {
  it('returns one descriptor per configured slot, numbered from 1', () => {
    const slots = resolveSlots({ slotCount: 3, slotTemplate: template }, '2025-06-10');

    expect(slots.map((s) => s.slotNumber)).toEqual([1, 2, 3]);
    expect(slots[1]).toEqual({
      date: '2025-06-10',
      slotNumber: 2,
      timeRange: { start: '08:30', end: '10:00' },
      label: '08:30-10:00',
    });
  });

  it('gives the same slots for every day', () => {
    const a = resolveSlots({ slotCount: 3, slotTemplate: template }, '2025-06-01');
    const b = resolveSlots({ slotCount: 3, slotTemplate: template }, '2025-12-31');
    expect(a.map((s) => s.label)).toEqual(b.map((s) => s.label));
  });

  it('throws ConfigurationError when the template length differs from the slot count', () => {
    expect(() => resolveSlots({ slotCount: 4, slotTemplate: template }, '2025-06-10')).toThrow(
      ConfigurationError,
    );
  });

  it('rejects a stored range whose end is not after its start', () => {
    const broken = [{ start: '09:00', end: '08:00' }];
    expect(() => resolveSlots({ slotCount: 1, slotTemplate: broken }, '2025-06-10')).toThrow(
      'invalid_slot_template',
    );
  });
});

describe('parseSlotTemplate', () => {
  it('parses ordered HH:mm ranges', () => {
    expect(parseSlotTemplate(['07:00-08:30', ' 08:30 - 10:00 '])).toEqual([
      { start: '07:00', end: '08:30' },
      { start: '08:30', end: '10:00' },
    ]);
  });

  it.each([
    [['7:00-8:30']],
    [['07:00']],
    [['10:00-09:00']],
    [['08:00-10:00', '09:00-11:00']],
    [[]],
  ])('rejects %j', (input) => {
    expect(() => parseSlotTemplate(input)).toThrow(ConfigurationError);
  });
});

describe('slotStart', () => {
  it('places the slot start on the given day in the given zone', () => {
    const start = slotStart('2025-06-10', { start: '08:30', end: '10:00' }, 'Asia/Kolkata');
    expect(start.toUTC().toISO()).toBe('2025-06-10T03:00:00.000Z');
  });
});
