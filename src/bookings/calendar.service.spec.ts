import { BadRequestException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { CalendarService, calendarToJson } from './calendar.service';
import { BookingsService } from './bookings.service';
import { Booking } from './booking.entity';
import { Machine } from '../machines/machine.entity';
import { MachineNotFoundError } from '../machines/machine.errors';
import { EventLog } from '../event-log/event-log.entity';
import { EventLogService } from '../event-log/event-log.service';
import { Building } from '../buildings/building.entity';
import { User } from '../users/user.entity';
import { avatarUrl } from '../users/user-profile';
import { createTestDataSource, freezeTime, testConfig, unfreezeTime } from '../testing/test-data-source';
import { saveBuilding, saveCourse, saveMachine, saveUser } from '../testing/fixtures';

describe('CalendarService', () => {
  let ds: DataSource;
  let calendar: CalendarService;
  let bookings: BookingsService;
  let building: Building;
  let machine: Machine;
  let uma: User;
  let neighbour: User;
  let admin: User;

  beforeEach(async () => {
    freezeTime('2025-06-01T10:00:00');
    ds = await createTestDataSource();
    const cfg = testConfig();
    calendar = new CalendarService(ds.getRepository(Booking), ds.getRepository(Machine), cfg);
    bookings = new BookingsService(
      ds.getRepository(Booking),
      ds.getRepository(Machine),
      new EventLogService(ds.getRepository(EventLog), cfg),
      cfg,
    );

    building = await saveBuilding(ds, 'North Block');
    machine = await saveMachine(ds, building);
    const course = await saveCourse(ds, { name: 'Master of Statistics', shortName: 'MStat' });
    uma = await saveUser(ds, building, {
      username: 'uma',
      firstName: 'Uma',
      lastName: 'Rao',
      email: 'uma@example.test',
      roomNo: 'B-12',
      contactNo: '9000000001',
      course,
    });
    neighbour = await saveUser(ds, building, { username: 'neighbour' });
    admin = await saveUser(ds, building, { username: 'warden', role: 'admin' });
  });

  afterEach(async () => {
    await ds.destroy();
    unfreezeTime();
  });

  it('shows a booked slot with the full view to its owner', async () => {
    const booking = await bookings.book(machine.id, '2025-06-10', 2, uma);

    const month = await calendar.getMonthCalendar(machine.id, 2025, 6, uma);

    expect(month.size).toBe(30);
    expect(Array.from(month.keys())[0]).toBe('2025-06-01');
    expect(Array.from(month.keys())[29]).toBe('2025-06-30');

    const day = month.get('2025-06-10') ?? [];
    expect(day.map((s) => s.slotNumber)).toEqual([1, 2, 3]);
    expect(day[0].isBooked).toBe(false);
    expect(day[2].isBooked).toBe(false);
    expect(day[1]).toEqual({
      date: '2025-06-10',
      slotNumber: 2,
      timeRange: { start: '08:30', end: '10:00' },
      label: '08:30-10:00',
      isBooked: true,
      isMine: true,
      canCancel: true,
      bookingId: booking.id,
      booker: {
        visibility: 'full',
        userId: uma.id,
        username: 'uma',
        fullName: 'Uma Rao',
        firstName: 'Uma',
        email: 'uma@example.test',
        roomNo: 'B-12',
        contactNo: '9000000001',
        avatar: avatarUrl('uma@example.test'),
        course: 'MStat',
        building: 'North Block',
      },
    });
  });

  it('gives other residents only the limited view and no booking id', async () => {
    await bookings.book(machine.id, '2025-06-10', 2, uma);

    const month = await calendar.getMonthCalendar(machine.id, 2025, 6, neighbour);
    const slot = month.get('2025-06-10')?.[1];

    expect(slot?.isBooked).toBe(true);
    expect(slot?.isMine).toBe(false);
    expect(slot?.canCancel).toBe(false);
    expect(slot?.bookingId).toBeNull();
    expect(slot?.booker).toEqual({
      visibility: 'limited',
      username: 'uma',
      avatar: avatarUrl('uma@example.test'),
    });
  });

  it('gives admins contact details and the booking id', async () => {
    const booking = await bookings.book(machine.id, '2025-06-10', 2, uma);

    const slot = (await calendar.getMonthCalendar(machine.id, 2025, 6, admin)).get('2025-06-10')?.[1];

    expect(slot?.canCancel).toBe(true);
    expect(slot?.bookingId).toBe(booking.id);
    expect(slot?.booker?.visibility).toBe('full');
  });

  it('drops past days on request and locks past bookings', async () => {
    await bookings.book(machine.id, '2025-06-05', 1, uma);
    freezeTime('2025-06-20T09:00:00');

    const upcoming = await calendar.getMonthCalendar(machine.id, 2025, 6, uma, { excludePast: true });
    expect(upcoming.size).toBe(11);
    expect(Array.from(upcoming.keys())[0]).toBe('2025-06-20');

    const full = await calendar.getMonthCalendar(machine.id, 2025, 6, uma);
    const past = full.get('2025-06-05')?.[0];
    expect(past?.isBooked).toBe(true);
    expect(past?.isMine).toBe(true);
    expect(past?.canCancel).toBe(false);
    expect(past?.bookingId).toBeNull();
  });

  it('handles February in a leap year', async () => {
    const month = await calendar.getMonthCalendar(machine.id, 2028, 2, uma);

    expect(month.size).toBe(29);
    expect(Array.from(month.keys()).pop()).toBe('2028-02-29');
  });

  it('keeps the day order when converted for JSON', async () => {
    const json = calendarToJson(await calendar.getMonthCalendar(machine.id, 2025, 6, uma));

    expect(json).toHaveLength(30);
    expect(json[0].date).toBe('2025-06-01');
    expect(json[0].slots).toHaveLength(3);
  });

  it('rejects unknown machines and impossible months', async () => {
    await expect(
      calendar.getMonthCalendar('00000000-0000-4000-8000-000000000000', 2025, 6, uma),
    ).rejects.toBeInstanceOf(MachineNotFoundError);
    await expect(calendar.getMonthCalendar(machine.id, 2025, 13, uma)).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });

  it('annotates a single day the same way', async () => {
    await bookings.book(machine.id, '2025-06-03', 3, neighbour);

    const slots = await calendar.getDaySlots(machine.id, '2025-06-03', uma);

    expect(slots.map((s) => s.isBooked)).toEqual([false, false, true]);
    expect(slots[2].booker).toEqual({
      visibility: 'limited',
      username: 'neighbour',
      avatar: avatarUrl(neighbour.email),
    });
  });
});
