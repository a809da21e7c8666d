import { DataSource } from 'typeorm';
import { DateTime } from 'luxon';
import { RemindersService } from './reminders.service';
import { ReminderMessage, ReminderNotifier } from './reminder.notifier';
import { ReminderLog } from './reminder-log.entity';
import { Booking } from '../bookings/booking.entity';
import { Machine } from '../machines/machine.entity';
import { User } from '../users/user.entity';
import { createTestDataSource, freezeTime, testConfig, unfreezeTime } from '../testing/test-data-source';
import { saveBuilding, saveMachine, saveUser } from '../testing/fixtures';

class FakeNotifier extends ReminderNotifier {
  readonly sent: ReminderMessage[] = [];
  readonly failing = new Set<string>();
  configured = true;

  async deliver(message: ReminderMessage) {
    if (!this.configured) return false;
    if (this.failing.has(message.recipient)) throw new Error('webhook unreachable');
    this.sent.push(message);
    return true;
  }
}

describe('RemindersService', () => {
  let ds: DataSource;
  let notifier: FakeNotifier;
  let service: RemindersService;
  let machine: Machine;
  let uma: User;

  const book = (user: User, date: string, slotNumber: number, on: Machine = machine) =>
    ds.getRepository(Booking).save(
      ds.getRepository(Booking).create({ machine: on, user, date, slotNumber }),
    );

  beforeEach(async () => {
    freezeTime('2025-06-10T06:00:00');
    ds = await createTestDataSource();
    notifier = new FakeNotifier();
    service = new RemindersService(ds.getRepository(Booking), ds.getRepository(ReminderLog), notifier, testConfig());

    const building = await saveBuilding(ds, 'North Block');
    machine = await saveMachine(ds, building, { name: 'Washer A' });
    uma = await saveUser(ds, building, {
      username: 'uma',
      email: 'uma@example.test',
      reminderEnabled: true,
      reminderLeadHours: 3,
      reminderEmail: 'uma.alerts@example.test',
    });
  });

  afterEach(async () => {
    await ds.destroy();
    unfreezeTime();
  });

  it('finds bookings starting within the lead time of opted-in active users', async () => {
    const building = await saveBuilding(ds);
    const quiet = await saveUser(ds, building, { reminderEnabled: false, reminderLeadHours: 3 });
    const gone = await saveUser(ds, building, { reminderEnabled: true, reminderLeadHours: 3, isActive: false });
    const due = await book(uma, '2025-06-10', 2); // 08:30
    await book(uma, '2025-06-10', 3); // 10:00, after the window
    await book(quiet, '2025-06-10', 1);
    await book(gone, '2025-06-11', 1);
    const other = await saveMachine(ds, building);
    await book(gone, '2025-06-10', 2, other);

    const reminders = await service.findDueReminders();

    expect(reminders.map((r) => r.booking.id)).toEqual([due.id]);
    expect(reminders[0].recipient).toBe('uma.alerts@example.test');
    expect(reminders[0].startsAt.toUTC().toISO()).toBe('2025-06-10T03:00:00.000Z');
  });

  it('leaves out slots that already started', async () => {
    await book(uma, '2025-06-10', 1); // 07:00

    expect(await service.findDueReminders(DateTime.now().plus({ hours: 1, minutes: 1 }))).toEqual([]);
  });

  it('uses the account email when no reminder email is set', async () => {
    await ds.getRepository(User).update({ id: uma.id }, { reminderEmail: null });
    await book(uma, '2025-06-10', 1);

    const [reminder] = await service.findDueReminders();

    expect(reminder.recipient).toBe('uma@example.test');
  });

  it('sends each reminder once', async () => {
    const booking = await book(uma, '2025-06-10', 2);

    const first = await service.runReminderSweep();
    const second = await service.runReminderSweep();

    expect(first).toEqual({ due: 1, sent: 1, undelivered: 0, failed: 0 });
    expect(second).toEqual({ due: 0, sent: 0, undelivered: 0, failed: 0 });
    expect(notifier.sent).toEqual([
      {
        bookingId: booking.id,
        recipient: 'uma.alerts@example.test',
        username: 'uma',
        machine: 'Washer A',
        building: 'North Block',
        date: '2025-06-10',
        timeRange: { start: '08:30', end: '10:00' },
        startsAt: '2025-06-10T08:30:00.000+05:30',
        subject: 'Reminder: your washing machine booking on 10 Jun',
        text: 'Hi uma, you have Washer A in North Block booked on Tuesday, 10 June 2025 (08:30-10:00).',
      },
    ]);
    expect(await ds.getRepository(ReminderLog).count()).toBe(1);
  });

  it('retries a failed delivery on the next sweep', async () => {
    await book(uma, '2025-06-10', 2);
    notifier.failing.add('uma.alerts@example.test');

    expect(await service.runReminderSweep()).toEqual({ due: 1, sent: 0, undelivered: 0, failed: 1 });
    expect(await ds.getRepository(ReminderLog).count()).toBe(0);

    notifier.failing.clear();
    expect(await service.runReminderSweep()).toEqual({ due: 1, sent: 1, undelivered: 0, failed: 0 });
  });

  it('does not log reminders it had nowhere to send', async () => {
    await book(uma, '2025-06-10', 2);
    notifier.configured = false;

    expect(await service.runReminderSweep()).toEqual({ due: 1, sent: 0, undelivered: 1, failed: 0 });
    expect(await ds.getRepository(ReminderLog).count()).toBe(0);
  });

  it('never changes bookings', async () => {
    const booking = await book(uma, '2025-06-10', 2);

    await service.runReminderSweep();

    const after = await ds.getRepository(Booking).find({ relations: { user: true } });
    expect(after.map((b) => [b.id, b.date, b.slotNumber, b.user.id])).toEqual([
      [booking.id, '2025-06-10', 2, uma.id],
    ]);
  });
});
