import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { Between, In, Repository } from 'typeorm';
import { DateTime } from 'luxon';
import { Booking } from '../bookings/booking.entity';
import { ReminderLog } from './reminder-log.entity';
import { ReminderMessage, ReminderNotifier } from './reminder.notifier';
import { MAX_REMINDER_LEAD_HOURS } from '../users/users.service';
import { formatRange, slotStart } from '../machines/slot-template';
import { isoDay, resolveTimezone } from '../common/timezone';
import { isUniqueViolation } from '../database/unique-violation';

export type DueReminder = {
  booking: Booking;
  startsAt: DateTime;
  recipient: string;
};

export type SweepResult = { due: number; sent: number; undelivered: number; failed: number };

@Injectable()
export class RemindersService {
  private readonly log = new Logger(RemindersService.name);
  private readonly zone: string;

  constructor(
    @InjectRepository(Booking) private readonly bookings: Repository<Booking>,
    @InjectRepository(ReminderLog) private readonly reminderLogs: Repository<ReminderLog>,
    private readonly notifier: ReminderNotifier,
    cfg: ConfigService,
  ) {
    this.zone = resolveTimezone(cfg);
  }

  /**
   * Bookings of active, opted-in users whose slot starts within
   * [now, now + the user's lead hours] and that have not been reminded yet.
   */
  async findDueReminders(now: DateTime = DateTime.now()): Promise<DueReminder[]> {
    const local = now.setZone(this.zone);
    const candidates = await this.bookings.find({
      where: {
        date: Between(isoDay(local), isoDay(local.plus({ hours: MAX_REMINDER_LEAD_HOURS }))),
        user: { isActive: true, reminderEnabled: true },
      },
      relations: { user: true, machine: { building: true } },
      order: { date: 'ASC', slotNumber: 'ASC' },
    });

    const due: DueReminder[] = [];
    for (const booking of candidates) {
      const range = booking.machine.slotTemplate[booking.slotNumber - 1];
      if (!range) continue;
      const startsAt = slotStart(booking.date, range, this.zone);
      const windowEnd = now.plus({ hours: booking.user.reminderLeadHours });
      if (startsAt.toMillis() < now.toMillis() || startsAt.toMillis() > windowEnd.toMillis()) continue;
      due.push({ booking, startsAt, recipient: booking.user.reminderEmail || booking.user.email });
    }
    if (due.length === 0) return due;

    const logged = await this.reminderLogs.find({
      where: { booking: { id: In(due.map((d) => d.booking.id)) } },
      relations: { booking: true },
    });
    const reminded = new Set(logged.map((l) => l.booking.id));
    return due.filter((d) => !reminded.has(d.booking.id));
  }

  /** Delivers every due reminder and logs the delivered ones. Bookings are only read. */
  async runReminderSweep(now: DateTime = DateTime.now()): Promise<SweepResult> {
    const due = await this.findDueReminders(now);
    const result: SweepResult = { due: due.length, sent: 0, undelivered: 0, failed: 0 };

    for (const reminder of due) {
      const { booking } = reminder;
      try {
        const delivered = await this.notifier.deliver(this.messageFor(reminder));
        if (!delivered) {
          result.undelivered++;
          this.log.debug(`Reminder for booking ${booking.id} not delivered: no notifier target`);
          continue;
        }
        await this.markSent(booking);
        result.sent++;
      } catch (error) {
        result.failed++;
        this.log.warn(
          `Reminder for booking ${booking.id} failed: ${error instanceof Error ? error.message : error}`,
        );
      }
    }

    if (result.due > 0) {
      this.log.log(
        `Reminder sweep: ${result.sent} sent, ${result.failed} failed, ${result.undelivered} undelivered of ${result.due} due`,
      );
    }
    return result;
  }

  messageFor({ booking, startsAt, recipient }: DueReminder): ReminderMessage {
    const range = booking.machine.slotTemplate[booking.slotNumber - 1];
    const local = startsAt.setZone(this.zone).setLocale('en-GB');
    const where = booking.machine.building
      ? `${booking.machine.name} in ${booking.machine.building.name}`
      : booking.machine.name;
    return {
      bookingId: booking.id,
      recipient,
      username: booking.user.username,
      machine: booking.machine.name,
      building: booking.machine.building?.name ?? null,
      date: booking.date,
      timeRange: { start: range.start, end: range.end },
      startsAt: local.toISO() ?? booking.date,
      subject: `Reminder: your washing machine booking on ${local.toFormat('dd LLL')}`,
      text: `Hi ${booking.user.username}, you have ${where} booked on ${local.toFormat('cccc, dd LLLL yyyy')} (${formatRange(range)}).`,
    };
  }

  private async markSent(booking: Booking) {
    try {
      await this.reminderLogs.insert({ booking: { id: booking.id }, user: { id: booking.user.id } });
    } catch (error) {
      // another sweep logged it first
      if (!isUniqueViolation(error)) throw error;
    }
  }
}
