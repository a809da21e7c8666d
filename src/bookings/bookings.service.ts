import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { MoreThanOrEqual, Repository } from 'typeorm';
import { Booking } from './booking.entity';
import { Machine, TimeRange } from '../machines/machine.entity';
import { MachineNotFoundError } from '../machines/machine.errors';
import { resolveSlots } from '../machines/slot-template';
import { User } from '../users/user.entity';
import { can } from '../auth/roles';
import { EventLogService } from '../event-log/event-log.service';
import { isUniqueViolation } from '../database/unique-violation';
import { isoDay, parseDay, resolveTimezone, shiftDay, todayIn } from '../common/timezone';
import {
  AdvanceLimitExceededError,
  BookingNotFoundError,
  InvalidDateError,
  InvalidSlotNumberError,
  MachineUnavailableError,
  NotAuthorizedError,
  PastDateError,
  SlotAlreadyBookedError,
} from './booking.errors';

export type SlotCoordinates = { machineId: string; date: string; slotNumber: number };
export type CancelTarget = { bookingId: string } | SlotCoordinates;

export const DEFAULT_ADVANCE_DAYS = 90;

export type BookingSummary = {
  id: string;
  date: string;
  slotNumber: number;
  timeRange: TimeRange | null;
  machine: { id: string; name: string; code: string; building: string | null };
  createdAt: string;
};

/** Booking with its machine loaded, as the caller's upcoming list shows it. */
export function summarizeBooking(booking: Booking): BookingSummary {
  const range = booking.machine.slotTemplate[booking.slotNumber - 1];
  return {
    id: booking.id,
    date: booking.date,
    slotNumber: booking.slotNumber,
    timeRange: range ? { start: range.start, end: range.end } : null,
    machine: {
      id: booking.machine.id,
      name: booking.machine.name,
      code: booking.machine.code,
      building: booking.machine.building?.name ?? null,
    },
    createdAt: booking.createdAt.toISOString(),
  };
}

@Injectable()
export class BookingsService {
  private readonly log = new Logger(BookingsService.name);
  private readonly zone: string;
  readonly advanceDays: number;

  constructor(
    @InjectRepository(Booking) private readonly bookings: Repository<Booking>,
    @InjectRepository(Machine) private readonly machines: Repository<Machine>,
    private readonly events: EventLogService,
    cfg: ConfigService,
  ) {
    this.zone = resolveTimezone(cfg);
    const days = Number(cfg.get('BOOKING_ADVANCE_DAYS') ?? DEFAULT_ADVANCE_DAYS);
    this.advanceDays = Number.isInteger(days) && days >= 0 ? days : DEFAULT_ADVANCE_DAYS;
  }

  today() {
    return todayIn(this.zone);
  }

  /** Last bookable day, inclusive. */
  lastBookableDay() {
    return shiftDay(this.today(), this.advanceDays, this.zone);
  }

  async book(machineId: string, date: string, slotNumber: number, user: User) {
    const day = this.normalizeDay(date);
    const machine = await this.machines.findOne({ where: { id: machineId } });
    if (!machine) throw new MachineNotFoundError();
    if (machine.status !== 'available') throw new MachineUnavailableError();

    const slot = resolveSlots(machine, day).find((s) => s.slotNumber === slotNumber);
    if (!slot) throw new InvalidSlotNumberError();

    if (day < this.today()) throw new PastDateError();
    if (day > this.lastBookableDay()) throw new AdvanceLimitExceededError(this.advanceDays);

    const taken = await this.bookings.count({
      where: { machine: { id: machine.id }, date: day, slotNumber },
    });
    if (taken > 0) throw new SlotAlreadyBookedError();

    // a concurrent booking of the same slot loses on the unique index
    try {
      await this.bookings.insert({
        machine: { id: machine.id },
        date: day,
        slotNumber,
        user: { id: user.id },
      });
    } catch (error) {
      if (isUniqueViolation(error)) throw new SlotAlreadyBookedError();
      throw error;
    }

    const booking = await this.bookings.findOneOrFail({
      where: { machine: { id: machine.id }, date: day, slotNumber },
      relations: { machine: { building: true }, user: true },
    });

    await this.events.record({
      actor: user,
      action: 'booking.create',
      subjectId: booking.id,
      details: { bookingId: booking.id, machineId: machine.id, date: day, slotNumber },
    });
    this.log.log(`${user.username} booked ${machine.code} slot ${slotNumber} on ${day}`);
    return booking;
  }

  async cancel(target: CancelTarget, requester: User) {
    const booking = await this.findTarget(target);
    if (!booking) throw new BookingNotFoundError();

    const owns = booking.user.id === requester.id;
    if (!owns && !can(requester.role, 'manageAnyBooking')) throw new NotAuthorizedError();
    if (booking.date < this.today()) throw new PastDateError();

    await this.bookings.delete({ id: booking.id });

    await this.events.record({
      actor: requester,
      action: 'booking.cancel',
      subjectId: booking.id,
      details: {
        bookingId: booking.id,
        machineId: booking.machine.id,
        date: booking.date,
        slotNumber: booking.slotNumber,
        ownerId: booking.user.id,
        onBehalf: !owns,
      },
    });
    this.log.log(
      `${requester.username} cancelled ${booking.machine.code} slot ${booking.slotNumber} on ${booking.date}`,
    );
    return {
      id: booking.id,
      machineId: booking.machine.id,
      date: booking.date,
      slotNumber: booking.slotNumber,
    };
  }

  async listUpcomingBookings(user: Pick<User, 'id'>) {
    const rows = await this.bookings.find({
      where: { user: { id: user.id }, date: MoreThanOrEqual(this.today()) },
      order: { date: 'ASC', slotNumber: 'ASC' },
      relations: { machine: { building: true } },
    });
    return rows.map(summarizeBooking);
  }

  async listBookingsForUser(userId: string, options: { includePast?: boolean } = {}) {
    const rows = await this.bookings.find({
      where: options.includePast
        ? { user: { id: userId } }
        : { user: { id: userId }, date: MoreThanOrEqual(this.today()) },
      order: { date: options.includePast ? 'DESC' : 'ASC', slotNumber: 'ASC' },
      relations: { machine: { building: true } },
    });
    return rows.map(summarizeBooking);
  }

  private findTarget(target: CancelTarget) {
    const relations = { machine: true, user: true };
    if ('bookingId' in target) {
      return this.bookings.findOne({ where: { id: target.bookingId }, relations });
    }
    return this.bookings.findOne({
      where: {
        machine: { id: target.machineId },
        date: this.normalizeDay(target.date),
        slotNumber: target.slotNumber,
      },
      relations,
    });
  }

  private normalizeDay(value: string) {
    const parsed = parseDay(value, this.zone);
    if (!parsed) throw new InvalidDateError();
    return isoDay(parsed);
  }
}
