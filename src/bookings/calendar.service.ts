import { BadRequestException, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { Between, Repository } from 'typeorm';
import { DateTime } from 'luxon';
import { Booking } from './booking.entity';
import { BookerView, projectBooker } from './booker-view';
import { Machine } from '../machines/machine.entity';
import { MachineNotFoundError } from '../machines/machine.errors';
import { SlotDescriptor, resolveSlots } from '../machines/slot-template';
import { User } from '../users/user.entity';
import { can } from '../auth/roles';
import { isoDay, parseDay, resolveTimezone, todayIn } from '../common/timezone';
import { InvalidDateError } from './booking.errors';

export type CalendarSlot = SlotDescriptor & {
  isBooked: boolean;
  isMine: boolean;
  canCancel: boolean;
  bookingId: string | null;
  booker: BookerView | null;
};

/** Days of the month in ascending order, each with its slots by number. */
export type MonthCalendar = Map<string, CalendarSlot[]>;

type Viewer = Pick<User, 'id' | 'role'>;

@Injectable()
export class CalendarService {
  private readonly zone: string;

  constructor(
    @InjectRepository(Booking) private readonly bookings: Repository<Booking>,
    @InjectRepository(Machine) private readonly machines: Repository<Machine>,
    cfg: ConfigService,
  ) {
    this.zone = resolveTimezone(cfg);
  }

  async getMonthCalendar(
    machineId: string,
    year: number,
    month: number,
    viewer: Viewer,
    options: { excludePast?: boolean } = {},
  ): Promise<MonthCalendar> {
    if (!Number.isInteger(year) || year < 2000 || year > 2100 || !Number.isInteger(month) || month < 1 || month > 12) {
      throw new BadRequestException('invalid_year_or_month');
    }
    const machine = await this.machines.findOne({ where: { id: machineId } });
    if (!machine) throw new MachineNotFoundError();

    const first = DateTime.fromObject({ year, month, day: 1 }, { zone: this.zone });
    const last = first.endOf('month');

    // one query for the whole month, bookers included
    const rows = await this.bookings.find({
      where: { machine: { id: machine.id }, date: Between(isoDay(first), isoDay(last)) },
      relations: { user: { building: true, course: true } },
    });
    const booked = new Map(rows.map((b): [string, Booking] => [`${b.date}#${b.slotNumber}`, b]));

    const today = todayIn(this.zone);
    const calendar: MonthCalendar = new Map();
    for (let offset = 0; offset < last.day; offset++) {
      const date = isoDay(first.plus({ days: offset }));
      if (options.excludePast && date < today) continue;
      const slots = resolveSlots(machine, date).map((slot) =>
        this.annotate(slot, booked.get(`${date}#${slot.slotNumber}`), viewer, date >= today),
      );
      calendar.set(date, slots);
    }
    return calendar;
  }

  /** The slots of a single day, annotated the same way as the month view. */
  async getDaySlots(machineId: string, date: string, viewer: Viewer): Promise<CalendarSlot[]> {
    const parsed = parseDay(date, this.zone);
    if (!parsed) throw new InvalidDateError();
    const day = isoDay(parsed);
    const machine = await this.machines.findOne({ where: { id: machineId } });
    if (!machine) throw new MachineNotFoundError();

    const rows = await this.bookings.find({
      where: { machine: { id: machine.id }, date: day },
      relations: { user: { building: true, course: true } },
    });
    const open = day >= todayIn(this.zone);
    return resolveSlots(machine, day).map((slot) =>
      this.annotate(slot, rows.find((b) => b.slotNumber === slot.slotNumber), viewer, open),
    );
  }

  private annotate(slot: SlotDescriptor, booking: Booking | undefined, viewer: Viewer, open: boolean): CalendarSlot {
    if (!booking) {
      return { ...slot, isBooked: false, isMine: false, canCancel: false, bookingId: null, booker: null };
    }
    const isMine = booking.user.id === viewer.id;
    const canCancel = open && (isMine || can(viewer.role, 'manageAnyBooking'));
    return {
      ...slot,
      isBooked: true,
      isMine,
      canCancel,
      bookingId: canCancel ? booking.id : null,
      booker: projectBooker(booking.user, viewer),
    };
  }
}

/** Plain-object form of a calendar for JSON responses; Map order is kept. */
export function calendarToJson(calendar: MonthCalendar) {
  return Array.from(calendar, ([date, slots]) => ({ date, slots }));
}
