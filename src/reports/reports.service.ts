import { BadRequestException, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { Between, FindOptionsWhere, Repository } from 'typeorm';
import { DateTime } from 'luxon';
import * as ExcelJS from 'exceljs';
import { Booking } from '../bookings/booking.entity';
import { Building } from '../buildings/building.entity';
import { Course } from '../courses/course.entity';
import { EnrolledStudent } from '../enrolled-students/enrolled-student.entity';
import { Machine } from '../machines/machine.entity';
import { User } from '../users/user.entity';
import { formatRange } from '../machines/slot-template';
import { fullNameOf } from '../users/user-profile';
import { isoDay, resolveTimezone } from '../common/timezone';

export type BookingReportRow = {
  date: string;
  slotNumber: number;
  time: string;
  machine: string;
  machineCode: string;
  building: string;
  username: string;
  fullName: string;
  email: string;
  roomNo: string;
  contactNo: string;
};

const CSV_HEADER = 'Date,Slot,Time,Machine,Code,Building,Username,Name,Email,Room,Contact';

@Injectable()
export class ReportsService {
  private readonly zone: string;

  constructor(
    @InjectRepository(Booking) private readonly bookings: Repository<Booking>,
    @InjectRepository(Building) private readonly buildings: Repository<Building>,
    @InjectRepository(Course) private readonly courses: Repository<Course>,
    @InjectRepository(Machine) private readonly machines: Repository<Machine>,
    @InjectRepository(User) private readonly users: Repository<User>,
    @InjectRepository(EnrolledStudent) private readonly enrolled: Repository<EnrolledStudent>,
    cfg: ConfigService,
  ) {
    this.zone = resolveTimezone(cfg);
  }

  /** Every booking of the month, ordered by date, machine code and slot. */
  async monthBookings(year: number, month: number, machineId?: string): Promise<BookingReportRow[]> {
    const start = DateTime.fromObject({ year, month, day: 1 }, { zone: this.zone });
    if (!start.isValid) throw new BadRequestException('invalid_year_or_month');
    const where: FindOptionsWhere<Booking> = {
      date: Between(isoDay(start), isoDay(start.endOf('month'))),
    };
    if (machineId) where.machine = { id: machineId };

    const rows = await this.bookings.find({
      where,
      relations: { machine: { building: true }, user: true },
    });
    rows.sort(
      (a, b) =>
        a.date.localeCompare(b.date) ||
        a.machine.code.localeCompare(b.machine.code) ||
        a.slotNumber - b.slotNumber,
    );
    return rows.map((b) => {
      const range = b.machine.slotTemplate[b.slotNumber - 1];
      return {
        date: b.date,
        slotNumber: b.slotNumber,
        time: range ? formatRange(range) : '',
        machine: b.machine.name,
        machineCode: b.machine.code,
        building: b.machine.building?.name ?? '',
        username: b.user.username,
        fullName: fullNameOf(b.user),
        email: b.user.email,
        roomNo: b.user.roomNo ?? '',
        contactNo: b.user.contactNo ?? '',
      };
    });
  }

  toCsv(rows: BookingReportRow[]) {
    const lines = [CSV_HEADER];
    for (const r of rows) {
      lines.push(
        [
          r.date,
          String(r.slotNumber),
          r.time,
          r.machine,
          r.machineCode,
          r.building,
          r.username,
          r.fullName,
          r.email,
          r.roomNo,
          r.contactNo,
        ]
          .map(csvEsc)
          .join(','),
      );
    }
    return lines.join('\n');
  }

  async toWorkbook(rows: BookingReportRow[], year: number, month: number) {
    const workbook = this.buildWorkbook(rows, year, month);
    return Buffer.from(await workbook.xlsx.writeBuffer());
  }

  /** One sheet per machine plus a summary sheet. */
  buildWorkbook(rows: BookingReportRow[], year: number, month: number) {
    const workbook = new ExcelJS.Workbook();
    workbook.created = new Date();
    workbook.modified = new Date();
    workbook.title = `Bookings ${year}-${String(month).padStart(2, '0')}`;

    const grouped = new Map<string, BookingReportRow[]>();
    for (const row of rows) {
      const list = grouped.get(row.machineCode) ?? [];
      list.push(row);
      grouped.set(row.machineCode, list);
    }

    const summary: Array<{ machine: string; building: string; bookings: number; users: number }> = [];
    const ordered = Array.from(grouped.entries()).sort((a, b) => a[0].localeCompare(b[0]));
    for (const [code, machineRows] of ordered) {
      const sheet = workbook.addWorksheet(this.sanitiseWorksheetName(workbook, code));
      sheet.columns = [
        { header: 'Date', key: 'date', width: 12 },
        { header: 'Slot', key: 'slot', width: 6 },
        { header: 'Time', key: 'time', width: 14 },
        { header: 'Username', key: 'username', width: 18 },
        { header: 'Name', key: 'name', width: 28 },
        { header: 'Email', key: 'email', width: 30 },
        { header: 'Room', key: 'room', width: 8 },
        { header: 'Contact', key: 'contact', width: 16 },
      ];
      sheet.views = [{ state: 'frozen', ySplit: 1 }];
      for (const r of machineRows) {
        sheet.addRow({
          date: r.date,
          slot: r.slotNumber,
          time: r.time,
          username: r.username,
          name: r.fullName,
          email: r.email,
          room: r.roomNo,
          contact: r.contactNo,
        });
      }
      summary.push({
        machine: `${machineRows[0].machine} (${code})`,
        building: machineRows[0].building,
        bookings: machineRows.length,
        users: new Set(machineRows.map((r) => r.username)).size,
      });
    }

    const summarySheet = workbook.addWorksheet('Summary');
    summarySheet.columns = [
      { header: 'Machine', key: 'machine', width: 32 },
      { header: 'Building', key: 'building', width: 24 },
      { header: 'Bookings', key: 'bookings', width: 12 },
      { header: 'Distinct users', key: 'users', width: 16 },
    ];
    summarySheet.views = [{ state: 'frozen', ySplit: 1 }];
    for (const row of summary) summarySheet.addRow(row);
    summarySheet.addRow([]);
    summarySheet.addRow(['Total bookings', '', rows.length]);

    return workbook;
  }

  /** Full data dump for admins. Password hashes are never included. */
  async exportAll() {
    const [buildings, courses, machines, users, bookings, enrolled] = await Promise.all([
      this.buildings.find({ order: { name: 'ASC' } }),
      this.courses.find({ order: { code: 'ASC' } }),
      this.machines.find({ order: { name: 'ASC' }, relations: { building: true } }),
      this.users.find({ order: { username: 'ASC' }, relations: { building: true, course: true } }),
      this.bookings.find({ order: { date: 'ASC', slotNumber: 'ASC' }, relations: { machine: true, user: true } }),
      this.enrolled.find({ order: { email: 'ASC' } }),
    ]);
    return {
      exportedAt: DateTime.now().toUTC().toISO(),
      buildings: buildings.map((b) => ({ id: b.id, name: b.name, code: b.code ?? null })),
      courses: courses.map((c) => ({
        id: c.id,
        code: c.code,
        name: c.name,
        shortName: c.shortName ?? null,
        level: c.level,
        department: c.department ?? null,
        durationYears: c.durationYears ?? null,
        isActive: c.isActive,
      })),
      machines: machines.map((m) => ({
        id: m.id,
        name: m.name,
        code: m.code,
        buildingId: m.building.id,
        status: m.status,
        slotCount: m.slotCount,
        slotTemplate: m.slotTemplate,
      })),
      users: users.map((u) => ({
        id: u.id,
        username: u.username,
        firstName: u.firstName,
        middleName: u.middleName ?? null,
        lastName: u.lastName ?? null,
        email: u.email,
        role: u.role,
        buildingId: u.building.id,
        courseId: u.course?.id ?? null,
        contactNo: u.contactNo ?? null,
        roomNo: u.roomNo ?? null,
        hostName: u.hostName ?? null,
        departureDate: u.departureDate ?? null,
        isActive: u.isActive,
        createdAt: u.createdAt.toISOString(),
      })),
      bookings: bookings.map((b) => ({
        id: b.id,
        machineId: b.machine.id,
        userId: b.user.id,
        date: b.date,
        slotNumber: b.slotNumber,
        createdAt: b.createdAt.toISOString(),
      })),
      enrolledStudents: enrolled.map((s) => ({ id: s.id, fullName: s.fullName, email: s.email })),
    };
  }

  private sanitiseWorksheetName(workbook: ExcelJS.Workbook, rawName: string) {
    const forbidden = /[\\/?*[\]:]/g;
    let base = rawName.replace(forbidden, ' ').trim();
    if (!base) base = 'Machine';
    if (base.length > 31) base = base.substring(0, 31).trim();
    let attempt = base;
    let counter = 2;
    // "Summary" is reserved for the totals sheet
    while (workbook.getWorksheet(attempt) || attempt === 'Summary') {
      const suffix = ` (${counter})`;
      attempt = `${base.substring(0, Math.min(31 - suffix.length, base.length))}${suffix}`;
      counter++;
    }
    return attempt;
  }
}

export function csvEsc(s: string) {
  if (s.includes(',') || s.includes('"') || s.includes('\n')) {
    return `"${s.replace(/"/g, '""')}"`;
  }
  return s;
}
