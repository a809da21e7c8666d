import { BadRequestException, ConflictException, Injectable, Logger } from '@nestjs/common';
import { DataSource, EntityManager, ObjectLiteral, Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import * as bcrypt from 'bcrypt';
import { randomBytes } from 'crypto';
import { Booking } from '../bookings/booking.entity';
import { InvalidSlotNumberError } from '../bookings/booking.errors';
import { Building } from '../buildings/building.entity';
import { Course } from '../courses/course.entity';
import { EnrolledStudent } from '../enrolled-students/enrolled-student.entity';
import { Machine } from '../machines/machine.entity';
import { ConfigurationError } from '../machines/machine.errors';
import { formatRange, parseSlotTemplate } from '../machines/slot-template';
import { User } from '../users/user.entity';
import { DataImportDto, ImportedMachineDto } from './dto/data-import.dto';

export type ImportSummary = {
  enrolledStudents: number;
  buildings: number;
  courses: number;
  machines: number;
  users: number;
  bookings: number;
};

const INSERT_CHUNK = 100;
const BCRYPT_ROUNDS = 10;

async function insertAll<T extends ObjectLiteral>(repo: Repository<T>, rows: QueryDeepPartialEntity<T>[]) {
  for (let i = 0; i < rows.length; i += INSERT_CHUNK) {
    await repo.insert(rows.slice(i, i + INSERT_CHUNK));
  }
  return rows.length;
}

/** Loads a full export into an empty database; all or nothing. */
@Injectable()
export class DataImportService {
  private readonly log = new Logger(DataImportService.name);

  constructor(private readonly dataSource: DataSource) {}

  async importAll(data: DataImportDto): Promise<ImportSummary> {
    this.assertReferences(data);
    const templates = new Map(data.machines.map((m) => [m.id, this.templateOf(m)] as const));
    for (const booking of data.bookings) {
      const template = templates.get(booking.machineId);
      if (!template || booking.slotNumber > template.length) throw new InvalidSlotNumberError();
    }
    // exports carry no hashes; such accounts need a password reset before signing in
    const unusableHash = await bcrypt.hash(randomBytes(32).toString('hex'), BCRYPT_ROUNDS);

    const summary = await this.dataSource.transaction(async (manager) => {
      await this.assertEmpty(manager);
      return {
        enrolledStudents: await insertAll(
          manager.getRepository(EnrolledStudent),
          data.enrolledStudents.map((s) => ({ id: s.id, fullName: s.fullName, email: s.email.toLowerCase() })),
        ),
        buildings: await insertAll(
          manager.getRepository(Building),
          data.buildings.map((b) => ({ id: b.id, name: b.name, code: b.code ?? null })),
        ),
        courses: await insertAll(
          manager.getRepository(Course),
          data.courses.map((c) => ({
            id: c.id,
            code: c.code,
            name: c.name,
            shortName: c.shortName ?? null,
            level: c.level,
            department: c.department ?? '',
            durationYears: c.durationYears ?? null,
            isActive: c.isActive,
          })),
        ),
        machines: await insertAll(
          manager.getRepository(Machine),
          data.machines.map((m) => {
            const template = templates.get(m.id) ?? [];
            return {
              id: m.id,
              name: m.name,
              code: m.code,
              building: { id: m.buildingId },
              status: m.status,
              slotCount: template.length,
              slotTemplate: template,
            };
          }),
        ),
        users: await insertAll(
          manager.getRepository(User),
          data.users.map((u) => ({
            id: u.id,
            username: u.username,
            firstName: u.firstName,
            middleName: u.middleName ?? null,
            lastName: u.lastName ?? null,
            email: u.email.toLowerCase(),
            passwordHash: u.passwordHash ?? unusableHash,
            role: u.role,
            building: { id: u.buildingId },
            course: u.courseId ? { id: u.courseId } : null,
            contactNo: u.contactNo ?? null,
            roomNo: u.roomNo ?? null,
            hostName: u.hostName ?? null,
            departureDate: u.departureDate ?? null,
            isActive: u.isActive,
            createdAt: new Date(u.createdAt),
          })),
        ),
        bookings: await insertAll(
          manager.getRepository(Booking),
          data.bookings.map((b) => ({
            id: b.id,
            machine: { id: b.machineId },
            user: { id: b.userId },
            date: b.date,
            slotNumber: b.slotNumber,
            createdAt: new Date(b.createdAt),
          })),
        ),
      };
    });

    this.log.log(
      `Imported ${summary.users} users, ${summary.machines} machines and ${summary.bookings} bookings`,
    );
    return summary;
  }

  private templateOf(machine: ImportedMachineDto) {
    const template = parseSlotTemplate(machine.slotTemplate.map(formatRange));
    if (template.length !== machine.slotCount) throw new ConfigurationError('slot_template_mismatch');
    return template;
  }

  private assertReferences(data: DataImportDto) {
    const buildings = new Set(data.buildings.map((b) => b.id));
    const courses = new Set(data.courses.map((c) => c.id));
    const machines = new Set(data.machines.map((m) => m.id));
    const users = new Set(data.users.map((u) => u.id));
    const dangling =
      data.machines.some((m) => !buildings.has(m.buildingId)) ||
      data.users.some((u) => !buildings.has(u.buildingId) || (u.courseId && !courses.has(u.courseId))) ||
      data.bookings.some((b) => !machines.has(b.machineId) || !users.has(b.userId));
    if (dangling) throw new BadRequestException('unknown_reference');
  }

  private async assertEmpty(manager: EntityManager) {
    const counts = await Promise.all(
      [EnrolledStudent, Building, Course, Machine, User, Booking].map((entity) => manager.count(entity)),
    );
    if (counts.some((n) => n > 0)) throw new ConflictException('database_not_empty');
  }
}
