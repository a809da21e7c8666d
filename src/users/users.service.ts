import {
  BadRequestException,
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { ILike, Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { DateTime } from 'luxon';
import { User, UserRole } from './user.entity';
import { Building } from '../buildings/building.entity';
import { Course } from '../courses/course.entity';
import { isPrivilegedRole } from '../auth/roles';

export type CreateUserInput = {
  username: string;
  firstName: string;
  middleName?: string | null;
  lastName?: string | null;
  email: string;
  password: string;
  role: UserRole;
  buildingId: string;
  courseId?: string | null;
  contactNo?: string | null;
  roomNo?: string | null;
  hostName?: string | null;
  departureDate?: string | null;
};

export type ProfilePatch = {
  firstName?: string;
  middleName?: string | null;
  lastName?: string | null;
  email?: string;
  contactNo?: string | null;
  roomNo?: string | null;
  buildingId?: string;
};

export type ReminderPreferences = {
  enabled?: boolean;
  leadHours?: number;
  email?: string | null;
};

const BCRYPT_ROUNDS = 10;
export const MIN_REMINDER_LEAD_HOURS = 1;
export const MAX_REMINDER_LEAD_HOURS = 48;

@Injectable()
export class UsersService {
  private readonly log = new Logger(UsersService.name);
  private readonly defaultLeadHours: number;

  constructor(
    @InjectRepository(User) private readonly users: Repository<User>,
    @InjectRepository(Building) private readonly buildings: Repository<Building>,
    @InjectRepository(Course) private readonly courses: Repository<Course>,
    private readonly cfg: ConfigService,
  ) {
    const lead = Number(this.cfg.get('DEFAULT_REMINDER_LEAD_HOURS') ?? 2);
    this.defaultLeadHours =
      Number.isInteger(lead) && lead >= MIN_REMINDER_LEAD_HOURS && lead <= MAX_REMINDER_LEAD_HOURS ? lead : 2;
  }

  findById(id: string) {
    return this.users.findOne({ where: { id }, relations: { building: true, course: true } });
  }

  async requireById(id: string) {
    const user = await this.findById(id);
    if (!user) throw new NotFoundException('user_not_found');
    return user;
  }

  /** Loads the caller behind a bearer credential; inactive accounts are refused. */
  async requireActive(id: string) {
    const user = await this.findById(id);
    if (!user || !user.isActive) throw new UnauthorizedException('user_inactive');
    return user;
  }

  findByEmail(email: string) {
    return this.users.findOne({ where: { email: email.trim().toLowerCase() } });
  }

  findByUsername(username: string) {
    return this.users.findOne({ where: { username: username.trim() } });
  }

  /** Login identifier: an email when it contains "@", a username otherwise. */
  findByLogin(identifier: string) {
    return identifier.includes('@') ? this.findByEmail(identifier) : this.findByUsername(identifier);
  }

  list(role?: UserRole) {
    return this.users.find({
      where: role ? { role } : {},
      order: { username: 'ASC' },
      relations: { building: true, course: true },
    });
  }

  search(query: string, limit = 20) {
    const term = `%${query.trim()}%`;
    return this.users.find({
      where: [
        { username: ILike(term) },
        { email: ILike(term) },
        { firstName: ILike(term) },
        { lastName: ILike(term) },
      ],
      take: limit,
      order: { username: 'ASC' },
      relations: { building: true, course: true },
    });
  }

  async create(input: CreateUserInput) {
    const email = input.email.trim().toLowerCase();
    const username = input.username.trim();
    if (await this.findByEmail(email)) throw new BadRequestException('email_taken');
    if (await this.findByUsername(username)) throw new BadRequestException('username_taken');

    const building = await this.buildings.findOne({ where: { id: input.buildingId } });
    if (!building) throw new BadRequestException('building_not_found');

    let course: Course | null = null;
    if (input.courseId) {
      course = await this.courses.findOne({ where: { id: input.courseId } });
      if (!course) throw new BadRequestException('course_not_found');
    }

    const passwordHash = await bcrypt.hash(input.password, BCRYPT_ROUNDS);
    const user = this.users.create({
      username,
      firstName: input.firstName.trim(),
      middleName: input.middleName?.trim() || null,
      lastName: input.lastName?.trim() || null,
      email,
      passwordHash,
      role: input.role,
      building,
      course,
      contactNo: input.contactNo?.trim() || null,
      roomNo: input.roomNo?.trim() || null,
      hostName: input.hostName?.trim() || null,
      departureDate: input.departureDate ?? null,
      isActive: true,
      reminderEnabled: false,
      reminderLeadHours: this.defaultLeadHours,
      reminderEmail: null,
    });
    const saved = await this.users.save(user);
    this.log.log(`User ${saved.username} created with role ${saved.role}`);
    return saved;
  }

  async verifyPassword(user: User, password: string) {
    return bcrypt.compare(password, user.passwordHash);
  }

  async updateProfile(user: User, patch: ProfilePatch) {
    if (patch.email !== undefined) {
      const email = patch.email.trim().toLowerCase();
      if (email !== user.email) {
        const taken = await this.findByEmail(email);
        if (taken) throw new BadRequestException('email_taken');
        user.email = email;
      }
    }
    if (patch.buildingId !== undefined) {
      const building = await this.buildings.findOne({ where: { id: patch.buildingId } });
      if (!building) throw new BadRequestException('building_not_found');
      user.building = building;
    }
    if (patch.firstName !== undefined) user.firstName = patch.firstName.trim();
    if (patch.middleName !== undefined) user.middleName = patch.middleName?.trim() || null;
    if (patch.lastName !== undefined) user.lastName = patch.lastName?.trim() || null;
    if (patch.contactNo !== undefined) user.contactNo = patch.contactNo?.trim() || null;
    if (patch.roomNo !== undefined) user.roomNo = patch.roomNo?.trim() || null;
    return this.users.save(user);
  }

  async updateReminderPreferences(user: User, prefs: ReminderPreferences) {
    if (prefs.leadHours !== undefined) {
      if (
        !Number.isInteger(prefs.leadHours) ||
        prefs.leadHours < MIN_REMINDER_LEAD_HOURS ||
        prefs.leadHours > MAX_REMINDER_LEAD_HOURS
      ) {
        throw new BadRequestException('invalid_lead_hours');
      }
      user.reminderLeadHours = prefs.leadHours;
    }
    if (prefs.enabled !== undefined) user.reminderEnabled = prefs.enabled;
    if (prefs.email !== undefined) user.reminderEmail = prefs.email?.trim().toLowerCase() || null;
    return this.users.save(user);
  }

  /**
   * Admins may move users between `user` and `guest`; granting or revoking
   * admin or superadmin needs a superadmin.
   */
  async changeRole(actor: User, targetId: string, role: UserRole) {
    if (actor.id === targetId) throw new BadRequestException('cannot_change_own_role');
    const target = await this.requireById(targetId);
    const touchesAdmin = isPrivilegedRole(role) || isPrivilegedRole(target.role);
    if (touchesAdmin && actor.role !== 'superadmin') {
      throw new ForbiddenException('superadmin_required');
    }
    target.role = role;
    const saved = await this.users.save(target);
    this.log.log(`Role of ${saved.username} changed to ${role} by ${actor.username}`);
    return saved;
  }

  async setActive(targetId: string, isActive: boolean) {
    const target = await this.requireById(targetId);
    target.isActive = isActive;
    return this.users.save(target);
  }

  async resetPassword(targetId: string, password: string) {
    const target = await this.requireById(targetId);
    target.passwordHash = await bcrypt.hash(password, BCRYPT_ROUNDS);
    await this.users.save(target);
  }

  /** Deleting a user deletes their bookings with them. */
  async remove(actor: User, targetId: string) {
    if (actor.id === targetId) throw new BadRequestException('cannot_delete_self');
    const target = await this.requireById(targetId);
    if (isPrivilegedRole(target.role) && actor.role !== 'superadmin') {
      throw new ForbiddenException('superadmin_required');
    }
    await this.users.delete({ id: target.id });
    this.log.log(`User ${target.username} deleted by ${actor.username}`);
  }

  async touchLastSeen(user: User) {
    await this.users.update({ id: user.id }, { lastSeenAt: DateTime.now().toJSDate() });
  }
}
