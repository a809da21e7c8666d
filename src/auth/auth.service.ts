import {
  BadRequestException,
  ForbiddenException,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { UsersService } from '../users/users.service';
import { EnrolledStudentsService } from '../enrolled-students/enrolled-students.service';
import { EventLogService } from '../event-log/event-log.service';
import { fullNameOf, toProfile } from '../users/user-profile';
import { isoDay, parseDay, resolveTimezone, todayIn } from '../common/timezone';
import { JwtPayload } from './auth-user';
import { RegisterDto } from './dto/register.dto';

@Injectable()
export class AuthService {
  private readonly zone: string;

  constructor(
    private users: UsersService,
    private enrolled: EnrolledStudentsService,
    private jwt: JwtService,
    private events: EventLogService,
    cfg: ConfigService,
  ) {
    this.zone = resolveTimezone(cfg);
  }

  async login(identifier: string, password: string) {
    const user = await this.users.findByLogin(identifier);
    if (!user || !user.isActive) {
      await this.events.record({
        actor: user,
        action: 'auth.login',
        outcome: 'error',
        message: 'invalid credentials',
        details: { login: identifier },
      });
      throw new UnauthorizedException('invalid_credentials');
    }

    const ok = await this.users.verifyPassword(user, password);
    if (!ok) {
      await this.events.record({
        actor: user,
        action: 'auth.login',
        outcome: 'error',
        message: 'invalid credentials',
      });
      throw new UnauthorizedException('invalid_credentials');
    }

    const payload: JwtPayload = { sub: user.id, username: user.username, role: user.role };
    const accessToken = await this.jwt.signAsync(payload);
    await this.users.touchLastSeen(user);

    await this.events.record({ actor: user, action: 'auth.login' });
    return {
      accessToken,
      user: {
        id: user.id,
        username: user.username,
        name: fullNameOf(user),
        email: user.email,
        role: user.role,
      },
    };
  }

  /**
   * Self-registration. Residents need a course and an email on the enrolled
   * list; guests need a contact number, a host and a departure date.
   */
  async register(dto: RegisterDto) {
    if (dto.role === 'user') {
      if (!dto.courseId) throw new BadRequestException('course_required');
      if (!(await this.enrolled.isEnrolled(dto.email))) {
        throw new ForbiddenException('not_enrolled');
      }
    } else {
      if (!dto.contactNo?.trim() || !dto.hostName?.trim() || !dto.departureDate) {
        throw new BadRequestException('guest_details_required');
      }
      const departure = parseDay(dto.departureDate, this.zone);
      if (!departure || isoDay(departure) < todayIn(this.zone)) {
        throw new BadRequestException('invalid_departure_date');
      }
    }

    const user = await this.users.create({
      username: dto.username,
      firstName: dto.firstName,
      middleName: dto.middleName,
      lastName: dto.lastName,
      email: dto.email,
      password: dto.password,
      role: dto.role,
      buildingId: dto.buildingId,
      courseId: dto.role === 'user' ? dto.courseId : null,
      contactNo: dto.contactNo,
      roomNo: dto.roomNo,
      hostName: dto.role === 'guest' ? dto.hostName : null,
      departureDate: dto.role === 'guest' ? dto.departureDate : null,
    });
    await this.events.record({ actor: user, action: 'auth.register', subjectId: user.id });

    const created = await this.users.requireById(user.id);
    return toProfile(created);
  }
}
