import { DataSource } from 'typeorm';
import { JwtService } from '@nestjs/jwt';
import { AuthService } from './auth.service';
import { JwtPayload } from './auth-user';
import { RegisterDto } from './dto/register.dto';
import { UsersService } from '../users/users.service';
import { User } from '../users/user.entity';
import { Building } from '../buildings/building.entity';
import { Course } from '../courses/course.entity';
import { EnrolledStudent } from '../enrolled-students/enrolled-student.entity';
import { EnrolledStudentsService } from '../enrolled-students/enrolled-students.service';
import { EventLog } from '../event-log/event-log.entity';
import { EventLogService } from '../event-log/event-log.service';
import { createTestDataSource, freezeTime, testConfig, unfreezeTime } from '../testing/test-data-source';
import { saveBuilding, saveCourse } from '../testing/fixtures';

describe('AuthService', () => {
  let ds: DataSource;
  let auth: AuthService;
  let users: UsersService;
  let jwt: JwtService;
  let building: Building;
  let course: Course;

  const registration = (fields: Partial<RegisterDto>) =>
    Object.assign(new RegisterDto(), {
      username: 'asha',
      firstName: 'Asha',
      lastName: 'Rao',
      email: 'Asha@Example.test',
      password: 'test-password',
      role: 'user',
      buildingId: building.id,
      courseId: course.id,
      ...fields,
    });

  beforeEach(async () => {
    freezeTime('2025-06-01T10:00:00');
    ds = await createTestDataSource();
    const cfg = testConfig();
    users = new UsersService(ds.getRepository(User), ds.getRepository(Building), ds.getRepository(Course), cfg);
    const enrolled = new EnrolledStudentsService(ds.getRepository(EnrolledStudent), cfg);
    jwt = new JwtService({ secret: 'test-secret', signOptions: { expiresIn: '1h' } });
    auth = new AuthService(users, enrolled, jwt, new EventLogService(ds.getRepository(EventLog), cfg), cfg);

    building = await saveBuilding(ds, 'North Block');
    course = await saveCourse(ds, { code: 'MSTAT', name: 'Master of Statistics', shortName: 'MStat' });
    await enrolled.add('Asha Rao', 'asha@example.test');
  });

  afterEach(async () => {
    await ds.destroy();
    unfreezeTime();
  });

  describe('register', () => {
    it('registers an enrolled resident', async () => {
      const profile = await auth.register(registration({}));

      expect(profile.username).toBe('asha');
      expect(profile.email).toBe('asha@example.test');
      expect(profile.role).toBe('user');
      expect(profile.course).toEqual({ id: course.id, code: 'MSTAT', name: 'Master of Statistics' });
      expect(profile.building).toEqual({ id: building.id, name: 'North Block' });
    });

    it('requires residents to be on the enrolled list', async () => {
      await expect(auth.register(registration({ email: 'stranger@example.test' }))).rejects.toThrow(
        'not_enrolled',
      );
    });

    it('requires residents to pick a course', async () => {
      await expect(auth.register(registration({ courseId: undefined }))).rejects.toThrow('course_required');
    });

    it('registers a guest with a future departure date and no course', async () => {
      const profile = await auth.register(
        registration({
          username: 'visitor',
          email: 'visitor@example.test',
          role: 'guest',
          contactNo: '9000000003',
          hostName: 'Asha Rao',
          departureDate: '2025-06-05',
        }),
      );

      expect(profile.role).toBe('guest');
      expect(profile.course).toBeNull();
      expect(profile.hostName).toBe('Asha Rao');
      expect(profile.departureDate).toBe('2025-06-05');
    });

    it('asks guests for their details and a departure that has not passed', async () => {
      const guest = { username: 'visitor', email: 'visitor@example.test', role: 'guest' as const };

      await expect(auth.register(registration({ ...guest, hostName: 'Asha Rao' }))).rejects.toThrow(
        'guest_details_required',
      );
      await expect(
        auth.register(
          registration({ ...guest, contactNo: '9000000003', hostName: 'Asha Rao', departureDate: '2025-05-31' }),
        ),
      ).rejects.toThrow('invalid_departure_date');
    });
  });

  describe('login', () => {
    beforeEach(async () => {
      await auth.register(registration({}));
    });

    it('issues a token carrying the user id, username and role', async () => {
      const result = await auth.login('asha', 'test-password');

      const payload = await jwt.verifyAsync<JwtPayload>(result.accessToken);
      expect(payload.sub).toBe(result.user.id);
      expect(payload.username).toBe('asha');
      expect(payload.role).toBe('user');
      expect(result.user).toEqual({
        id: result.user.id,
        username: 'asha',
        name: 'Asha Rao',
        email: 'asha@example.test',
        role: 'user',
      });
    });

    it('accepts the email as login and records when the user was last seen', async () => {
      const result = await auth.login('ASHA@example.test', 'test-password');

      const user = await users.requireById(result.user.id);
      expect(user.lastSeenAt?.toISOString()).toBe('2025-06-01T04:30:00.000Z');
    });

    it('rejects a wrong password and audits the attempt', async () => {
      await expect(auth.login('asha', 'wrong-password')).rejects.toThrow('invalid_credentials');

      const entries = await ds.getRepository(EventLog).find({ where: { action: 'auth.login' } });
      expect(entries.map((e) => e.outcome)).toEqual(['error']);
    });

    it('rejects deactivated accounts', async () => {
      const user = await users.findByUsername('asha');
      await users.setActive(user?.id ?? '', false);

      await expect(auth.login('asha', 'test-password')).rejects.toThrow('invalid_credentials');
    });
  });
});
