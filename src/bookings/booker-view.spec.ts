import { projectBooker } from './booker-view';
import { User } from '../users/user.entity';
import { Building } from '../buildings/building.entity';
import { Course } from '../courses/course.entity';
import { avatarUrl } from '../users/user-profile';

function makeUser(fields: Partial<User>): User {
  return Object.assign(new User(), {
    id: 'booker-id',
    username: 'booker',
    firstName: 'Bela',
    email: 'Bela@Example.test',
    role: 'user',
    building: Object.assign(new Building(), { id: 'b1', name: 'South Block' }),
    course: null,
    ...fields,
  });
}

describe('projectBooker', () => {
  it('shortens usernames to 15 characters', () => {
    const booker = makeUser({ username: 'averyveryverylongname' });

    const view = projectBooker(booker, { id: 'someone-else', role: 'user' });

    expect(view).toEqual({
      visibility: 'limited',
      username: 'averyveryverylo',
      avatar: avatarUrl('bela@example.test'),
    });
  });

  it('labels guests as Guest whatever their course', () => {
    const course = Object.assign(new Course(), { id: 'c1', name: 'Master of Science', shortName: 'MSc' });
    const booker = makeUser({ role: 'guest', course, hostName: 'Asha', contactNo: '9000000002' });

    const view = projectBooker(booker, { id: 'admin-id', role: 'admin' });

    expect(view).toEqual({
      visibility: 'full',
      userId: 'booker-id',
      username: 'booker',
      fullName: 'Bela',
      firstName: 'Bela',
      email: 'Bela@Example.test',
      roomNo: null,
      contactNo: '9000000002',
      avatar: avatarUrl('bela@example.test'),
      course: 'Guest',
      building: 'South Block',
    });
  });

  it('falls back to the course name when there is no short name', () => {
    const course = Object.assign(new Course(), { id: 'c2', name: 'Library Science', shortName: null });

    const view = projectBooker(makeUser({ course }), { id: 'booker-id', role: 'user' });

    expect(view.visibility === 'full' && view.course).toBe('Library Science');
  });

  it('gives superadmins the full view', () => {
    const view = projectBooker(makeUser({}), { id: 'root', role: 'superadmin' });

    expect(view.visibility).toBe('full');
  });
});
