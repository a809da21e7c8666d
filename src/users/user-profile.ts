import { createHash } from 'crypto';
import type { User } from './user.entity';

export const DISPLAY_USERNAME_MAX = 15;

export function fullNameOf(user: Pick<User, 'firstName' | 'middleName' | 'lastName'>) {
  return [user.firstName, user.middleName, user.lastName]
    .map((part) => part?.trim())
    .filter((part): part is string => !!part)
    .join(' ');
}

export function avatarUrl(email: string, size = 120) {
  const hash = createHash('sha256').update(email.trim().toLowerCase()).digest('hex');
  return `https://gravatar.com/avatar/${hash}?d=identicon&s=${size}`;
}

export function displayUsername(username: string) {
  return username.slice(0, DISPLAY_USERNAME_MAX);
}

export function courseLabelOf(user: Pick<User, 'role' | 'course'>) {
  if (user.role === 'guest') return 'Guest';
  return user.course?.shortName || user.course?.name || null;
}

/** The signed-in user's own profile. */
export function toProfile(user: User) {
  return {
    id: user.id,
    username: user.username,
    fullName: fullNameOf(user),
    firstName: user.firstName,
    middleName: user.middleName ?? null,
    lastName: user.lastName ?? null,
    email: user.email,
    role: user.role,
    contactNo: user.contactNo ?? null,
    roomNo: user.roomNo ?? null,
    avatar: avatarUrl(user.email),
    building: user.building ? { id: user.building.id, name: user.building.name } : null,
    course: user.course ? { id: user.course.id, code: user.course.code, name: user.course.name } : null,
    hostName: user.hostName ?? null,
    departureDate: user.departureDate ?? null,
    reminders: {
      enabled: user.reminderEnabled,
      leadHours: user.reminderLeadHours,
      email: user.reminderEmail ?? null,
    },
    lastSeenAt: user.lastSeenAt ? user.lastSeenAt.toISOString() : null,
    createdAt: user.createdAt.toISOString(),
  };
}
