import type { UserRole } from '../users/user.entity';

export type Capability =
  | 'book'
  | 'manageAnyBooking'
  | 'viewContactDetails'
  | 'administer'
  | 'manageAdmins';

const CAPABILITIES: Record<UserRole, readonly Capability[]> = {
  guest: ['book'],
  user: ['book'],
  admin: ['book', 'manageAnyBooking', 'viewContactDetails', 'administer'],
  superadmin: ['book', 'manageAnyBooking', 'viewContactDetails', 'administer', 'manageAdmins'],
};

export function can(role: UserRole, capability: Capability) {
  return CAPABILITIES[role].includes(capability);
}

export function isPrivilegedRole(role: UserRole) {
  return role === 'admin' || role === 'superadmin';
}
