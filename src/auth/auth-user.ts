import { USER_ROLES, UserRole } from '../users/user.entity';

/** What a validated bearer credential puts on `req.user`. */
export type AuthUser = {
  userId: string;
  username: string;
  role: UserRole;
  via: 'jwt' | 'api-token';
};

export type JwtPayload = {
  sub: string;
  username: string;
  role: UserRole;
};

export function isUserRole(value: unknown): value is UserRole {
  return typeof value === 'string' && USER_ROLES.some((role) => role === value);
}

export function isAuthUser(value: unknown): value is AuthUser {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'userId' in value &&
    typeof value.userId === 'string' &&
    'username' in value &&
    typeof value.username === 'string' &&
    'role' in value &&
    isUserRole(value.role) &&
    'via' in value &&
    (value.via === 'jwt' || value.via === 'api-token')
  );
}
