import type { User } from '../users/user.entity';
import { can } from '../auth/roles';
import { avatarUrl, courseLabelOf, displayUsername, fullNameOf } from '../users/user-profile';

export type FullBookerView = {
  visibility: 'full';
  userId: string;
  username: string;
  fullName: string;
  firstName: string;
  email: string;
  roomNo: string | null;
  contactNo: string | null;
  avatar: string;
  course: string | null;
  building: string | null;
};

export type LimitedBookerView = {
  visibility: 'limited';
  username: string;
  avatar: string;
};

export type BookerView = FullBookerView | LimitedBookerView;

type Viewer = Pick<User, 'id' | 'role'>;

/**
 * What `viewer` may see about the person holding a slot: everything when it is
 * their own booking or they can view contact details, otherwise name and avatar.
 */
export function projectBooker(booker: User, viewer: Viewer): BookerView {
  const avatar = avatarUrl(booker.email);
  const username = displayUsername(booker.username);
  if (booker.id !== viewer.id && !can(viewer.role, 'viewContactDetails')) {
    return { visibility: 'limited', username, avatar };
  }
  return {
    visibility: 'full',
    userId: booker.id,
    username,
    fullName: fullNameOf(booker),
    firstName: booker.firstName,
    email: booker.email,
    roomNo: booker.roomNo ?? null,
    contactNo: booker.contactNo ?? null,
    avatar,
    course: courseLabelOf(booker),
    building: booker.building?.name ?? null,
  };
}
