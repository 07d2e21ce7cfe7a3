import type { UserPublicFlags } from './Flags';
import type { User } from './User';

/**
 * The user inside a presence update.
 *
 * Presence updates only carry the fields that changed since the last full
 * user record, so everything except the ID may be missing.
 */
export interface PresenceUser {
  id: string;
  avatar?: string;
  bot?: boolean;
  discriminator?: number;
  email?: string;
  mfaEnabled?: boolean;
  name?: string;
  verified?: boolean;
  publicFlags?: UserPublicFlags;
}

/**
 * Convert a presence user into a full {@link User}.
 *
 * Returns `undefined` when `bot`, `discriminator` or `name` is missing; that
 * only means the update did not carry enough data.
 */
export function intoUser(view: PresenceUser): User | undefined {
  const { bot, discriminator, name } = view;
  if (bot === undefined || discriminator === undefined || name === undefined) {
    return undefined;
  }

  return {
    id: view.id,
    name,
    discriminator,
    bot,
    avatar: view.avatar,
    publicFlags: view.publicFlags
  };
}

/**
 * Alias of {@link intoUser} for callers holding a read-only view. The view is
 * only read and the returned user is always a new object.
 */
export function toUser(view: Readonly<PresenceUser>): User | undefined {
  return intoUser(view);
}

/**
 * Refresh a cached presence user with a canonical user record, in place.
 *
 * A missing avatar or public flags on `user` leaves the cached value alone.
 */
export function updateWithUser(view: PresenceUser, user: User): void {
  view.id = user.id;
  if (user.avatar !== undefined) {
    view.avatar = user.avatar;
  }
  view.bot = user.bot;
  view.discriminator = user.discriminator;
  view.name = user.name;
  if (user.publicFlags !== undefined) {
    view.publicFlags = user.publicFlags;
  }
}
