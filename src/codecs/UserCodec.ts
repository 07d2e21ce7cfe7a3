import { UserPublicFlags } from '../models/Flags';
import type { PresenceUser } from '../models/PresenceUser';
import type { CurrentUser, PartialMember, User } from '../models/User';
import type { WireCurrentUser, WirePartialMember, WirePresenceUser, WireUser } from '../models/WireTypes';
import { LogContext } from '../utils/logger';
import { ValidationUtils, WireSchemas } from '../utils/validation';
import { decodeDiscriminator, decodeOptionalDiscriminator, encodeDiscriminator } from './Discriminator';

function publicFlagsFromWire(bits: number | null | undefined, context?: LogContext): UserPublicFlags | undefined {
  return bits === undefined || bits === null ? undefined : UserPublicFlags.decode(bits, context);
}

function publicFlagsToWire(flags: UserPublicFlags | undefined): number | null {
  return flags ? UserPublicFlags.encode(flags) : null;
}

function memberFromWire(wire: WirePartialMember): PartialMember {
  return {
    nick: wire.nick ?? undefined,
    roles: [...wire.roles],
    joinedAt: wire.joined_at ?? undefined,
    deaf: wire.deaf,
    mute: wire.mute
  };
}

function memberToWire(member: PartialMember): WirePartialMember {
  return {
    nick: member.nick ?? null,
    roles: [...member.roles],
    joined_at: member.joinedAt ?? null,
    deaf: member.deaf,
    mute: member.mute
  };
}

export function userFromWire(wire: WireUser, context?: LogContext): User {
  return {
    id: wire.id,
    name: wire.username,
    discriminator: decodeDiscriminator(wire.discriminator),
    bot: wire.bot ?? false,
    avatar: wire.avatar ?? undefined,
    publicFlags: publicFlagsFromWire(wire.public_flags, context),
    banner: wire.banner ?? undefined,
    accentColor: wire.accent_color ?? undefined,
    member: wire.member ? memberFromWire(wire.member) : undefined
  };
}

export function userToWire(user: User): WireUser {
  return {
    id: user.id,
    username: user.name,
    discriminator: encodeDiscriminator(user.discriminator),
    bot: user.bot,
    avatar: user.avatar ?? null,
    public_flags: publicFlagsToWire(user.publicFlags),
    banner: user.banner ?? null,
    accent_color: user.accentColor ?? null,
    member: user.member ? memberToWire(user.member) : null
  };
}

export function currentUserFromWire(wire: WireCurrentUser, context?: LogContext): CurrentUser {
  return {
    id: wire.id,
    name: wire.username,
    discriminator: decodeDiscriminator(wire.discriminator),
    bot: wire.bot ?? false,
    avatar: wire.avatar ?? undefined,
    email: wire.email ?? undefined,
    mfaEnabled: wire.mfa_enabled ?? false,
    verified: wire.verified ?? undefined,
    publicFlags: publicFlagsFromWire(wire.public_flags, context),
    banner: wire.banner ?? undefined,
    accentColor: wire.accent_color ?? undefined
  };
}

export function currentUserToWire(user: CurrentUser): WireCurrentUser {
  return {
    id: user.id,
    username: user.name,
    discriminator: encodeDiscriminator(user.discriminator),
    bot: user.bot,
    avatar: user.avatar ?? null,
    email: user.email ?? null,
    mfa_enabled: user.mfaEnabled,
    verified: user.verified ?? null,
    public_flags: publicFlagsToWire(user.publicFlags),
    banner: user.banner ?? null,
    accent_color: user.accentColor ?? null
  };
}

export function presenceUserFromWire(wire: WirePresenceUser, context?: LogContext): PresenceUser {
  return {
    id: wire.id,
    avatar: wire.avatar ?? undefined,
    bot: wire.bot ?? undefined,
    discriminator: decodeOptionalDiscriminator(wire.discriminator),
    email: wire.email ?? undefined,
    mfaEnabled: wire.mfa_enabled ?? undefined,
    name: wire.username ?? undefined,
    verified: wire.verified ?? undefined,
    publicFlags: publicFlagsFromWire(wire.public_flags, context)
  };
}

/**
 * The discriminator is left out entirely when unknown
 */
export function presenceUserToWire(user: PresenceUser): WirePresenceUser {
  return {
    id: user.id,
    avatar: user.avatar ?? null,
    bot: user.bot ?? null,
    ...(user.discriminator !== undefined ? { discriminator: encodeDiscriminator(user.discriminator) } : {}),
    email: user.email ?? null,
    mfa_enabled: user.mfaEnabled ?? null,
    username: user.name ?? null,
    verified: user.verified ?? null,
    public_flags: publicFlagsToWire(user.publicFlags)
  };
}

export function decodeUser(payload: unknown, context?: LogContext): User {
  return userFromWire(ValidationUtils.assertWire(payload, WireSchemas.user, 'user', context), context);
}

export function decodeCurrentUser(payload: unknown, context?: LogContext): CurrentUser {
  return currentUserFromWire(
    ValidationUtils.assertWire(payload, WireSchemas.currentUser, 'user', context),
    context
  );
}

export function decodePresenceUser(payload: unknown, context?: LogContext): PresenceUser {
  return presenceUserFromWire(
    ValidationUtils.assertWire(payload, WireSchemas.presenceUser, 'user', context),
    context
  );
}

export const encodeUser = userToWire;
export const encodeCurrentUser = currentUserToWire;
export const encodePresenceUser = presenceUserToWire;
