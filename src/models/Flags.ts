import { BitFlagSet, createFlagCodec } from '../codecs/BitFlags';

/**
 * Flags describing what an activity payload includes
 */
export const ACTIVITY_FLAGS = {
  INSTANCE: 1n << 0n,
  JOIN: 1n << 1n,
  SPECTATE: 1n << 2n,
  JOIN_REQUEST: 1n << 3n,
  SYNC: 1n << 4n,
  PLAY: 1n << 5n,
  PARTY_PRIVACY_FRIENDS: 1n << 6n,
  PARTY_PRIVACY_VOICE_CHANNEL: 1n << 7n,
  EMBEDDED: 1n << 8n
} as const;

export type ActivityFlag = keyof typeof ACTIVITY_FLAGS;
export type ActivityFlags = BitFlagSet<ActivityFlag>;
export const ActivityFlags = createFlagCodec<ActivityFlag>('ActivityFlags', ACTIVITY_FLAGS);

/**
 * Badges shown on a user's public profile
 */
export const USER_PUBLIC_FLAGS = {
  DISCORD_EMPLOYEE: 1n << 0n,
  PARTNERED_SERVER_OWNER: 1n << 1n,
  HYPESQUAD_EVENTS: 1n << 2n,
  BUG_HUNTER_LEVEL_1: 1n << 3n,
  HOUSE_BRAVERY: 1n << 6n,
  HOUSE_BRILLIANCE: 1n << 7n,
  HOUSE_BALANCE: 1n << 8n,
  EARLY_SUPPORTER: 1n << 9n,
  TEAM_USER: 1n << 10n,
  SYSTEM: 1n << 12n,
  BUG_HUNTER_LEVEL_2: 1n << 14n,
  VERIFIED_BOT: 1n << 16n,
  EARLY_VERIFIED_BOT_DEVELOPER: 1n << 17n,
  DISCORD_CERTIFIED_MODERATOR: 1n << 18n,
  BOT_HTTP_INTERACTIONS: 1n << 19n
} as const;

export type UserPublicFlag = keyof typeof USER_PUBLIC_FLAGS;
export type UserPublicFlags = BitFlagSet<UserPublicFlag>;
export const UserPublicFlags = createFlagCodec<UserPublicFlag>('UserPublicFlags', USER_PUBLIC_FLAGS);

/**
 * Gateway intents and capabilities granted to an application
 */
export const APPLICATION_FLAGS = {
  GATEWAY_PRESENCE: 1n << 12n,
  GATEWAY_PRESENCE_LIMITED: 1n << 13n,
  GATEWAY_GUILD_MEMBERS: 1n << 14n,
  GATEWAY_GUILD_MEMBERS_LIMITED: 1n << 15n,
  VERIFICATION_PENDING_GUILD_LIMIT: 1n << 16n,
  EMBEDDED: 1n << 17n,
  GATEWAY_MESSAGE_CONTENT: 1n << 18n,
  GATEWAY_MESSAGE_CONTENT_LIMITED: 1n << 19n
} as const;

export type ApplicationFlag = keyof typeof APPLICATION_FLAGS;
export type ApplicationFlags = BitFlagSet<ApplicationFlag>;
export const ApplicationFlags = createFlagCodec<ApplicationFlag>('ApplicationFlags', APPLICATION_FLAGS);
