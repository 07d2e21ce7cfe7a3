import type { UserPublicFlags } from './Flags';

/**
 * Guild membership attached to a user in guild-scoped payloads
 */
export interface PartialMember {
  nick?: string;
  roles: string[];
  /** ISO 8601 timestamp */
  joinedAt?: string;
  deaf: boolean;
  mute: boolean;
}

/**
 * Canonical user record
 */
export interface User {
  /** Snowflake ID */
  id: string;

  /** Username */
  name: string;

  /** Legacy discriminator, 0 for accounts on the new username system */
  discriminator: number;

  bot: boolean;

  /** Avatar hash */
  avatar?: string;

  publicFlags?: UserPublicFlags;

  /** Banner hash */
  banner?: string;

  /** Banner colour as an RGB integer */
  accentColor?: number;

  member?: PartialMember;
}

/**
 * The account a gateway session is authenticated as
 */
export interface CurrentUser {
  id: string;
  name: string;
  discriminator: number;
  bot: boolean;
  avatar?: string;
  email?: string;
  mfaEnabled: boolean;
  verified?: boolean;
  publicFlags?: UserPublicFlags;
  banner?: string;
  accentColor?: number;
}
