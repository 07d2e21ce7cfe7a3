import type { OnlineStatus } from './Presence';

/**
 * JSON shapes exactly as the gateway sends them. Optional fields may be
 * absent or `null`; the codecs map both to `undefined`.
 */

export interface WireActivityButton {
  label: string;
  url?: string | null;
}

/**
 * Older gateway versions send bare labels instead of objects
 */
export type WireActivityButtons = Array<string | WireActivityButton>;

export interface WireActivityAssets {
  large_image?: string | null;
  large_text?: string | null;
  small_image?: string | null;
  small_text?: string | null;
}

export interface WireActivityParty {
  id?: string | null;
  size?: [number, number] | null;
}

export interface WireActivitySecrets {
  join?: string | null;
  match?: string | null;
  spectate?: string | null;
}

export interface WireActivityEmoji {
  name: string;
  id?: string | null;
  animated?: boolean | null;
}

export interface WireActivityTimestamps {
  start?: number | null;
  end?: number | null;
}

export interface WireActivity {
  application_id?: string | null;
  assets?: WireActivityAssets | null;
  details?: string | null;
  flags?: number | null;
  instance?: boolean | null;
  type?: number;
  name: string;
  party?: WireActivityParty | null;
  secrets?: WireActivitySecrets | null;
  state?: string | null;
  emoji?: WireActivityEmoji | null;
  timestamps?: WireActivityTimestamps | null;
  sync_id?: string | null;
  session_id?: string | null;
  url?: string | null;
  buttons?: WireActivityButtons | null;
}

export interface WireClientStatus {
  desktop?: OnlineStatus | null;
  mobile?: OnlineStatus | null;
  web?: OnlineStatus | null;
}

export interface WirePartialMember {
  nick?: string | null;
  roles: string[];
  joined_at?: string | null;
  deaf: boolean;
  mute: boolean;
}

export interface WireUser {
  id: string;
  username: string;
  discriminator: string;
  bot?: boolean;
  avatar?: string | null;
  public_flags?: number | null;
  banner?: string | null;
  accent_color?: number | null;
  member?: WirePartialMember | null;
}

export interface WireCurrentUser {
  id: string;
  username: string;
  discriminator: string;
  bot?: boolean;
  avatar?: string | null;
  email?: string | null;
  mfa_enabled?: boolean;
  verified?: boolean | null;
  public_flags?: number | null;
  banner?: string | null;
  accent_color?: number | null;
}

export interface WirePresenceUser {
  id: string;
  avatar?: string | null;
  bot?: boolean | null;
  discriminator?: string | null;
  email?: string | null;
  mfa_enabled?: boolean | null;
  username?: string | null;
  verified?: boolean | null;
  public_flags?: number | null;
}

export interface WirePresence {
  activities?: WireActivity[];
  client_status?: WireClientStatus | null;
  guild_id?: string | null;
  status: OnlineStatus;
  user: WirePresenceUser;
}

export interface WirePartialApplication {
  id: string;
  flags: number;
}

export interface WireUnavailableGuild {
  id: string;
  unavailable?: boolean;
}

export interface WirePrivateChannel {
  id: string;
  type: number;
  last_message_id?: string | null;
  last_pin_timestamp?: string | null;
  recipients: WireUser[];
}

export interface WireReady {
  application: WirePartialApplication;
  guilds: WireUnavailableGuild[];
  presences?: WirePresence[];
  private_channels?: WirePrivateChannel[];
  session_id: string;
  shard?: [number, number] | null;
  _trace?: string[];
  user: WireCurrentUser;
  v: number;
}

export interface WireSessionStartLimit {
  remaining: number;
  reset_after: number;
  total: number;
  max_concurrency: number;
}

export interface WireGateway {
  url: string;
}

export interface WireBotGateway {
  session_start_limit: WireSessionStartLimit;
  shards: number;
  url: string;
}
