import type { ApplicationFlags } from './Flags';
import type { Presence } from './Presence';
import type { CurrentUser, User } from './User';

/**
 * Channel kinds, as numbered by the gateway
 */
export enum ChannelType {
  Text = 0,
  Private = 1,
  Voice = 2,
  GroupDm = 3,
  Category = 4,
  News = 5,
  Unknown = -1
}

/**
 * Application the session belongs to
 */
export interface PartialCurrentApplicationInfo {
  id: string;
  flags: ApplicationFlags;
}

/**
 * Guild placeholder; the full guild arrives later in its own event
 */
export interface UnavailableGuild {
  id: string;
  unavailable: boolean;
}

/**
 * Direct message or group DM channel
 */
export interface PrivateChannel {
  id: string;
  kind: ChannelType;
  lastMessageId?: string;
  /** ISO 8601 timestamp */
  lastPinTimestamp?: string;
  recipients: User[];
}

/**
 * Initial state sent once after a successful identify
 */
export interface Ready {
  application: PartialCurrentApplicationInfo;

  /** Guilds the session will receive, not yet populated */
  guilds: UnavailableGuild[];

  /** Presences keyed by user ID */
  presences: Map<string, Presence>;

  /** Private channels keyed by channel ID */
  privateChannels: Map<string, PrivateChannel>;

  /** Needed to resume this session */
  sessionId: string;

  /** [shard index, shard count] */
  shard?: [number, number];

  /** Gateway servers that handled the identify, for debugging */
  trace: string[];

  user: CurrentUser;

  /** Gateway protocol version */
  version: number;
}
