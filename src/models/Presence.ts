import type { Activity } from './Activity';
import type { PresenceUser } from './PresenceUser';

/**
 * Online status values sent by the gateway
 */
export const ONLINE_STATUSES = ['online', 'idle', 'dnd', 'invisible', 'offline'] as const;

export type OnlineStatus = typeof ONLINE_STATUSES[number];

/**
 * Per-platform status, each platform is absent when the user is not active there
 */
export interface ClientStatus {
  desktop?: OnlineStatus;
  mobile?: OnlineStatus;
  web?: OnlineStatus;
}

/**
 * A user's online status and current activities
 */
export interface Presence {
  /** Current activities, in the order the gateway sent them */
  activities: Activity[];

  clientStatus?: ClientStatus;

  /** Guild the update came from */
  guildId?: string;

  status: OnlineStatus;

  user: PresenceUser;
}
