import type { ActivityFlags } from './Flags';

/**
 * Kind of activity, as numbered by the gateway
 */
export enum ActivityType {
  Playing = 0,
  Streaming = 1,
  Listening = 2,
  Watching = 3,
  Custom = 4,
  Competing = 5,
  /** A code this client does not know yet; never sent back to the gateway */
  Unknown = -1
}

/**
 * A button shown under a rich presence.
 * Bots never receive the real URL, so it is usually empty.
 */
export interface ActivityButton {
  label: string;
  url: string;
}

/**
 * Images for the presence and their hover texts
 */
export interface ActivityAssets {
  /** Large asset ID, usually a snowflake */
  largeImage?: string;
  largeText?: string;
  /** Small asset ID, usually a snowflake */
  smallImage?: string;
  smallText?: string;
}

export interface ActivityParty {
  id?: string;
  /** [current, max] */
  size?: [number, number];
}

/**
 * Secrets for Rich Presence joining and spectating
 */
export interface ActivitySecrets {
  join?: string;
  /** Secret for a specific instanced match */
  match?: string;
  spectate?: string;
}

/**
 * Emoji used in a custom status
 */
export interface ActivityEmoji {
  name: string;
  id?: string;
  animated?: boolean;
}

export interface ActivityTimestamps {
  /** Unix milliseconds */
  start?: number;
  /** Unix milliseconds */
  end?: number;
}

/**
 * Represents what an account is currently doing
 */
export interface Activity {
  /** Application providing the activity */
  applicationId?: string;

  assets?: ActivityAssets;

  /** What the user is doing */
  details?: string;

  /** What the payload includes */
  flags?: ActivityFlags;

  /** Whether the activity is an instanced game session */
  instance?: boolean;

  kind: ActivityType;

  /** Name of the activity, at most 128 characters */
  name: string;

  party?: ActivityParty;

  secrets?: ActivitySecrets;

  /** The user's current party status */
  state?: string;

  emoji?: ActivityEmoji;

  timestamps?: ActivityTimestamps;

  /** Track ID for listening activities */
  syncId?: string;

  sessionId?: string;

  /** Stream URL, only set for streaming activities */
  url?: string;

  /** Up to 2 buttons */
  buttons: ActivityButton[];
}

function create(name: string, kind: ActivityType, extra: Partial<Activity> = {}): Activity {
  return Object.freeze({ name, kind, buttons: [], ...extra });
}

/**
 * Named constructors for activities a client sends in its own presence
 */
export const Activity = {
  /** Shown as `Playing <name>` */
  playing(name: string): Activity {
    return create(name, ActivityType.Playing);
  },

  /**
   * Shown as `Streaming <name>`
   *
   * @throws TypeError when `url` cannot be parsed
   */
  streaming(name: string, url: string): Activity {
    return create(name, ActivityType.Streaming, { url: new URL(url).href });
  },

  /** Shown as `Listening to <name>` */
  listening(name: string): Activity {
    return create(name, ActivityType.Listening);
  },

  /** Shown as `Watching <name>` */
  watching(name: string): Activity {
    return create(name, ActivityType.Watching);
  },

  /** Shown as `Competing in <name>` */
  competing(name: string): Activity {
    return create(name, ActivityType.Competing);
  },

  custom(state: string, emoji?: ActivityEmoji): Activity {
    return create('Custom Status', ActivityType.Custom, emoji ? { state, emoji } : { state });
  }
};
