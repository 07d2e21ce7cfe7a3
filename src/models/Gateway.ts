/**
 * Response of the gateway endpoint
 */
export interface Gateway {
  /** Gateway URL to connect to */
  url: string;
}

/**
 * How many sessions can still be started in the current rate limit window
 */
export interface SessionStartLimit {
  /** Session starts left in this window */
  remaining: number;

  /** Milliseconds until the window resets */
  resetAfter: number;

  /** Session starts allowed per window */
  total: number;

  /** Identify requests allowed per 5 seconds */
  maxConcurrency: number;
}

/**
 * Response of the bot gateway endpoint, with the recommended shard count
 */
export interface BotGateway {
  sessionStartLimit: SessionStartLimit;
  shards: number;
  url: string;
}
