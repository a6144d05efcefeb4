/**
 * Centralized constants for nats-box
 *
 * Defaults and policy values shared by the CLI and the connection layer.
 */

/**
 * Tool version reported by `-v`
 */
export const VERSION = '0.3.0';

/**
 * Time intervals in milliseconds
 */
export const TIME = {
  /**
   * Delay between reconnection attempts (1 second)
   */
  RECONNECT_WAIT_MS: 1_000,

  /**
   * Total time the client keeps trying to reconnect (10 minutes)
   */
  RECONNECT_WINDOW_MS: 600_000,

  /**
   * How long a request waits for its reply (2 seconds)
   */
  REQUEST_TIMEOUT_MS: 2_000,
} as const;

/**
 * Default option values
 */
export const DEFAULTS = {
  /**
   * Server used when neither `-s` nor NATS_URL is given
   */
  SERVER: 'connect.ngs.global',

  /**
   * Queue group joined by the responder
   */
  QUEUE_GROUP: 'NATS-RPLY-22',
} as const;

/**
 * Environment variables read at startup
 */
export const ENV = {
  URL: 'NATS_URL',
  CREDS: 'NATS_CREDS',
} as const;

/**
 * Connection names announced to the server, one per mode
 */
export const TOOL_NAMES = {
  publish: 'NATS-PUB TOOL',
  subscribe: 'NATS-SUB TOOL',
  request: 'NATS-REQ TOOL',
  reply: 'NATS-RPLY TOOL',
} as const;

/**
 * Maximum reconnect attempts that fit in the reconnect window
 */
export function maxReconnectAttempts(
  windowMs: number = TIME.RECONNECT_WINDOW_MS,
  waitMs: number = TIME.RECONNECT_WAIT_MS
): number {
  return Math.floor(windowMs / waitMs);
}
