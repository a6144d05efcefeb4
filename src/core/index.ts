/**
 * Core utilities and types for nats-box
 */

// Connection Management
export { ConnectionManager, parseServers, maskUrl } from './connection/ConnectionManager';
export type { ConnectionConfig } from './connection/ConnectionManager';
export { NatsConnectionAdapter, toRequestError } from './connection/NatsConnectionAdapter';

// Types
export type {
  InboundMessage,
  MessageHandler,
  MessagingConnection,
  SubscribeOptions,
  SubscriptionHandle,
  ConnectionLifecycle,
} from './types/Messaging';

export type { Logger, LogLevel, LogWriter, ConsoleLoggerOptions } from './types/Logger';
export { SilentLogger, ConsoleLogger, formatTimestamp } from './types/Logger';

// Messages
export { encodePayload, decodePayload, formatReceived } from './message';

// Constants
export { VERSION, TIME, DEFAULTS, ENV, TOOL_NAMES, maxReconnectAttempts } from './constants';

// Errors
export {
  NatsBoxError,
  ConnectionError,
  RequestError,
  PublishError,
  UsageError,
  errorMessage,
  asError,
} from './errors';
