/**
 * nats-box - publish, subscribe, request and reply over NATS
 *
 * The building blocks behind the `nats-pub`, `nats-sub`, `nats-req` and
 * `nats-rply` commands, usable on their own against any MessagingConnection.
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE - Connection Management, Types, Errors
// ============================================================================

export {
  ConnectionManager,
  NatsConnectionAdapter,
  SilentLogger,
  ConsoleLogger,
  NatsBoxError,
  ConnectionError,
  RequestError,
  PublishError,
  UsageError,
  encodePayload,
  decodePayload,
  VERSION,
} from './core';

export type {
  ConnectionConfig,
  ConnectionLifecycle,
  InboundMessage,
  MessageHandler,
  MessagingConnection,
  SubscribeOptions,
  SubscriptionHandle,
  Logger,
  LogWriter,
} from './core';

// ============================================================================
// CLIENT - Publisher & Requester
// ============================================================================

export { Publisher, Requester } from './client';
export type { PublisherConfig, RequesterConfig } from './client';

// ============================================================================
// SERVER - Subscriber & Responder
// ============================================================================

export { Subscriber, Responder } from './server';
export type { SubscriberConfig, ResponderConfig } from './server';

// ============================================================================
// CLI - Mode selection, flags, dispatcher
// ============================================================================

export { NatsBox, main, parseFlags, detectMode } from './cli';
export type { ToolMode, ToolFlags, Environment, ConnectionFactory, MainOptions } from './cli';
