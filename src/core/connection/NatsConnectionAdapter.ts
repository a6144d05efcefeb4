import { setImmediate } from 'timers/promises';
import { ErrorCode, NatsError, type Msg, type NatsConnection } from 'nats';
import { type Logger, SilentLogger } from '../types/Logger';
import { ConnectionError, PublishError, RequestError, errorMessage } from '../errors';
import type {
  InboundMessage,
  MessageHandler,
  MessagingConnection,
  SubscribeOptions,
  SubscriptionHandle,
} from '../types/Messaging';

const toInboundMessage = (msg: Msg): InboundMessage => ({
  subject: msg.subject,
  data: msg.data,
  reply: msg.reply,
  respond: (data: Uint8Array) => msg.respond(data),
});

/**
 * Map a client request failure onto a RequestError
 */
export function toRequestError(error: unknown, details: Record<string, unknown>): RequestError {
  if (error instanceof NatsError) {
    if (error.code === ErrorCode.Timeout) {
      return RequestError.timeout(details);
    }
    if (error.code === ErrorCode.NoResponders) {
      return RequestError.noResponders(details);
    }
  }
  return RequestError.failed(errorMessage(error), details);
}

/**
 * Exposes a `nats` client connection as a MessagingConnection
 *
 * Errors the server reports asynchronously (permission violations on publish
 * or subscribe) are kept and thrown by the next flush(), so that a refused
 * operation fails the caller that flushed it.
 */
export class NatsConnectionAdapter implements MessagingConnection {
  private logger: Logger;
  private lastError?: ConnectionError;

  constructor(
    private readonly nc: NatsConnection,
    logger?: Logger
  ) {
    this.logger = logger || new SilentLogger();
  }

  get server(): string {
    return this.nc.getServer();
  }

  publish(subject: string, data: Uint8Array): void {
    this.nc.publish(subject, data);
  }

  subscribe(
    subject: string,
    handler: MessageHandler,
    options: SubscribeOptions = {}
  ): SubscriptionHandle {
    const subscription = this.nc.subscribe(subject, {
      queue: options.queue,
      callback: (error: NatsError | null, msg: Msg) => {
        if (error) {
          this.logger.debug('Subscription error', { subject, error: error.message });
          this.recordError(error.message, { subject });
          return;
        }
        handler(toInboundMessage(msg));
      },
    });

    return {
      subject,
      queue: options.queue,
      unsubscribe: () => subscription.unsubscribe(),
    };
  }

  async request(subject: string, data: Uint8Array, timeoutMs: number): Promise<InboundMessage> {
    try {
      const msg = await this.nc.request(subject, data, { timeout: timeoutMs });
      return toInboundMessage(msg);
    } catch (error) {
      throw toRequestError(error, { subject, timeout: timeoutMs });
    }
  }

  /**
   * Keep the first error the server reported outside a request
   */
  recordError(message: string, details?: Record<string, unknown>): void {
    if (!this.lastError) {
      this.lastError = ConnectionError.server(message, details);
    }
  }

  getLastError(): ConnectionError | undefined {
    return this.lastError;
  }

  /**
   * Round trip to the server
   *
   * @throws {PublishError} When the flush itself fails
   * @throws {ConnectionError} When the server refused an earlier operation
   */
  async flush(): Promise<void> {
    try {
      await this.nc.flush();
    } catch (error) {
      throw PublishError.flushFailed(errorMessage(error));
    }
    // status events read off the socket with the PONG are delivered first
    await setImmediate();
    if (this.lastError) {
      throw this.lastError;
    }
  }

  async close(): Promise<void> {
    if (this.nc.isClosed()) return;
    await this.nc.close();
  }
}
