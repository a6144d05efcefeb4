import { type Logger, SilentLogger } from '../../core/types/Logger';
import type {
  InboundMessage,
  MessagingConnection,
  SubscriptionHandle,
} from '../../core/types/Messaging';
import { encodePayload, formatReceived } from '../../core/message';
import { DEFAULTS } from '../../core/constants';

/**
 * Responder configuration
 */
export interface ResponderConfig {
  connection: MessagingConnection;
  /** Fixed payload sent back to every request */
  response: string;
  queue?: string;
  logger?: Logger;
}

/**
 * Responder answers requests on a subject as a member of a queue group
 *
 * Running several responders with the same queue group spreads requests
 * across them; each request reaches exactly one member.
 *
 * @example
 * ```typescript
 * const responder = new Responder({ connection, response: 'pong' });
 * await responder.start('ping');
 * ```
 */
export class Responder {
  private connection: MessagingConnection;
  private logger: Logger;
  private response: Uint8Array;
  private queue: string;
  private subscription?: SubscriptionHandle;
  private received = 0;

  constructor(config: ResponderConfig) {
    this.connection = config.connection;
    this.logger = config.logger || new SilentLogger();
    this.response = encodePayload(config.response);
    this.queue = config.queue ?? DEFAULTS.QUEUE_GROUP;
  }

  /**
   * Join the queue group on `subject` and start answering
   *
   * @throws {PublishError} When the flush after subscribing fails
   */
  async start(subject: string): Promise<void> {
    this.subscription = this.connection.subscribe(subject, (message) => this.handle(message), {
      queue: this.queue,
    });
    await this.connection.flush();
    this.logger.info(`Listening on [${subject} ${this.queue}]`);
  }

  private handle(message: InboundMessage): void {
    this.received++;
    this.logger.info(formatReceived(this.received, message));
    if (!message.respond(this.response)) {
      this.logger.debug('Message has no reply subject', { subject: message.subject });
    }
  }

  getQueue(): string {
    return this.queue;
  }

  getReceivedCount(): number {
    return this.received;
  }

  isRunning(): boolean {
    return this.subscription !== undefined;
  }

  stop(): void {
    this.subscription?.unsubscribe();
    this.subscription = undefined;
  }
}
