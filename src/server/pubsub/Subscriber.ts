import { type Logger, SilentLogger } from '../../core/types/Logger';
import type {
  InboundMessage,
  MessagingConnection,
  SubscriptionHandle,
} from '../../core/types/Messaging';
import { formatReceived } from '../../core/message';

/**
 * Subscriber configuration
 */
export interface SubscriberConfig {
  connection: MessagingConnection;
  logger?: Logger;
}

/**
 * Subscriber prints every message arriving on a subject
 *
 * Messages are numbered from 1 in arrival order. Wildcard subjects are
 * reported with the concrete subject each message was published on.
 *
 * @example
 * ```typescript
 * const subscriber = new Subscriber({ connection, logger: new ConsoleLogger() });
 * await subscriber.start('orders.>');
 * // [#1] Received on [orders.created]: '{"id":1}'
 * ```
 */
export class Subscriber {
  private connection: MessagingConnection;
  private logger: Logger;
  private subscription?: SubscriptionHandle;
  private received = 0;

  constructor(config: SubscriberConfig) {
    this.connection = config.connection;
    this.logger = config.logger || new SilentLogger();
  }

  /**
   * Subscribe and confirm the server registered the interest
   *
   * @throws {PublishError} When the flush after subscribing fails
   */
  async start(subject: string): Promise<void> {
    this.subscription = this.connection.subscribe(subject, (message) => this.handle(message));
    await this.connection.flush();
    this.logger.info(`Listening on [${subject}]`);
  }

  private handle(message: InboundMessage): void {
    this.received++;
    this.logger.info(formatReceived(this.received, message));
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
