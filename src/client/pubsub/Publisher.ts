import { type Logger, SilentLogger } from '../../core/types/Logger';
import type { MessagingConnection } from '../../core/types/Messaging';
import { encodePayload } from '../../core/message/codec';

/**
 * Publisher configuration
 */
export interface PublisherConfig {
  connection: MessagingConnection;
  logger?: Logger;
}

/**
 * Publisher sends one message and waits until the server has it
 *
 * @example
 * ```typescript
 * const publisher = new Publisher({ connection });
 * await publisher.publish('greetings', 'hello');
 * ```
 */
export class Publisher {
  private connection: MessagingConnection;
  private logger: Logger;

  constructor(config: PublisherConfig) {
    this.connection = config.connection;
    this.logger = config.logger || new SilentLogger();
  }

  /**
   * Publish `payload` on `subject`, then flush
   *
   * @throws {PublishError} When the flush fails
   */
  async publish(subject: string, payload: string): Promise<void> {
    this.connection.publish(subject, encodePayload(payload));
    await this.connection.flush();
    this.logger.debug('Published message', { subject, bytes: Buffer.byteLength(payload) });
  }
}
