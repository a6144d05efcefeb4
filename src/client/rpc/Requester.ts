import { type Logger, SilentLogger } from '../../core/types/Logger';
import type { MessagingConnection } from '../../core/types/Messaging';
import { encodePayload } from '../../core/message/codec';
import { TIME } from '../../core/constants';

/**
 * Requester configuration
 */
export interface RequesterConfig {
  connection: MessagingConnection;
  timeout?: number;
  logger?: Logger;
}

/**
 * Requester performs a single request/reply round trip
 *
 * @example
 * ```typescript
 * const requester = new Requester({ connection });
 * const answer = decodePayload(await requester.request('time', 'now?'));
 * ```
 */
export class Requester {
  private connection: MessagingConnection;
  private timeout: number;
  private logger: Logger;

  constructor(config: RequesterConfig) {
    this.connection = config.connection;
    this.timeout = config.timeout ?? TIME.REQUEST_TIMEOUT_MS;
    this.logger = config.logger || new SilentLogger();
  }

  /**
   * Send `payload` to `subject` and return the reply payload untouched
   *
   * @throws {RequestError} On timeout, missing responders or client failure
   */
  async request(subject: string, payload: string): Promise<Uint8Array> {
    this.logger.debug('Sending request', { subject, timeout: this.timeout });
    const reply = await this.connection.request(subject, encodePayload(payload), this.timeout);
    return reply.data;
  }
}
