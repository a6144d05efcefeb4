import type { InboundMessage } from '../types/Messaging';

export { encodePayload, decodePayload } from './codec';

/**
 * Log line for the n-th message received on a subscription, with the payload
 * bytes copied in as they arrived
 */
export function formatReceived(sequence: number, message: InboundMessage): Buffer {
  return Buffer.concat([
    Buffer.from(`[#${sequence}] Received on [${message.subject}]: '`),
    message.data,
    Buffer.from("'"),
  ]);
}
