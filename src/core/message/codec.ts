import { StringCodec } from 'nats';

const codec = StringCodec();

export function encodePayload(text: string): Uint8Array {
  return codec.encode(text);
}

export function decodePayload(data: Uint8Array): string {
  return codec.decode(data);
}
