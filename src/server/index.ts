export { Subscriber } from './pubsub/Subscriber';
export type { SubscriberConfig } from './pubsub/Subscriber';
export { Responder } from './rpc/Responder';
export type { ResponderConfig } from './rpc/Responder';
