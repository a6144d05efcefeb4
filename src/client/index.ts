export { Publisher } from './pubsub/Publisher';
export type { PublisherConfig } from './pubsub/Publisher';
export { Requester } from './rpc/Requester';
export type { RequesterConfig } from './rpc/Requester';
