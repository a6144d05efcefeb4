/**
 * Message delivered to a subscription or returned from a request
 */
export interface InboundMessage {
  subject: string;
  data: Uint8Array;
  reply?: string;
  /**
   * Publish `data` to the reply subject. Returns false when the message
   * carried no reply subject.
   */
  respond(data: Uint8Array): boolean;
}

export type MessageHandler = (message: InboundMessage) => void;

export interface SubscribeOptions {
  queue?: string;
}

export interface SubscriptionHandle {
  subject: string;
  queue?: string;
  unsubscribe(): void;
}

/**
 * The slice of a messaging client the tool actually uses
 */
export interface MessagingConnection {
  /** Server the connection is currently attached to */
  readonly server: string;
  publish(subject: string, data: Uint8Array): void;
  subscribe(subject: string, handler: MessageHandler, options?: SubscribeOptions): SubscriptionHandle;
  request(subject: string, data: Uint8Array, timeoutMs: number): Promise<InboundMessage>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Owns a connection from open to close
 */
export interface ConnectionLifecycle {
  connect(): Promise<MessagingConnection>;
  /**
   * Settles once the connection is gone. Resolves with the reason when the
   * close was not requested, or `undefined` after close().
   */
  closed(): Promise<Error | undefined>;
  close(): Promise<void>;
}
