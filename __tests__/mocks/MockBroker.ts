import type { InboundMessage, MessageHandler } from '../../src/core/types/Messaging';
import { decodePayload } from '../../src/core/message';

interface Registration {
  id: number;
  subject: string;
  queue?: string;
  handler: MessageHandler;
}

/**
 * Published message entry for tracking
 */
export interface PublishedMessage {
  subject: string;
  payload: string;
  reply?: string;
}

/**
 * Match a subject against a subscription subject with `*` and `>` wildcards
 */
export function subjectMatches(pattern: string, subject: string): boolean {
  const patternTokens = pattern.split('.');
  const subjectTokens = subject.split('.');

  for (let i = 0; i < patternTokens.length; i++) {
    const token = patternTokens[i];
    if (token === '>') {
      return subjectTokens.length > i;
    }
    if (i >= subjectTokens.length) {
      return false;
    }
    if (token !== '*' && token !== subjectTokens[i]) {
      return false;
    }
  }

  return patternTokens.length === subjectTokens.length;
}

/**
 * In-process stand-in for a NATS server
 *
 * Delivers synchronously. Plain subscriptions all receive a message; each
 * queue group on a subscription subject receives it once, round robin.
 */
export class MockBroker {
  private registrations = new Map<number, Registration>();
  private queueCursors = new Map<string, number>();
  private nextId = 1;
  private inboxCount = 0;
  readonly published: PublishedMessage[] = [];

  register(subject: string, handler: MessageHandler, queue?: string): () => void {
    const id = this.nextId++;
    this.registrations.set(id, { id, subject, queue, handler });
    return () => {
      this.registrations.delete(id);
    };
  }

  newInbox(): string {
    this.inboxCount++;
    return `_INBOX.mock.${this.inboxCount}`;
  }

  /**
   * Deliver a message and return how many subscriptions got it
   */
  deliver(subject: string, data: Uint8Array, reply?: string): number {
    this.published.push({ subject, payload: decodePayload(data), reply });

    const matching = [...this.registrations.values()].filter((registration) =>
      subjectMatches(registration.subject, subject)
    );
    const receivers = matching.filter((registration) => !registration.queue);

    const groups = new Map<string, Registration[]>();
    for (const registration of matching) {
      if (!registration.queue) continue;
      const key = `${registration.subject}|${registration.queue}`;
      groups.set(key, [...(groups.get(key) ?? []), registration]);
    }
    for (const [key, members] of groups) {
      const cursor = this.queueCursors.get(key) ?? 0;
      receivers.push(members[cursor % members.length]);
      this.queueCursors.set(key, cursor + 1);
    }

    const message: InboundMessage = {
      subject,
      data,
      reply,
      respond: (response: Uint8Array) => {
        if (!reply) return false;
        this.deliver(reply, response);
        return true;
      },
    };

    for (const receiver of receivers) {
      receiver.handler(message);
    }

    return receivers.length;
  }

  subscriptionCount(): number {
    return this.registrations.size;
  }
}
