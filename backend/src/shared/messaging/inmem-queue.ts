/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Default transport until a real email adapter is wired: messages are kept in memory
 *   and logged (without the raw token).
 * - Tests read what a flow enqueued via drain() / drainOfType().
 *
 * RULES:
 * - Services only see the Queue interface.
 * - drain*() is for tests and tooling; production code never calls it.
 * - Holds at most `maxMessages`; the oldest message is dropped first. Nothing drains
 *   the queue outside tests, so the cap bounds what stays in memory.
 */

import type { Queue, QueueMessage, QueueMessageType } from './queue';
import { logger } from '../logger/logger';

export type InMemQueueOptions = {
  maxMessages?: number;
};

const DEFAULT_MAX_MESSAGES = 1000;

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];
  private readonly maxMessages: number;

  constructor(opts: InMemQueueOptions = {}) {
    this.maxMessages = opts.maxMessages ?? DEFAULT_MAX_MESSAGES;
  }

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);

    if (this.messages.length > this.maxMessages) {
      const [dropped] = this.messages.splice(0, this.messages.length - this.maxMessages);
      logger.warn('queue.dropped_oldest', {
        flow: 'messaging.inmem',
        type: dropped?.type,
        maxMessages: this.maxMessages,
      });
    }

    logger.debug('queue.enqueued', {
      flow: 'messaging.inmem',
      type: message.type,
      userId: message.userId,
    });

    return Promise.resolve();
  }

  /** Returns every enqueued message and clears the queue. */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }

  /**
   * Returns (and removes) only the messages of one type.
   * const [msg] = queue.drainOfType('accounts.activation-email');
   */
  drainOfType<K extends QueueMessageType>(type: K): Extract<QueueMessage, { type: K }>[] {
    const matched: Extract<QueueMessage, { type: K }>[] = [];
    const rest: QueueMessage[] = [];

    for (const message of this.messages) {
      if (isOfType(message, type)) matched.push(message);
      else rest.push(message);
    }

    this.messages.splice(0, this.messages.length, ...rest);
    return matched;
  }
}

function isOfType<K extends QueueMessageType>(
  message: QueueMessage,
  type: K,
): message is Extract<QueueMessage, { type: K }> {
  return message.type === type;
}
