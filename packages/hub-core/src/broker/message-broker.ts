/**
 * Message Broker
 *
 * Topic-based pub/sub between the hub's components. Delivery is
 * synchronous and fire-and-forget: the broker never awaits a subscriber,
 * and a subscriber that throws or rejects is logged and skipped without
 * affecting the publisher or the other subscribers.
 */

import { EventEmitter } from 'events';
import { v4 as uuid } from 'uuid';
import { createLogger, toError, type Logger } from '../logging/logger.js';
import {
  Topic,
  deepFreeze,
  type Message,
  type MessageKindName,
  type MessagePayload,
  type TopicName,
} from '../messages/types.js';

/**
 * Subscriber callback. A returned promise is not awaited.
 */
export type Subscriber = (message: Message) => void | Promise<void>;

export interface BrokerOptions {
  logger?: Logger;
  maxListeners?: number;
}

export interface BrokerStats {
  published: number;
  delivered: number;
  failed: number;
  topics: number;
  subscribers: number;
}

export interface BrokerHealth {
  healthy: boolean;
  stats: BrokerStats;
  timestamp: number;
}

export interface NextMessageOptions {
  filter?: (message: Message) => boolean;
  timeoutMs?: number;
}

export class BrokerTimeoutError extends Error {
  constructor(
    public readonly topic: string,
    public readonly timeoutMs: number
  ) {
    super(`No message on topic "${topic}" within ${timeoutMs}ms`);
    this.name = 'BrokerTimeoutError';
  }
}

const HEALTH_CHECK_TOPIC = '__health_check__';

/**
 * Copy a payload for publishing. A payload that cannot be structured-cloned
 * (it holds a function or class instance) gets a shallow copy instead, and
 * only its top level is frozen so the publisher's nested objects stay untouched.
 */
function freezePayload(payload: MessagePayload): MessagePayload {
  let copy: MessagePayload;
  try {
    copy = structuredClone(payload);
  } catch {
    return Object.freeze({ ...payload });
  }
  return deepFreeze(copy);
}

export class MessageBroker {
  private emitter: EventEmitter;
  private subscriptions: Map<string, Map<Subscriber, (message: Message) => void>>;
  private knownTopics: Set<string>;
  private counters = { published: 0, delivered: 0, failed: 0 };
  private logger: Logger;

  constructor(options: BrokerOptions = {}) {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(options.maxListeners ?? 100);
    this.subscriptions = new Map();
    this.knownTopics = new Set<string>(Object.values(Topic));
    this.logger = options.logger ?? createLogger('broker');
  }

  /**
   * Register a callback for every later publish on `topic`.
   * Returns false when the callback is already subscribed.
   */
  subscribe(topic: TopicName, callback: Subscriber): boolean {
    let topicSubscribers = this.subscriptions.get(topic);
    if (!topicSubscribers) {
      topicSubscribers = new Map();
      this.subscriptions.set(topic, topicSubscribers);
    }

    if (topicSubscribers.has(callback)) {
      this.logger.warn({ topic }, 'Callback already subscribed');
      return false;
    }

    const deliver = (message: Message) => this.deliver(topic, callback, message);
    topicSubscribers.set(callback, deliver);
    this.knownTopics.add(topic);
    this.emitter.on(`topic:${topic}`, deliver);

    this.logger.debug({ topic, subscribers: topicSubscribers.size }, 'Subscribed');
    return true;
  }

  /**
   * Remove a callback. Unknown callbacks are ignored.
   */
  unsubscribe(topic: TopicName, callback: Subscriber): boolean {
    const topicSubscribers = this.subscriptions.get(topic);
    const deliver = topicSubscribers?.get(callback);
    if (!topicSubscribers || !deliver) {
      return false;
    }

    this.emitter.off(`topic:${topic}`, deliver);
    topicSubscribers.delete(callback);
    if (topicSubscribers.size === 0) {
      this.subscriptions.delete(topic);
    }

    this.logger.debug({ topic, subscribers: topicSubscribers.size }, 'Unsubscribed');
    return true;
  }

  /**
   * Deliver a new message to the current subscribers of `topic`
   */
  publish(topic: TopicName, kind: MessageKindName, payload: MessagePayload): Message {
    const message: Message = Object.freeze({
      id: uuid(),
      topic,
      kind,
      payload: freezePayload(payload),
      timestamp: Date.now(),
    });

    this.counters.published++;
    this.knownTopics.add(topic);

    // emit() iterates over a copy of the listener list, so subscribers
    // added or removed during delivery do not disturb this publish
    const delivered = this.emitter.emit(`topic:${topic}`, message);
    if (!delivered) {
      this.logger.debug({ topic, messageId: message.id }, 'No subscribers for topic');
    }

    return message;
  }

  /**
   * Wait for the next message on `topic` that passes `filter`
   */
  next(topic: TopicName, options: NextMessageOptions = {}): Promise<Message> {
    const timeoutMs = options.timeoutMs ?? 30000;

    return new Promise((resolve, reject) => {
      const waiter: Subscriber = (message) => {
        if (options.filter && !options.filter(message)) {
          return;
        }
        clearTimeout(timer);
        this.unsubscribe(topic, waiter);
        resolve(message);
      };

      const timer = setTimeout(() => {
        this.unsubscribe(topic, waiter);
        reject(new BrokerTimeoutError(topic, timeoutMs));
      }, timeoutMs);

      this.subscribe(topic, waiter);
    });
  }

  /**
   * Topics that have been declared, subscribed to, or published to
   */
  listTopics(): string[] {
    return Array.from(this.knownTopics).filter((topic) => topic !== HEALTH_CHECK_TOPIC);
  }

  subscriberCount(topic: TopicName): number {
    return this.subscriptions.get(topic)?.size ?? 0;
  }

  getStats(): BrokerStats {
    let subscribers = 0;
    for (const topicSubscribers of this.subscriptions.values()) {
      subscribers += topicSubscribers.size;
    }

    return {
      ...this.counters,
      topics: this.listTopics().length,
      subscribers,
    };
  }

  /**
   * Round-trip a probe message through a private topic
   */
  healthCheck(): BrokerHealth {
    let received = false;
    const probe: Subscriber = () => {
      received = true;
    };

    this.subscribe(HEALTH_CHECK_TOPIC, probe);
    try {
      this.publish(HEALTH_CHECK_TOPIC, 'health_check', { probe: true });
    } finally {
      this.unsubscribe(HEALTH_CHECK_TOPIC, probe);
    }

    return {
      healthy: received,
      stats: this.getStats(),
      timestamp: Date.now(),
    };
  }

  /**
   * Drop every subscription and reset statistics
   */
  shutdown(): void {
    this.emitter.removeAllListeners();
    this.subscriptions.clear();
    this.knownTopics = new Set<string>(Object.values(Topic));
    this.counters = { published: 0, delivered: 0, failed: 0 };
    this.logger.info('Message broker shut down');
  }

  private deliver(topic: string, callback: Subscriber, message: Message): void {
    try {
      const result = callback(message);
      this.counters.delivered++;
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.recordFailure(topic, message, error));
      }
    } catch (error) {
      this.recordFailure(topic, message, error);
    }
  }

  private recordFailure(topic: string, message: Message, error: unknown): void {
    this.counters.failed++;
    this.logger.error(
      { topic, messageId: message.id, kind: message.kind, err: toError(error) },
      'Subscriber failed'
    );
  }
}

let globalBroker: MessageBroker | undefined;

/**
 * Convenience default instance, created on first use so it picks up the
 * configured logger. Components take a broker explicitly.
 */
export function getGlobalBroker(): MessageBroker {
  if (!globalBroker) {
    globalBroker = new MessageBroker();
  }
  return globalBroker;
}
