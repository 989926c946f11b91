/**
 * Message Types
 *
 * The envelope every broker delivery carries, the topic and kind
 * constants producers and consumers agree on, and the payload schemas of
 * the two query topics.
 */

import { z } from 'zod';

/**
 * Broker topics
 */
export const Topic = {
  USER_QUERY: 'user_query',
  QUERY_RESPONSE: 'query_response',
  SYSTEM_STATUS: 'system_status',
  AGENT_STATUS: 'agent_status',
  HEARTBEAT: 'heartbeat',
} as const;

export type KnownTopic = (typeof Topic)[keyof typeof Topic];

/**
 * Topics are usually one of {@link Topic}, but the broker accepts any name
 */
export type TopicName = KnownTopic | (string & {});

/**
 * Discriminator for payload shape within a topic
 */
export const MessageKind = {
  USER_QUERY: 'user_query',
  QUERY_RESPONSE: 'query_response',
  ERROR: 'error',
  SYSTEM_STATUS: 'system_status',
  AGENT_STATUS: 'agent_status',
  HEARTBEAT: 'heartbeat',
} as const;

export type MessageKindName = (typeof MessageKind)[keyof typeof MessageKind] | (string & {});

export type MessagePayload = Record<string, unknown>;

/**
 * Immutable envelope delivered to subscribers
 */
export interface Message<P extends MessagePayload = MessagePayload> {
  readonly id: string;
  readonly topic: TopicName;
  readonly kind: MessageKindName;
  readonly payload: Readonly<P>;
  readonly timestamp: number;
}

// ============================================================================
// Payload schemas
// ============================================================================

export const UserQueryPayloadSchema = z.object({
  query_id: z.string(),
  user_id: z.string(),
  text_content: z.string(),
});

export type UserQueryPayload = z.infer<typeof UserQueryPayloadSchema>;

export const QueryStatus = {
  COMPLETED: 'completed',
  ERROR: 'error',
} as const;

export const QueryResponsePayloadSchema = z.object({
  query_id: z.string(),
  user_id: z.string(),
  response: z.string(),
  status: z.enum([QueryStatus.COMPLETED, QueryStatus.ERROR]),
  timestamp: z.number(),
  processing_agent: z.string(),
});

export type QueryResponsePayload = z.infer<typeof QueryResponsePayloadSchema>;

/**
 * Recursively freeze plain objects and arrays in place
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }
  const isPlain = Array.isArray(value) || Object.getPrototypeOf(value) === Object.prototype;
  if (!isPlain) {
    return value;
  }
  Object.freeze(value);
  for (const nested of Object.values(value)) {
    deepFreeze(nested);
  }
  return value;
}
