/**
 * Agent Hub
 *
 * Topic broker, query handler and function-calling agent adapters, with a
 * Fastify transport on top.
 *
 * @packageDocumentation
 */

// Messages
export {
  Topic,
  MessageKind,
  QueryStatus,
  UserQueryPayloadSchema,
  QueryResponsePayloadSchema,
  deepFreeze,
} from './messages/types.js';
export type {
  KnownTopic,
  TopicName,
  MessageKindName,
  MessagePayload,
  Message,
  UserQueryPayload,
  QueryResponsePayload,
} from './messages/types.js';

// Broker
export { MessageBroker, BrokerTimeoutError, getGlobalBroker } from './broker/message-broker.js';
export type {
  Subscriber,
  BrokerOptions,
  BrokerStats,
  BrokerHealth,
  NextMessageOptions,
} from './broker/message-broker.js';

// Query handling
export {
  QueryHandler,
  DEFAULT_AGENT_NAME,
  SHUTDOWN_CANCEL_REASON,
} from './query/query-handler.js';
export type {
  QueryHandlerOptions,
  QueryHandlerState,
  QueryHandlerStats,
  InFlightQuery,
} from './query/query-handler.js';
export {
  classifyQuery,
  keywordResponder,
  generalResponse,
  CATEGORY_KEYWORDS,
  CATEGORY_RESPONSES,
} from './query/responder.js';
export type { Responder, ResponderContext, QueryCategory } from './query/responder.js';

// Adapters
export * from './adapters/index.js';

// Config and logging
export { loadConfig, missingApiKeys, defaultConfig, ConfigError } from './config/settings.js';
export type { HubConfig } from './config/settings.js';
export { createLogger, configureLogger, getRootLogger } from './logging/logger.js';
export type { Logger } from './logging/logger.js';

// API Server
export {
  createServer,
  startServer,
  defaultServerConfig,
  VERSION,
  type ServerConfig,
  type ServerContext,
} from './api/index.js';
