/**
 * API Server
 *
 * Fastify-based REST + WebSocket transport for the hub. Queries enter the
 * broker through `POST /queries` or the query socket; adapter functions are
 * invoked directly over `POST /agents/:id/invoke`.
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import fastifyWebsocket from '@fastify/websocket';
import fastifyCors from '@fastify/cors';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { MessageBroker, Subscriber } from '../broker/message-broker.js';
import type { QueryHandler } from '../query/query-handler.js';
import type { AgentAdapter } from '../adapters/agent-adapter.js';
import { MessageKind, QueryResponsePayloadSchema, Topic } from '../messages/types.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { errorMessage } from '../utils/async.js';

export const VERSION = '0.1.0';

// ============================================================================
// Server Configuration
// ============================================================================

export interface ServerConfig {
  host: string;
  port: number;
  cors: {
    origin: string | string[] | boolean;
    credentials?: boolean;
  };
}

export const defaultServerConfig: ServerConfig = {
  host: '0.0.0.0',
  port: 3000,
  cors: {
    origin: true,
    credentials: true,
  },
};

// ============================================================================
// Server Context
// ============================================================================

export interface ServerContext {
  broker: MessageBroker;
  queryHandler: QueryHandler;
  adapters: AgentAdapter[];
  logger?: Logger;
}

declare module 'fastify' {
  interface FastifyInstance {
    ctx: ServerContext;
  }
}

// ============================================================================
// Request Schemas
// ============================================================================

const QueryBodySchema = z.object({
  user_id: z.string().min(1),
  text_content: z.string(),
  query_id: z.string().min(1).optional(),
});

type QueryBody = z.infer<typeof QueryBodySchema>;

const InvokeBodySchema = z.object({
  function_name: z.string().min(1),
  parameters: z.record(z.unknown()).default({}),
  sender_id: z.string().min(1).default('api-caller'),
  parent_message_id: z.string().optional(),
  conversation_id: z.string().optional(),
});

const SocketMessageSchema = z.discriminatedUnion('type', [
  QueryBodySchema.extend({ type: z.literal('query') }),
  z.object({ type: z.literal('ping') }),
]);

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

function rawToString(raw: Buffer | ArrayBuffer | Buffer[]): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
  if (Buffer.isBuffer(raw)) return raw.toString('utf8');
  return Buffer.from(raw).toString('utf8');
}

// ============================================================================
// Server Factory
// ============================================================================

export async function createServer(
  context: ServerContext,
  config: Partial<ServerConfig> = {}
): Promise<FastifyInstance> {
  const fullConfig = { ...defaultServerConfig, ...config };
  const logger: FastifyBaseLogger = context.logger ?? createLogger('api');

  const fastify = Fastify({ logger });

  fastify.decorate('ctx', context);

  await fastify.register(fastifyCors, {
    origin: fullConfig.cors.origin,
    credentials: fullConfig.cors.credentials,
  });

  await fastify.register(fastifyWebsocket);

  await registerRoutes(fastify);

  return fastify;
}

/**
 * Publish a user query onto the broker, generating its id when absent
 */
function submitQuery(broker: MessageBroker, body: QueryBody): string {
  const queryId = body.query_id ?? uuidv4();
  broker.publish(Topic.USER_QUERY, MessageKind.USER_QUERY, {
    query_id: queryId,
    user_id: body.user_id,
    text_content: body.text_content,
  });
  return queryId;
}

// ============================================================================
// Route Registration
// ============================================================================

async function registerRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/health', async (_request, reply) => {
    const { broker, queryHandler, adapters } = fastify.ctx;
    const health = broker.healthCheck();

    reply.status(health.healthy ? 200 : 503);
    return {
      status: health.healthy ? 'healthy' : 'unhealthy',
      version: VERSION,
      timestamp: new Date().toISOString(),
      broker: health.stats,
      queryHandler: {
        running: queryHandler.isRunning,
        inFlight: queryHandler.inFlightCount,
      },
      adapters: adapters.length,
    };
  });

  // ========================================================================
  // Query Routes
  // ========================================================================

  fastify.post('/queries', async (request, reply) => {
    const parsed = QueryBodySchema.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return { error: 'Invalid request body', issues: formatIssues(parsed.error) };
    }

    const queryId = submitQuery(fastify.ctx.broker, parsed.data);
    reply.status(202);
    return { query_id: queryId };
  });

  // ========================================================================
  // Agent Routes
  // ========================================================================

  fastify.get('/agents', async () => {
    return { agents: fastify.ctx.adapters.map((adapter) => adapter.describe()) };
  });

  fastify.post<{ Params: { id: string } }>('/agents/:id/invoke', async (request, reply) => {
    const adapter = fastify.ctx.adapters.find((candidate) => candidate.id === request.params.id);
    if (!adapter) {
      reply.status(404);
      return { error: 'Agent not found' };
    }

    const parsed = InvokeBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.status(400);
      return { error: 'Invalid request body', issues: formatIssues(parsed.error) };
    }

    const body = parsed.data;
    return adapter.handle({
      functionName: body.function_name,
      parameters: body.parameters,
      routing: {
        senderId: body.sender_id,
        parentMessageId: body.parent_message_id,
        conversationId: body.conversation_id,
      },
    });
  });

  // ========================================================================
  // WebSocket Routes
  // ========================================================================

  // Query submission with responses pushed back for the users this socket asked for
  fastify.get('/ws/queries', { websocket: true }, (socket) => {
    const { broker } = fastify.ctx;
    const users = new Set<string>();

    const send = (data: Record<string, unknown>): void => {
      if (socket.readyState === socket.OPEN) {
        socket.send(JSON.stringify(data));
      }
    };

    const onResponse: Subscriber = (message) => {
      const payload = QueryResponsePayloadSchema.safeParse(message.payload);
      if (payload.success && users.has(payload.data.user_id)) {
        send({ type: 'response', payload: payload.data });
      }
    };
    broker.subscribe(Topic.QUERY_RESPONSE, onResponse);

    socket.on('message', (raw) => {
      let data: unknown;
      try {
        data = JSON.parse(rawToString(raw));
      } catch (error) {
        send({ type: 'error', message: `Invalid JSON: ${errorMessage(error)}` });
        return;
      }

      const parsed = SocketMessageSchema.safeParse(data);
      if (!parsed.success) {
        send({ type: 'error', message: formatIssues(parsed.error).join('; ') });
        return;
      }

      const message = parsed.data;
      switch (message.type) {
        case 'query': {
          users.add(message.user_id);
          const queryId = submitQuery(broker, message);
          send({ type: 'accepted', query_id: queryId });
          break;
        }

        case 'ping':
          send({ type: 'pong' });
          break;
      }
    });

    socket.on('close', () => {
      broker.unsubscribe(Topic.QUERY_RESPONSE, onResponse);
    });
  });
}

// ============================================================================
// Server Runner
// ============================================================================

export async function startServer(
  context: ServerContext,
  config: Partial<ServerConfig> = {}
): Promise<FastifyInstance> {
  const fullConfig = { ...defaultServerConfig, ...config };
  const server = await createServer(context, config);

  try {
    await server.listen({ host: fullConfig.host, port: fullConfig.port });
    return server;
  } catch (error) {
    server.log.error({ err: error }, 'Failed to start server');
    await server.close();
    throw error;
  }
}

export type { FastifyInstance };
