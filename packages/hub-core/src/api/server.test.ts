import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createServer, type FastifyInstance } from './server.js';
import { MessageBroker } from '../broker/message-broker.js';
import { QueryHandler } from '../query/query-handler.js';
import { CATEGORY_RESPONSES } from '../query/responder.js';
import { createSearchAdapter } from '../adapters/search/search-adapter.js';
import type { SearchClient } from '../adapters/search/search-client.js';
import { Topic } from '../messages/types.js';

const searchClient: SearchClient = {
  search: async () => ({
    results: [{ title: 'Fastify', url: 'https://fastify.dev', snippet: 'Fast and low overhead web framework.' }],
  }),
};

describe('API server', () => {
  let broker: MessageBroker;
  let queryHandler: QueryHandler;
  let app: FastifyInstance;

  beforeEach(async () => {
    broker = new MessageBroker();
    queryHandler = new QueryHandler(broker, { latencyMs: 0 });
    queryHandler.start();
    app = await createServer({ broker, queryHandler, adapters: [createSearchAdapter(searchClient)] });
  });

  afterEach(async () => {
    await queryHandler.stop();
    await app.close();
    broker.shutdown();
  });

  describe('GET /health', () => {
    it('reports broker and query handler state', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        status: 'healthy',
        queryHandler: { running: true, inFlight: 0 },
        adapters: 1,
      });
    });
  });

  describe('POST /queries', () => {
    it('publishes the query and accepts it', async () => {
      const reply = broker.next(Topic.QUERY_RESPONSE);

      const response = await app.inject({
        method: 'POST',
        url: '/queries',
        payload: { user_id: 'u-1', text_content: 'system status?', query_id: 'q-1' },
      });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toEqual({ query_id: 'q-1' });

      const message = await reply;
      expect(message.payload).toMatchObject({
        query_id: 'q-1',
        user_id: 'u-1',
        status: 'completed',
        response: CATEGORY_RESPONSES.system_status,
      });
    });

    it('generates a query id when none is given', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/queries',
        payload: { user_id: 'u-1', text_content: 'hello' },
      });

      expect(response.statusCode).toBe(202);
      expect(response.json<{ query_id: string }>().query_id).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
      );
    });

    it('rejects a malformed body with the validation issues', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/queries',
        payload: { text_content: 42 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'Invalid request body',
        issues: ['user_id: Required', 'text_content: Expected string, received number'],
      });
    });
  });

  describe('agents', () => {
    it('lists adapter cards', async () => {
      const response = await app.inject({ method: 'GET', url: '/agents' });

      const body = response.json<{ agents: Array<{ id: string; functions: Array<{ name: string }> }> }>();
      expect(body.agents.map((agent) => agent.id)).toEqual(['web_search_agent']);
      expect(body.agents[0].functions.map((fn) => fn.name)).toEqual(['search_web', 'search_news']);
    });

    it('invokes a function and echoes the routing fields', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/agents/web_search_agent/invoke',
        payload: {
          function_name: 'search_web',
          parameters: { query: 'fastify', max_results: 1 },
          sender_id: 'client-9',
          conversation_id: 'conv-1',
        },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        role: 'agent',
        content: {
          type: 'text',
          text: [
            '🔍 Top 1 search results for **fastify**:',
            '',
            '🔸 **Fastify**',
            '   📝 Fast and low overhead web framework.',
            '   🔗 https://fastify.dev',
          ].join('\n'),
        },
        routing: { senderId: 'client-9', conversationId: 'conv-1' },
      });
    });

    it('returns a structured error for an unknown function', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/agents/web_search_agent/invoke',
        payload: { function_name: 'translate' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        role: 'agent',
        content: { type: 'error', detail: 'Unknown function: translate' },
        routing: { senderId: 'api-caller' },
      });
    });

    it('returns 404 for an unknown adapter', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/agents/nobody/invoke',
        payload: { function_name: 'search_web' },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: 'Agent not found' });
    });

    it('returns 400 when function_name is missing', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/agents/web_search_agent/invoke',
        payload: { parameters: {} },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: 'Invalid request body', issues: ['function_name: Required'] });
    });
  });

  describe('WS /ws/queries', () => {
    it('answers ping and pushes responses for the querying user', async () => {
      await app.ready();
      const socket = await app.injectWS('/ws/queries');
      const received: unknown[] = [];
      socket.on('message', (data) => {
        received.push(JSON.parse(data.toString()));
      });

      socket.send(JSON.stringify({ type: 'ping' }));
      socket.send(JSON.stringify({ type: 'query', user_id: 'ws-user', text_content: 'tell me a joke', query_id: 'q-ws' }));

      // another user's response is not forwarded to this socket
      broker.publish(Topic.QUERY_RESPONSE, 'query_response', {
        query_id: 'other',
        user_id: 'someone-else',
        response: 'not for you',
        status: 'completed',
        timestamp: 0,
        processing_agent: 'query_handler',
      });

      await vi.waitFor(() => {
        expect(received).toHaveLength(3);
      });

      expect(received[0]).toEqual({ type: 'pong' });
      expect(received[1]).toEqual({ type: 'accepted', query_id: 'q-ws' });
      expect(received[2]).toMatchObject({
        type: 'response',
        payload: { query_id: 'q-ws', user_id: 'ws-user', status: 'completed' },
      });

      socket.terminate();
    });

    it('reports malformed socket messages', async () => {
      await app.ready();
      const socket = await app.injectWS('/ws/queries');
      const received: unknown[] = [];
      socket.on('message', (data) => {
        received.push(JSON.parse(data.toString()));
      });

      socket.send('not json');

      await vi.waitFor(() => {
        expect(received).toHaveLength(1);
      });
      expect(received[0]).toMatchObject({ type: 'error' });

      socket.terminate();
    });
  });
});
