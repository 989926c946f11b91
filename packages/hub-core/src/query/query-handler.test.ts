import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MessageBroker } from '../broker/message-broker.js';
import { MessageKind, Topic, type Message } from '../messages/types.js';
import { QueryHandler, SHUTDOWN_CANCEL_REASON } from './query-handler.js';
import { CATEGORY_RESPONSES, generalResponse, type Responder } from './responder.js';

function publishQuery(broker: MessageBroker, payload: Record<string, unknown>): Message {
  return broker.publish(Topic.USER_QUERY, MessageKind.USER_QUERY, payload);
}

/**
 * Responder that resolves only when released, or rejects when aborted
 */
function gatedResponder(): { responder: Responder; release: (text: string) => void } {
  const waiting: Array<(text: string) => void> = [];
  const responder: Responder = (_text, { signal }) =>
    new Promise<string>((resolve, reject) => {
      waiting.push(resolve);
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
  return {
    responder,
    release: (text) => {
      for (const resolve of waiting.splice(0)) resolve(text);
    },
  };
}

describe('QueryHandler', () => {
  let broker: MessageBroker;
  let responses: Message[];

  beforeEach(() => {
    broker = new MessageBroker();
    responses = [];
    broker.subscribe(Topic.QUERY_RESPONSE, (message) => {
      responses.push(message);
    });
  });

  afterEach(() => {
    broker.shutdown();
  });

  describe('lifecycle', () => {
    it('subscribes on start and unsubscribes on stop', async () => {
      const handler = new QueryHandler(broker, { latencyMs: 0 });

      handler.start();
      expect(handler.isRunning).toBe(true);
      expect(broker.subscriberCount(Topic.USER_QUERY)).toBe(1);

      handler.start();
      expect(broker.subscriberCount(Topic.USER_QUERY)).toBe(1);

      await handler.stop();
      expect(handler.isRunning).toBe(false);
      expect(broker.subscriberCount(Topic.USER_QUERY)).toBe(0);
    });

    it('resolves stop() immediately when never started', async () => {
      const handler = new QueryHandler(broker);
      await expect(handler.stop()).resolves.toBeUndefined();
    });

    it('ignores queries before start and after stop', async () => {
      const handler = new QueryHandler(broker, { latencyMs: 0 });
      publishQuery(broker, { query_id: 'q-0', user_id: 'u-1', text_content: 'hello' });

      handler.start();
      await handler.stop();
      publishQuery(broker, { query_id: 'q-1', user_id: 'u-1', text_content: 'hello' });

      expect(handler.inFlightCount).toBe(0);
      expect(handler.getStats().accepted).toBe(0);
    });
  });

  describe('processing', () => {
    it('answers a weather query with a completed response', async () => {
      const handler = new QueryHandler(broker, { latencyMs: 0 });
      handler.start();

      const reply = broker.next(Topic.QUERY_RESPONSE);
      publishQuery(broker, { query_id: 'q-1', user_id: 'u-1', text_content: "What's the weather like?" });
      const message = await reply;

      expect(message.kind).toBe(MessageKind.QUERY_RESPONSE);
      expect(message.payload).toMatchObject({
        query_id: 'q-1',
        user_id: 'u-1',
        status: 'completed',
        processing_agent: 'query_handler',
        response: CATEGORY_RESPONSES.weather,
      });
      expect(typeof message.payload.timestamp).toBe('number');

      await handler.stop();
    });

    it('answers empty text with the general fallback', async () => {
      const handler = new QueryHandler(broker, { latencyMs: 0 });
      handler.start();

      publishQuery(broker, { query_id: 'q-empty', user_id: 'u-1', text_content: '' });
      await handler.stop();

      expect(responses).toHaveLength(1);
      expect(responses[0].payload).toMatchObject({
        query_id: 'q-empty',
        status: 'completed',
        response: generalResponse(''),
      });
    });

    it('registers the unit of work before publish returns', async () => {
      const { responder, release } = gatedResponder();
      const handler = new QueryHandler(broker, { latencyMs: 0, responder });
      handler.start();

      publishQuery(broker, { query_id: 'q-7', user_id: 'u-2', text_content: 'slow one' });

      const [inFlight] = handler.getInFlight();
      expect(handler.inFlightCount).toBe(1);
      expect(inFlight).toMatchObject({ queryId: 'q-7', userId: 'u-2', textContent: 'slow one' });
      expect(Object.isFrozen(inFlight)).toBe(true);

      await vi.waitFor(() => {
        release('done');
        expect(handler.inFlightCount).toBe(0);
      });
      expect(responses).toHaveLength(1);
      await handler.stop();
    });

    it('keeps queries with the same id independent', async () => {
      const handler = new QueryHandler(broker, { latencyMs: 0, responder: (text) => `echo ${text}` });
      handler.start();

      publishQuery(broker, { query_id: 'dup', user_id: 'u-1', text_content: 'one' });
      publishQuery(broker, { query_id: 'dup', user_id: 'u-1', text_content: 'two' });
      expect(handler.inFlightCount).toBe(2);

      await handler.stop();

      expect(responses.map((message) => message.payload.response).sort()).toEqual(['echo one', 'echo two']);
      expect(handler.getStats()).toEqual({ accepted: 2, completed: 2, failed: 0, inFlight: 0 });
    });

    it('passes query and user ids to the responder', async () => {
      const responder = vi.fn<Responder>(() => 'ok');
      const handler = new QueryHandler(broker, { latencyMs: 0, responder, agentName: 'custom_agent' });
      handler.start();

      publishQuery(broker, { query_id: 'q-3', user_id: 'u-3', text_content: 'hi' });
      await handler.stop();

      expect(responder).toHaveBeenCalledWith(
        'hi',
        expect.objectContaining({ queryId: 'q-3', userId: 'u-3' })
      );
      expect(responses[0].payload.processing_agent).toBe('custom_agent');
    });
  });

  describe('errors', () => {
    it('publishes an error response when the responder throws', async () => {
      const handler = new QueryHandler(broker, {
        latencyMs: 0,
        responder: () => {
          throw new Error('model offline');
        },
      });
      handler.start();

      publishQuery(broker, { query_id: 'q-2', user_id: 'u-1', text_content: 'hello' });
      await handler.stop();

      expect(responses).toHaveLength(1);
      expect(responses[0].kind).toBe(MessageKind.ERROR);
      expect(responses[0].payload).toMatchObject({
        query_id: 'q-2',
        user_id: 'u-1',
        status: 'error',
        response: 'Error processing query: model offline',
      });
      expect(handler.getStats().failed).toBe(1);
    });

    it('reports a payload missing its text as an error response', async () => {
      const handler = new QueryHandler(broker, { latencyMs: 0 });
      handler.start();

      publishQuery(broker, { query_id: 'q-4', user_id: 'u-1' });
      await handler.stop();

      expect(responses[0].payload).toMatchObject({
        query_id: 'q-4',
        status: 'error',
        response: 'Error processing query: Invalid user query payload (text_content: Required)',
      });
    });

    it('keeps running after one query fails', async () => {
      const responder = vi.fn<Responder>().mockRejectedValueOnce(new Error('first fails')).mockResolvedValue('fine');
      const handler = new QueryHandler(broker, { latencyMs: 0, responder });
      handler.start();

      publishQuery(broker, { query_id: 'a', user_id: 'u-1', text_content: 'x' });
      publishQuery(broker, { query_id: 'b', user_id: 'u-1', text_content: 'y' });
      await handler.stop();

      const byId = new Map(responses.map((message) => [message.payload.query_id, message.payload.status]));
      expect(byId.get('a')).toBe('error');
      expect(byId.get('b')).toBe('completed');
    });
  });

  describe('stop', () => {
    it('waits for in-flight queries to publish before resolving', async () => {
      const { responder, release } = gatedResponder();
      const handler = new QueryHandler(broker, { latencyMs: 0, responder });
      handler.start();

      publishQuery(broker, { query_id: 'q-5', user_id: 'u-1', text_content: 'wait for me' });

      let stopped = false;
      const stopping = handler.stop().then(() => {
        stopped = true;
      });
      await new Promise((resolve) => setTimeout(resolve, 10));
      expect(stopped).toBe(false);

      release('finished');
      await stopping;

      expect(responses).toHaveLength(1);
      expect(responses[0].payload.response).toBe('finished');
      expect(handler.inFlightCount).toBe(0);
    });

    it('cancels outstanding work after the drain timeout', async () => {
      const { responder } = gatedResponder();
      const handler = new QueryHandler(broker, { latencyMs: 0, responder, drainTimeoutMs: 20 });
      handler.start();

      publishQuery(broker, { query_id: 'q-6', user_id: 'u-1', text_content: 'never answered' });
      await handler.stop();

      expect(handler.inFlightCount).toBe(0);
      expect(responses).toHaveLength(1);
      expect(responses[0].payload).toMatchObject({
        query_id: 'q-6',
        status: 'error',
        response: `Error processing query: ${SHUTDOWN_CANCEL_REASON}`,
      });
    });

    it('shares one drain between concurrent stop() calls', async () => {
      const handler = new QueryHandler(broker, { latencyMs: 50 });
      handler.start();

      publishQuery(broker, { query_id: 'q-9', user_id: 'u-1', text_content: 'hello' });
      const first = handler.stop();
      await handler.stop();

      expect(handler.inFlightCount).toBe(0);
      expect(responses).toHaveLength(1);
      await first;
    });

    it('cancels a responder that ignores its abort signal', async () => {
      const handler = new QueryHandler(broker, {
        latencyMs: 0,
        drainTimeoutMs: 20,
        responder: () => new Promise<string>(() => {}),
      });
      handler.start();

      publishQuery(broker, { query_id: 'q-10', user_id: 'u-1', text_content: 'stuck' });
      await handler.stop();

      expect(handler.inFlightCount).toBe(0);
      expect(responses[0].payload).toMatchObject({
        query_id: 'q-10',
        status: 'error',
        response: `Error processing query: ${SHUTDOWN_CANCEL_REASON}`,
      });
    });

    it('cancels work that is still in its latency delay', async () => {
      const handler = new QueryHandler(broker, { latencyMs: 60_000, drainTimeoutMs: 10 });
      handler.start();

      publishQuery(broker, { query_id: 'q-8', user_id: 'u-1', text_content: 'hello' });
      await handler.stop();

      expect(responses[0].payload.response).toBe(`Error processing query: ${SHUTDOWN_CANCEL_REASON}`);
    });
  });
});
