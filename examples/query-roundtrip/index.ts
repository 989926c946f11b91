/**
 * Query Roundtrip Example
 *
 * Wires a broker, a query handler and a search adapter in one process:
 * 1. Two users submit queries on the `user_query` topic
 * 2. The query handler answers each on `query_response`
 * 3. The search adapter serves a direct function call
 *
 * The search adapter runs over a canned client, so nothing leaves the process.
 */

import {
  MessageBroker,
  QueryHandler,
  Topic,
  MessageKind,
  createSearchAdapter,
  type Message,
  type SearchClient,
} from '../../packages/hub-core/src/index.js';

// ============================================================================
// Canned Search Client
// ============================================================================

const cannedSearch: SearchClient = {
  async search(query) {
    return {
      results: [
        {
          title: 'TypeScript Handbook',
          url: 'https://www.typescriptlang.org/docs/handbook/intro.html',
          snippet: `Reference material matching "${query}", covering everyday types and narrowing.`,
        },
        {
          title: 'Node.js Event Loop',
          url: 'https://nodejs.org/en/learn/asynchronous-work/event-loop-timers-and-nexttick',
          snippet: 'How timers, I/O callbacks and microtasks are scheduled.',
        },
      ],
    };
  },
};

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  console.log('═══════════════════════════════════════════════════════════════');
  console.log('  Agent Hub - Query Roundtrip Example');
  console.log('═══════════════════════════════════════════════════════════════\n');

  const broker = new MessageBroker();
  const handler = new QueryHandler(broker, { latencyMs: 200 });
  handler.start();

  // Monitor responses as they are published
  broker.subscribe(Topic.QUERY_RESPONSE, (message: Message) => {
    const { user_id, status, response } = message.payload;
    console.log(`   📨 [${String(status)}] for ${String(user_id)}`);
    console.log(`      ${String(response).split('\n')[0]}\n`);
  });

  const queries = [
    { query_id: 'q-1', user_id: 'alice', text_content: "what's the weather like?" },
    { query_id: 'q-2', user_id: 'bob', text_content: 'tell me a joke' },
  ];

  const responses = Promise.all(
    queries.map((query) =>
      broker.next(Topic.QUERY_RESPONSE, {
        filter: (message) => message.payload.query_id === query.query_id,
        timeoutMs: 5000,
      })
    )
  );

  for (const query of queries) {
    console.log(`📝 ${query.user_id} asks: "${query.text_content}"`);
    broker.publish(Topic.USER_QUERY, MessageKind.USER_QUERY, query);
  }
  console.log(`   In flight: ${handler.inFlightCount}\n`);

  await responses;

  // Direct function call on an adapter
  const search = createSearchAdapter(cannedSearch);
  const result = await search.handle({
    functionName: 'search_web',
    parameters: { query: 'typescript narrowing', max_results: 1 },
    routing: { senderId: 'example' },
  });

  console.log('🔍 search_web:');
  console.log(result.content.type === 'text' ? result.content.text : `Error: ${result.content.detail}`);

  await handler.stop();

  console.log('\n📊 Statistics:');
  console.log(`   Query handler: ${JSON.stringify(handler.getStats())}`);
  console.log(`   Broker: ${JSON.stringify(broker.getStats())}`);

  broker.shutdown();
}

main().catch(console.error);
