/**
 * Query Responders
 *
 * A responder turns the text of a user query into response text. The
 * default {@link keywordResponder} picks a canned answer by keyword
 * category and echoes anything it cannot classify.
 */

export interface ResponderContext {
  queryId: string;
  userId: string;
  signal: AbortSignal;
}

export type Responder = (text: string, context: ResponderContext) => string | Promise<string>;

export type QueryCategory = 'weather' | 'data_analysis' | 'coding' | 'system_status' | 'general';

/**
 * Keyword lists, checked in order; the first category with a match wins
 */
export const CATEGORY_KEYWORDS: ReadonlyArray<readonly [QueryCategory, readonly string[]]> = [
  ['weather', ['weather', 'temperature', 'rain', 'sunny', 'cloudy']],
  ['data_analysis', ['data', 'analysis', 'analytics', 'statistics', 'chart']],
  ['coding', ['code', 'program', 'python', 'javascript', 'api']],
  ['system_status', ['status', 'health', 'system']],
];

const COMMAND_PREFIXES = ['<', '>', '/'];

export function classifyQuery(text: string): QueryCategory {
  let normalized = text.toLowerCase().trim();
  if (COMMAND_PREFIXES.some((prefix) => normalized.startsWith(prefix))) {
    normalized = normalized.slice(1).trim();
  }

  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => normalized.includes(keyword))) {
      return category;
    }
  }
  return 'general';
}

export const CATEGORY_RESPONSES: Record<Exclude<QueryCategory, 'general'>, string> = {
  weather:
    "🌤️ **Weather Update**: I understand you're asking about the weather. " +
    "For real-time weather information, I'd need to access current weather APIs. " +
    'However, I can help you set up weather data processing or analysis if you have weather data!',
  data_analysis: [
    '📊 **Data Analysis Ready**: I can help you with various data analysis tasks including:',
    '• Statistical analysis and hypothesis testing',
    '• Data visualization and dashboard creation',
    '• Predictive modeling and machine learning',
    '• Trend analysis and forecasting',
    '• Data cleaning and preprocessing',
    '',
    'What specific type of data are you working with?',
  ].join('\n'),
  coding: [
    '💻 **Coding Assistant**: I can help you with programming tasks including:',
    '• Code review and optimization',
    '• Debugging and troubleshooting',
    '• API development and integration',
    '• Database design and queries',
    '• Best practices and architecture',
    '',
    'Share your specific coding challenge!',
  ].join('\n'),
  system_status: [
    '✅ **System Status**: Multi-agent system is running optimally!',
    '• Message broker: Active',
    '• Query handler: Processing',
    '• WebSocket connections: Stable',
    '• All systems operational',
  ].join('\n'),
};

export function generalResponse(query: string): string {
  return [
    `🤖 **Query Processed**: I received and analyzed your query: '${query}'`,
    '',
    'The multi-agent system has processed your request. For more specific assistance, try asking about:',
    '• Weather information',
    '• Data analysis tasks',
    '• Programming help',
    '• System status',
    '',
    'How else can I help you today?',
  ].join('\n');
}

export const keywordResponder: Responder = (text) => {
  const category = classifyQuery(text);
  return category === 'general' ? generalResponse(text) : CATEGORY_RESPONSES[category];
};
