/**
 * Agent Adapter Types
 *
 * Adapters expose one external capability (web search, weather, news) as a
 * set of named functions. Requests arrive over an RPC-style channel, not
 * through the broker, and every request gets exactly one structured
 * response back.
 */

/**
 * Parameter value types accepted by agent functions
 */
export type ParameterType = 'string' | 'number' | 'boolean' | 'object' | 'array';

/**
 * Parameter definition for an agent function
 */
export interface FunctionParameter {
  name: string;
  type: ParameterType;
  description: string;
  required: boolean;
  default?: unknown;
}

/**
 * Function definition - what an adapter advertises on its card
 */
export interface FunctionDefinition {
  name: string;
  description: string;
  parameters: FunctionParameter[];
  tags?: string[];
}

/**
 * Routing fields supplied by the transport; echoed back on the response
 */
export interface RoutingMetadata {
  senderId: string;
  parentMessageId?: string;
  conversationId?: string;
}

/**
 * Structured function-call request
 */
export interface AgentRequest {
  functionName: string;
  parameters: Record<string, unknown>;
  routing: RoutingMetadata;
}

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ErrorContent {
  type: 'error';
  detail: string;
}

/**
 * Structured response; `content.type` tells success from failure
 */
export interface AgentResponse {
  role: 'agent';
  content: TextContent | ErrorContent;
  routing: RoutingMetadata;
}

/**
 * Context handed to a function handler
 */
export interface FunctionContext {
  adapterId: string;
  routing: RoutingMetadata;
  signal: AbortSignal;
}

/**
 * What a handler returns. Collaborator failures that are reported rather
 * than thrown come back as `{ ok: false }`.
 */
export type FunctionOutcome = { ok: true; text: string } | { ok: false; error: string };

/**
 * Handler input: the request parameters after validation, with defaults filled in
 */
export type FunctionInput = Record<string, unknown>;

export type FunctionHandler = (input: FunctionInput, context: FunctionContext) => Promise<FunctionOutcome>;

export interface FunctionExecutionOptions {
  timeout?: number;
}

/**
 * Complete function configuration
 */
export interface AgentFunction {
  definition: FunctionDefinition;
  handler: FunctionHandler;
  options?: FunctionExecutionOptions;
}

/**
 * Discovery document for an adapter
 */
export interface AdapterCard {
  id: string;
  name: string;
  description: string;
  version: string;
  functions: FunctionDefinition[];
}

/**
 * Error codes logged with failed requests
 */
export enum FunctionErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  NOT_FOUND = 'NOT_FOUND',
  EXECUTION_ERROR = 'EXECUTION_ERROR',
  TIMEOUT = 'TIMEOUT',
  EXTERNAL_ERROR = 'EXTERNAL_ERROR',
}
