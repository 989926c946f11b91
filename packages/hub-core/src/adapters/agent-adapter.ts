/**
 * Agent Adapter
 *
 * Serves the functions of one external capability. Handles lookup, input
 * validation, execution with timeout and conversion of every failure into
 * an error response, so nothing thrown by a collaborator reaches the
 * transport.
 */

import { createLogger, toError, type Logger } from '../logging/logger.js';
import { errorMessage, withTimeout } from '../utils/async.js';
import {
  FunctionErrorCode,
  type AdapterCard,
  type AgentFunction,
  type AgentRequest,
  type AgentResponse,
  type FunctionDefinition,
  type FunctionInput,
  type FunctionOutcome,
  type ParameterType,
} from './types.js';

/**
 * Validation error for function inputs
 */
export class AgentFunctionValidationError extends Error {
  constructor(
    public readonly functionName: string,
    public readonly parameter: string,
    message: string
  ) {
    super(`Function "${functionName}" parameter "${parameter}": ${message}`);
    this.name = 'AgentFunctionValidationError';
  }
}

/**
 * Function execution error
 */
export class AgentFunctionExecutionError extends Error {
  constructor(
    public readonly functionName: string,
    public readonly code: FunctionErrorCode,
    message: string
  ) {
    super(`Error executing ${functionName}: ${message}`);
    this.name = 'AgentFunctionExecutionError';
  }
}

export interface AgentAdapterOptions {
  id: string;
  name: string;
  description: string;
  version?: string;
  /** Default per-function timeout */
  timeoutMs?: number;
  logger?: Logger;
}

export interface AdapterStats {
  requests: number;
  succeeded: number;
  failed: number;
  byCode: Partial<Record<FunctionErrorCode, number>>;
}

export class AgentAdapter {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly version: string;

  private functions: Map<string, AgentFunction> = new Map();
  private timeoutMs: number;
  private stats: AdapterStats = { requests: 0, succeeded: 0, failed: 0, byCode: {} };
  protected logger: Logger;

  constructor(options: AgentAdapterOptions) {
    this.id = options.id;
    this.name = options.name;
    this.description = options.description;
    this.version = options.version ?? '1.0.0';
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.logger = options.logger ?? createLogger(`adapter:${options.id}`);
  }

  /**
   * Register a function
   */
  register(fn: AgentFunction): this {
    const name = fn.definition.name;
    if (this.functions.has(name)) {
      throw new Error(`Function "${name}" is already registered on adapter "${this.id}"`);
    }
    this.functions.set(name, fn);
    return this;
  }

  getDefinition(name: string): FunctionDefinition | undefined {
    return this.functions.get(name)?.definition;
  }

  listFunctions(): FunctionDefinition[] {
    return Array.from(this.functions.values(), (fn) => fn.definition);
  }

  /**
   * Discovery card listing every function this adapter serves
   */
  describe(): AdapterCard {
    return {
      id: this.id,
      name: this.name,
      description: this.description,
      version: this.version,
      functions: this.listFunctions(),
    };
  }

  getStats(): AdapterStats {
    return { ...this.stats, byCode: { ...this.stats.byCode } };
  }

  /**
   * Process one function-call request. Never rejects.
   */
  async handle(request: AgentRequest): Promise<AgentResponse> {
    this.stats.requests++;
    const { functionName } = request;

    try {
      const fn = this.functions.get(functionName);
      if (!fn) {
        return this.errorResponse(request, FunctionErrorCode.NOT_FOUND, `Unknown function: ${functionName}`);
      }

      let input: FunctionInput;
      try {
        input = this.validateInput(fn.definition, request.parameters);
      } catch (error) {
        return this.errorResponse(request, FunctionErrorCode.INVALID_INPUT, errorMessage(error));
      }

      const outcome = await this.execute(fn, input, request);
      if (!outcome.ok) {
        return this.errorResponse(request, FunctionErrorCode.EXTERNAL_ERROR, outcome.error);
      }

      this.stats.succeeded++;
      this.logger.info({ functionName, senderId: request.routing.senderId }, 'Function completed');
      return {
        role: 'agent',
        content: { type: 'text', text: outcome.text },
        routing: { ...request.routing },
      };
    } catch (error) {
      // handlers may reject argument combinations the schema cannot express
      if (error instanceof AgentFunctionValidationError) {
        return this.errorResponse(request, FunctionErrorCode.INVALID_INPUT, error.message);
      }

      const code =
        error instanceof AgentFunctionExecutionError ? error.code : FunctionErrorCode.EXECUTION_ERROR;
      const detail =
        error instanceof AgentFunctionExecutionError
          ? error.message
          : `Error executing ${functionName}: ${errorMessage(error)}`;

      this.logger.error(
        {
          functionName,
          parameters: request.parameters,
          routing: request.routing,
          err: toError(error),
        },
        'Function failed'
      );
      return this.errorResponse(request, code, detail);
    }
  }

  private async execute(
    fn: AgentFunction,
    input: FunctionInput,
    request: AgentRequest
  ): Promise<FunctionOutcome> {
    const controller = new AbortController();
    const timeout = fn.options?.timeout ?? this.timeoutMs;

    try {
      return await withTimeout(
        fn.handler(input, { adapterId: this.id, routing: request.routing, signal: controller.signal }),
        timeout
      );
    } catch (error) {
      if (error instanceof Error && error.message === 'TIMEOUT') {
        controller.abort();
        throw new AgentFunctionExecutionError(
          fn.definition.name,
          FunctionErrorCode.TIMEOUT,
          `timed out after ${timeout}ms`
        );
      }
      throw error;
    }
  }

  /**
   * Check required parameters and types, and fill in defaults
   */
  private validateInput(definition: FunctionDefinition, parameters: Record<string, unknown>): FunctionInput {
    const input: FunctionInput = { ...parameters };

    for (const param of definition.parameters) {
      const value = input[param.name];

      if (value === undefined || value === null) {
        if (param.required) {
          throw new AgentFunctionValidationError(
            definition.name,
            param.name,
            'Missing required parameter'
          );
        }
        if (param.default !== undefined) {
          input[param.name] = param.default;
        }
        continue;
      }

      if (!this.validateType(value, param.type)) {
        throw new AgentFunctionValidationError(
          definition.name,
          param.name,
          `Expected type "${param.type}", got "${Array.isArray(value) ? 'array' : typeof value}"`
        );
      }
    }

    return input;
  }

  private validateType(value: unknown, expectedType: ParameterType): boolean {
    switch (expectedType) {
      case 'string':
        return typeof value === 'string';
      case 'number':
        return typeof value === 'number' && !isNaN(value);
      case 'boolean':
        return typeof value === 'boolean';
      case 'object':
        return typeof value === 'object' && value !== null && !Array.isArray(value);
      case 'array':
        return Array.isArray(value);
    }
  }

  private errorResponse(request: AgentRequest, code: FunctionErrorCode, detail: string): AgentResponse {
    this.stats.failed++;
    this.stats.byCode[code] = (this.stats.byCode[code] ?? 0) + 1;

    if (code !== FunctionErrorCode.EXECUTION_ERROR && code !== FunctionErrorCode.TIMEOUT) {
      this.logger.warn({ functionName: request.functionName, code, detail }, 'Function request rejected');
    }

    return {
      role: 'agent',
      content: { type: 'error', detail },
      routing: { ...request.routing },
    };
  }
}
