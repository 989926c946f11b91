/**
 * Agent Function Builder
 *
 * Fluent API for declaring the functions an adapter serves.
 */

import type {
  AgentFunction,
  FunctionDefinition,
  FunctionExecutionOptions,
  FunctionHandler,
  FunctionParameter,
  ParameterType,
} from './types.js';

/**
 * Fluent Agent Function Builder
 *
 * @example
 * ```typescript
 * const searchWeb = createAgentFunction()
 *   .name('search_web')
 *   .description('Search the web')
 *   .requiredParam('query', 'string', 'Search query')
 *   .optionalParam('max_results', 'number', 'Maximum results', 5)
 *   .handler(async ({ query }) => ({ ok: true, text: `searched ${String(query)}` }))
 *   .build();
 * ```
 */
export class AgentFunctionBuilder {
  private _name: string = '';
  private _description: string = '';
  private _parameters: FunctionParameter[] = [];
  private _tags: string[] = [];
  private _handler?: FunctionHandler;
  private _options: FunctionExecutionOptions = {};

  /**
   * Set the function name (unique within an adapter)
   */
  name(name: string): this {
    this._name = name;
    return this;
  }

  description(desc: string): this {
    this._description = desc;
    return this;
  }

  /**
   * Add a parameter
   */
  parameter(
    name: string,
    type: ParameterType,
    description: string,
    options: { required?: boolean; default?: unknown } = {}
  ): this {
    this._parameters.push({
      name,
      type,
      description,
      required: options.required ?? false,
      default: options.default,
    });
    return this;
  }

  requiredParam(name: string, type: ParameterType, description: string): this {
    return this.parameter(name, type, description, { required: true });
  }

  optionalParam(name: string, type: ParameterType, description: string, defaultValue?: unknown): this {
    return this.parameter(name, type, description, { required: false, default: defaultValue });
  }

  tags(...tags: string[]): this {
    this._tags.push(...tags);
    return this;
  }

  handler(fn: FunctionHandler): this {
    this._handler = fn;
    return this;
  }

  /**
   * Set timeout
   */
  timeout(ms: number): this {
    this._options.timeout = ms;
    return this;
  }

  build(): AgentFunction {
    if (!this._name) {
      throw new Error('Function name is required');
    }
    if (!this._description) {
      throw new Error('Function description is required');
    }
    if (!this._handler) {
      throw new Error('Function handler is required');
    }

    const definition: FunctionDefinition = {
      name: this._name,
      description: this._description,
      parameters: this._parameters,
      tags: this._tags.length > 0 ? this._tags : undefined,
    };

    return {
      definition,
      handler: this._handler,
      options: this._options,
    };
  }
}

/**
 * Create a new function builder
 */
export function createAgentFunction(): AgentFunctionBuilder {
  return new AgentFunctionBuilder();
}

// ============================================================================
// Parameter readers
// ============================================================================

/**
 * Read a validated string parameter
 */
export function stringParam(input: Record<string, unknown>, name: string): string | undefined {
  const value = input[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read a validated number parameter
 */
export function numberParam(input: Record<string, unknown>, name: string): number | undefined {
  const value = input[name];
  return typeof value === 'number' && !Number.isNaN(value) ? value : undefined;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
