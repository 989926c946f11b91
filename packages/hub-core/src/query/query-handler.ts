/**
 * Query Handler
 *
 * Subscribes to user queries and answers each one in its own unit of
 * work. Every accepted query produces exactly one message on the response
 * topic, with status `completed` or `error`. Outstanding work is tracked
 * so that {@link QueryHandler.stop} can drain it.
 */

import { v4 as uuid } from 'uuid';
import type { MessageBroker, Subscriber } from '../broker/message-broker.js';
import { createLogger, toError, type Logger } from '../logging/logger.js';
import {
  MessageKind,
  QueryStatus,
  Topic,
  UserQueryPayloadSchema,
  type Message,
  type MessagePayload,
  type QueryResponsePayload,
  type UserQueryPayload,
} from '../messages/types.js';
import { AbortedError, abortable, errorMessage, sleep } from '../utils/async.js';
import { keywordResponder, type Responder } from './responder.js';

export type QueryHandlerState = 'stopped' | 'running';

export interface QueryHandlerOptions {
  responder?: Responder;
  /** Delay before the responder runs, standing in for external work */
  latencyMs?: number;
  /** Reported as `processing_agent` on every response */
  agentName?: string;
  /**
   * Upper bound on how long `stop()` waits before cancelling outstanding
   * work. Unset means wait for every query to finish.
   */
  drainTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Snapshot of a query that has been accepted but not yet answered
 */
export interface InFlightQuery {
  readonly taskId: string;
  readonly queryId: string;
  readonly userId: string;
  readonly textContent: string;
  readonly startedAt: Date;
}

export interface QueryHandlerStats {
  accepted: number;
  completed: number;
  failed: number;
  inFlight: number;
}

interface QueryTask {
  record: InFlightQuery;
  controller: AbortController;
  done: Promise<void>;
}

export const DEFAULT_AGENT_NAME = 'query_handler';
export const SHUTDOWN_CANCEL_REASON = 'Query cancelled during shutdown';

function readString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

export class QueryHandler {
  private state: QueryHandlerState = 'stopped';
  private inFlight: Map<string, QueryTask> = new Map();
  private counters = { accepted: 0, completed: 0, failed: 0 };
  private responder: Responder;
  private latencyMs: number;
  private agentName: string;
  private drainTimeoutMs?: number;
  private stopping?: Promise<void>;
  private logger: Logger;

  private readonly onUserQuery: Subscriber = (message) => {
    this.handleUserQuery(message);
  };

  constructor(
    private readonly broker: MessageBroker,
    options: QueryHandlerOptions = {}
  ) {
    this.responder = options.responder ?? keywordResponder;
    this.latencyMs = options.latencyMs ?? 1000;
    this.agentName = options.agentName ?? DEFAULT_AGENT_NAME;
    this.drainTimeoutMs = options.drainTimeoutMs;
    this.logger = options.logger ?? createLogger('query-handler');
  }

  get isRunning(): boolean {
    return this.state === 'running';
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Start accepting user queries. The subscription is in place when this returns.
   */
  start(): void {
    if (this.state === 'running') {
      this.logger.warn('Query handler is already running');
      return;
    }

    this.state = 'running';
    this.broker.subscribe(Topic.USER_QUERY, this.onUserQuery);
    this.logger.info({ topic: Topic.USER_QUERY }, 'Query handler started');
  }

  /**
   * Stop accepting queries and wait for outstanding ones to finish.
   * Calls made while a drain is under way share it. Never rejects.
   */
  stop(): Promise<void> {
    if (this.state === 'stopped') {
      return this.stopping ?? Promise.resolve();
    }

    this.state = 'stopped';
    this.broker.unsubscribe(Topic.USER_QUERY, this.onUserQuery);

    this.stopping = this.finishStop().finally(() => {
      this.stopping = undefined;
    });
    return this.stopping;
  }

  private async finishStop(): Promise<void> {
    if (this.inFlight.size > 0) {
      this.logger.info({ inFlight: this.inFlight.size }, 'Waiting for in-flight queries');
      await this.drain();
    }

    this.logger.info('Query handler stopped');
  }

  getInFlight(): InFlightQuery[] {
    return Array.from(this.inFlight.values(), (task) => task.record);
  }

  getStats(): QueryHandlerStats {
    return {
      ...this.counters,
      inFlight: this.inFlight.size,
    };
  }

  /**
   * Accept one user-query message and spawn its unit of work
   */
  handleUserQuery(message: Message): void {
    if (this.state !== 'running') {
      return;
    }

    const payload = message.payload;
    const record: InFlightQuery = Object.freeze({
      taskId: uuid(),
      queryId: readString(payload.query_id),
      userId: readString(payload.user_id),
      textContent: readString(payload.text_content),
      startedAt: new Date(),
    });
    const controller = new AbortController();

    this.logger.info(
      { queryId: record.queryId, userId: record.userId, text: record.textContent },
      'Processing query'
    );

    // registered in the same tick it is spawned; removal runs after the terminal publish
    const done = this.processQuery(record, payload, controller.signal).finally(() => {
      this.inFlight.delete(record.taskId);
    });
    this.inFlight.set(record.taskId, { record, controller, done });
    this.counters.accepted++;
  }

  private async processQuery(
    record: InFlightQuery,
    payload: Readonly<MessagePayload>,
    signal: AbortSignal
  ): Promise<void> {
    try {
      await sleep(this.latencyMs, signal);

      const query = this.parsePayload(payload);
      // a cancelled unit settles even if the responder ignores its signal
      const response = await abortable(
        Promise.resolve(
          this.responder(query.text_content, {
            queryId: record.queryId,
            userId: record.userId,
            signal,
          })
        ),
        signal
      );

      this.publishResponse(record, response, QueryStatus.COMPLETED);
      this.counters.completed++;
      this.logger.info({ queryId: record.queryId }, 'Completed query');
    } catch (error) {
      this.counters.failed++;
      this.logger.error({ queryId: record.queryId, err: toError(error) }, 'Error processing query');

      try {
        this.publishResponse(record, `Error processing query: ${errorMessage(error)}`, QueryStatus.ERROR);
      } catch (publishError) {
        this.logger.error(
          { queryId: record.queryId, err: toError(publishError) },
          'Failed to publish error response'
        );
      }
    }
  }

  private parsePayload(payload: Readonly<MessagePayload>): UserQueryPayload {
    const parsed = UserQueryPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Invalid user query payload (${issues.join(', ')})`);
    }
    return parsed.data;
  }

  private publishResponse(
    record: InFlightQuery,
    response: string,
    status: QueryResponsePayload['status']
  ): void {
    const payload: QueryResponsePayload = {
      query_id: record.queryId,
      user_id: record.userId,
      response,
      status,
      timestamp: Date.now() / 1000,
      processing_agent: this.agentName,
    };

    this.broker.publish(
      Topic.QUERY_RESPONSE,
      status === QueryStatus.COMPLETED ? MessageKind.QUERY_RESPONSE : MessageKind.ERROR,
      payload
    );
  }

  private async drain(): Promise<void> {
    const pending = Array.from(this.inFlight.values(), (task) => task.done);

    if (this.drainTimeoutMs === undefined) {
      await Promise.allSettled(pending);
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const finished = await Promise.race([
      Promise.allSettled(pending).then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), this.drainTimeoutMs);
      }),
    ]);
    clearTimeout(timer);

    if (finished) {
      return;
    }

    const remaining = Array.from(this.inFlight.values());
    this.logger.warn(
      { remaining: remaining.length, drainTimeoutMs: this.drainTimeoutMs },
      'Drain timeout reached, cancelling in-flight queries'
    );
    for (const task of remaining) {
      task.controller.abort(new AbortedError(SHUTDOWN_CANCEL_REASON));
    }
    await Promise.allSettled(remaining.map((task) => task.done));
  }
}
