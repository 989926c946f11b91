/**
 * Logger
 *
 * Pino-based structured logging shared by the broker, the query handler,
 * the adapters and the Fastify transport.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function isLogLevel(value: string | undefined): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

let rootLogger: Logger | undefined;

/**
 * Root logger, created lazily from LOG_LEVEL
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    const envLevel = process.env.LOG_LEVEL;
    rootLogger = pino({
      name: 'agent-hub',
      level: isLogLevel(envLevel) ? envLevel : 'info',
    });
  }
  return rootLogger;
}

/**
 * Replace the root logger (used at startup once config is loaded)
 */
export function configureLogger(level: LevelWithSilent): Logger {
  rootLogger = pino({ name: 'agent-hub', level });
  return rootLogger;
}

/**
 * Child logger tagged with a component name
 */
export function createLogger(component: string, parent: Logger = getRootLogger()): Logger {
  return parent.child({ component });
}

/**
 * Normalize an unknown thrown value into something pino serializes well
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
