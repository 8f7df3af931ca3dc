import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';
import type { EventBus } from '../../application/EventBus.js';
import type { DomainEvent } from '../../domain/events/DomainEvents.js';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Default: `LOG_LEVEL` from the environment, else `'silent'`. */
  readonly level?: LevelWithSilent;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function levelFromEnv(): LevelWithSilent {
  const value = process.env['LOG_LEVEL']?.toLowerCase();
  return LEVELS.find((level) => level === value) ?? 'silent';
}

/** Build the reader's pino logger. A library should stay quiet unless asked, hence `silent` by default. */
export function createLogger(options?: LoggerOptions): Logger {
  return pino({
    name: 'edgelog',
    level: options?.level ?? levelFromEnv(),
  });
}

/** Forward session events to a logger: lifecycle at `debug`, failures at `warn`. Returns the unsubscribe function. */
export function attachLogger(bus: EventBus, logger: Logger): () => void {
  const handler = (event: DomainEvent): void => {
    switch (event.type) {
      case 'session:failed':
        logger.warn(
          { sessionId: event.sessionId, locator: event.locator, code: event.code, lineNumber: event.lineNumber },
          event.error,
        );
        return;
      case 'session:opened':
        if (!event.knownVersion) {
          logger.warn(
            { sessionId: event.sessionId, locator: event.locator, version: event.version },
            'unknown log format version, reading with the newest known field table',
          );
        }
        logger.debug({ ...event }, 'log session opened');
        return;
      case 'session:exhausted':
        logger.debug({ ...event }, 'log session exhausted');
        return;
      case 'session:closed':
        logger.debug({ ...event }, 'log session closed');
        return;
    }
  };

  bus.onAny(handler);
  return () => {
    bus.offAny(handler);
  };
}
