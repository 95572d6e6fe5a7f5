/**
 * Logging
 *
 * One pino root logger per process with component-scoped children.
 * Context objects go first, the message second.
 *
 * @example
 * ```typescript
 * const logger = createLogger('RetrainMonitor');
 * logger.info({ path: signalPath }, 'Retraining signal detected');
 * ```
 */

import { pino, type Logger } from 'pino';

export type { Logger };

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

type EmittingLevel = Exclude<LogLevel, 'silent'>;
type LogContext = Record<string, unknown>;

let rootLogger: Logger | null = null;

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Narrow an arbitrary string to a known log level.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

export const DEFAULT_LOG_LEVEL: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

/**
 * (Re)create the process-wide root logger.
 */
export function createRootLogger(level: LogLevel = DEFAULT_LOG_LEVEL, serviceName = 'model-lifecycle-serving'): Logger {
  rootLogger = pino({
    level,
    base: { service: serviceName },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return rootLogger;
}

export function getRootLogger(): Logger {
  return rootLogger ?? createRootLogger();
}

/**
 * Create a child logger tagged with the component name.
 *
 * @param component - Component name (e.g. 'ModelService')
 * @param parent - Parent logger; defaults to the root logger
 */
export function createLogger(component: string, parent?: Logger): Logger {
  return (parent ?? getRootLogger()).child({ component });
}

/**
 * Only build the context object when the level is enabled.
 * Used on the predict path, where debug is off in production.
 */
export function lazyLog(
  logger: Logger | undefined,
  level: EmittingLevel,
  contextBuilder: () => LogContext,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
