/**
 * @fileoverview Logger - Structured Logging for the Container
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/logging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * One pino root logger; each module takes a child tagged with its
 * component name:
 *
 * ```typescript
 * const log = createLogger('provides-enabler');
 * log.warn({ member: 'Reports.pool()' }, 'Skipping provider member');
 * ```
 *
 * | Variable | Effect |
 * |----------|--------|
 * | `WIRELOOM_LOG_LEVEL` | Level for all loggers (falls back to `LOG_LEVEL`, then `info`) |
 * | `WIRELOOM_PRETTY_LOGS` | `true` routes output through pino-pretty |
 *
 * @version 1.0.0
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

const loggerOptions: LoggerOptions = {
  name: 'wireloom',
  level: process.env.WIRELOOM_LOG_LEVEL ?? process.env.LOG_LEVEL ?? 'info',
};

if (process.env.WIRELOOM_PRETTY_LOGS === 'true') {
  loggerOptions.transport = {
    target: 'pino-pretty',
    options: { colorize: true },
  };
}

/**
 * The root logger shared by every component.
 */
export const rootLogger: Logger = pino(loggerOptions);

/**
 * A child logger whose records carry `component`.
 */
export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}

export type { Logger };
