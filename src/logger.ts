/**
 * Minimal structured logger accepted by the engine.
 *
 * Structurally compatible with `console` and with the usual structured
 * loggers, so callers pass whatever they already use.
 *
 * @category Logging
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const noop = (): void => {};

/** Discards everything. Used when no logger is injected. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
