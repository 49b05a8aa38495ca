/**
 * Logging contract for code that runs outside a command context.
 *
 * Seyfert's `client.logger` satisfies it; tests pass `silentLogger`.
 * Convention: first argument is a `[area]` tagged message, second a metadata object.
 */
export interface SyncLogger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const noop = (): void => undefined;

export const silentLogger: SyncLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
