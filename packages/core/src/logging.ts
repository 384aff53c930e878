/**
 * Logging
 *
 * Core modules log through an injected console-shaped object with a
 * bracketed subsystem tag, e.g. `[merge] ...`. Debug output is only written
 * when the owning component runs with `verbose` set.
 */

export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * A logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
