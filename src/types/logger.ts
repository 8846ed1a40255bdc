/**
 * Logger interface for dependency injection.
 *
 * Matches the subset of Pino's API the engine uses, so components can be
 * handed a pino instance in production and a mock in tests.
 */
export interface Logger {
  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  info(obj: object, msg?: string): void;
  info(msg: string): void;
  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  error(obj: object, msg?: string): void;
  error(msg: string): void;

  /** Create a child logger with additional bindings */
  child(bindings: Record<string, unknown>): Logger;
}
