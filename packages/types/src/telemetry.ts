export type LogLevel = "debug" | "info" | "warn" | "error";

/** Structured logger shared by the bootstrap packages. */
export interface BootstrapLogger {
  debug(message: string, attributes?: Record<string, unknown>): void;
  info(message: string, attributes?: Record<string, unknown>): void;
  warn(message: string, attributes?: Record<string, unknown>): void;
  error(message: string, attributes?: Record<string, unknown>): void;

  /** Create a child logger. Its records carry `name` under `component`. */
  child(name: string, attributes?: Record<string, unknown>): BootstrapLogger;

  /** Create a logger enriched with additional context attributes. */
  withContext(attributes: Record<string, unknown>): BootstrapLogger;
}
