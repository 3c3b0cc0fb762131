import type { BootstrapLogger } from "@tracking-bootstrap/types";

/** Logger that drops everything. Used when a caller passes none. */
export class NoopLogger implements BootstrapLogger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}

  child(_name: string, _attributes?: Record<string, unknown>): BootstrapLogger {
    return this;
  }

  withContext(_attributes: Record<string, unknown>): BootstrapLogger {
    return this;
  }
}

export const NOOP_LOGGER: BootstrapLogger = new NoopLogger();
