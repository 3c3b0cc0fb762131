import pino from "pino";
import type { BootstrapLogger, LogLevel } from "@tracking-bootstrap/types";
import type { TelemetryConfig } from "./env";

/** Keys redacted from every record, at the top level and one object deep. */
const ALWAYS_REDACTED = ["password", "PASSWORD"];

/**
 * Logger handed to the selector and the launcher. Records carry the service
 * name under `name` and the emitting part of the bootstrap under `component`,
 * so a child never shadows pino's own `name` or `pid` fields.
 */
export class BootstrapLoggerImpl implements BootstrapLogger {
  constructor(private pinoLogger: pino.Logger) {}

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.log("debug", message, attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.log("info", message, attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.log("warn", message, attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.log("error", message, attributes);
  }

  private log(level: LogLevel, message: string, attributes?: Record<string, unknown>): void {
    const fn = this.pinoLogger[level].bind(this.pinoLogger);
    if (attributes) fn(attributes, message);
    else fn(message);
  }

  child(name: string, attributes?: Record<string, unknown>): BootstrapLogger {
    return new BootstrapLoggerImpl(this.pinoLogger.child({ ...attributes, component: name }));
  }

  withContext(attributes: Record<string, unknown>): BootstrapLogger {
    return new BootstrapLoggerImpl(this.pinoLogger.child(attributes));
  }

  setLevel(level: LogLevel): void {
    this.pinoLogger.level = level;
  }
}

export function resolveRedactPaths(config: TelemetryConfig): string[] {
  const keys = [...new Set([...ALWAYS_REDACTED, ...config.redactKeys])];
  return keys.flatMap((key) => [key, `*.${key}`]);
}

/** pino options shared by every destination. */
export function createLoggerOptions(config: TelemetryConfig): pino.LoggerOptions {
  return {
    name: config.serviceName,
    level: config.logLevel,
    redact: { paths: resolveRedactPaths(config), censor: "[REDACTED]" },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

export function usesHumanFormat(config: TelemetryConfig): boolean {
  return (
    config.logFormat === "human" || (config.logFormat === "auto" && config.environment === "local")
  );
}

export function createLogger(config: TelemetryConfig): BootstrapLoggerImpl {
  const streams: pino.StreamEntry[] = [];

  if (usesHumanFormat(config)) {
    // pino-pretty runs in a worker thread; writes to stderr so stdout stays clean for --print
    streams.push({
      level: config.logLevel,
      stream: pino.transport({ target: "pino-pretty", options: { destination: 2 } }),
    });
  } else {
    streams.push({ level: config.logLevel, stream: pino.destination(2) });
  }

  if (config.logFilePath) {
    streams.push({
      level: config.logLevel,
      stream: pino.destination({ dest: config.logFilePath, sync: true }),
    });
  }

  const logger = pino(createLoggerOptions(config), pino.multistream(streams));
  return new BootstrapLoggerImpl(logger);
}
