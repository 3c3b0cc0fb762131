import type { LogLevel } from "@tracking-bootstrap/types";

export type LogFormat = "json" | "human" | "auto";

export type TelemetryConfig = {
  serviceName: string;
  /** Deployment environment; `local` makes the `auto` format human-readable. */
  environment: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  logFilePath: string | null;
  redactKeys: string[];
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const LOG_FORMATS: readonly LogFormat[] = ["json", "human", "auto"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string | undefined): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

export function readTelemetryEnv(env: NodeJS.ProcessEnv = process.env): TelemetryConfig {
  const rawLevel = env.TRACKING_LOG_LEVEL?.toLowerCase();
  const rawFormat = env.TRACKING_LOG_FORMAT?.toLowerCase();

  return {
    serviceName: env.TRACKING_SERVICE_NAME ?? "tracking-bootstrap",
    environment: env.TRACKING_ENV?.toLowerCase() || "local",
    logLevel: isLogLevel(rawLevel) ? rawLevel : "info",
    logFormat: isLogFormat(rawFormat) ? rawFormat : "auto",
    logFilePath: env.TRACKING_LOG_FILE_PATH || null,
    redactKeys: parseRedactKeys(env.TRACKING_LOG_REDACT_KEYS),
  };
}

function parseRedactKeys(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((key) => key.trim())
    .filter(Boolean);
}
