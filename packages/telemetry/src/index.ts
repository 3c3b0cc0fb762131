export { readTelemetryEnv } from "./env";
export type { TelemetryConfig, LogFormat } from "./env";
export {
  BootstrapLoggerImpl,
  createLogger,
  createLoggerOptions,
  resolveRedactPaths,
  usesHumanFormat,
} from "./logger";
export { NoopLogger, NOOP_LOGGER } from "./noop";
