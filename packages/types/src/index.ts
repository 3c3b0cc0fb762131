export type { VariableName, ConfigurationVariableSet } from "./variables";

export type {
  BackendStore,
  RemoteBackendStore,
  LocalBackendStore,
  CommandSpec,
  LaunchOutcome,
} from "./backend";

export type { LogLevel, BootstrapLogger } from "./telemetry";
