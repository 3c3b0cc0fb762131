export {
  MYSQL_SCHEME,
  REDACTED_PASSWORD,
  buildConnectionString,
  redactConnectionString,
} from "./backend/connection-string";
export { hasRemoteHost, selectBackendStore } from "./backend/select";

export {
  DEFAULT_EXECUTABLE,
  SERVER_HOST,
  SERVER_PORT,
  buildLaunchCommand,
  describeCommand,
  formatCommand,
  redactArgs,
} from "./command/build";
export type { BuildCommandOptions } from "./command/build";

export { FORWARDED_SIGNALS, exitCodeForSignal, launchServer } from "./process/launch";
export type { LaunchOptions, SignalSource, SpawnFn } from "./process/launch";

export { BootstrapSelector, selectAndLaunch } from "./selector/bootstrap-selector";
export type { SelectorOptions, SelectorState } from "./selector/bootstrap-selector";

export { LaunchError, BootstrapStateError } from "./errors";

// Testing
export { FakeServerProcess, createFakeSpawn } from "./testing/fake-server-process";
export type { SpawnCall } from "./testing/fake-server-process";
