/**
 * Where the tracking server keeps its run and experiment metadata.
 * `remote` points at a MySQL-compatible database, `local` leaves the
 * server on its embedded default store.
 */
export type BackendStore = RemoteBackendStore | LocalBackendStore;

export type RemoteBackendStore = {
  kind: "remote";
  uri: string;
};

export type LocalBackendStore = {
  kind: "local";
};

/** A fully decided server invocation. */
export type CommandSpec = {
  executable: string;
  args: readonly string[];
  backendStore: BackendStore;
};

export type LaunchOutcome = {
  /** The child's exit code, or 128 + signal number when a signal ended it. */
  exitCode: number;
  signal: NodeJS.Signals | null;
};
