import type { CommandSpec, ConfigurationVariableSet } from "@tracking-bootstrap/types";
import { selectBackendStore } from "../backend/select";
import { redactConnectionString } from "../backend/connection-string";

export const DEFAULT_EXECUTABLE = "mlflow";
export const SERVER_HOST = "0.0.0.0";
export const SERVER_PORT = 5000;

const BACKEND_STORE_URI_FLAG = "--backend-store-uri";

export type BuildCommandOptions = {
  /** Path or name of the tracking-server executable. */
  executable?: string;
};

export function buildLaunchCommand(
  vars: ConfigurationVariableSet,
  options: BuildCommandOptions = {},
): CommandSpec {
  const backendStore = selectBackendStore(vars);
  const args = [
    "server",
    "--host",
    SERVER_HOST,
    "--port",
    String(SERVER_PORT),
    "--default-artifact-root",
    vars.BUCKET ?? "",
  ];
  if (backendStore.kind === "remote") {
    args.push(BACKEND_STORE_URI_FLAG, backendStore.uri);
  }

  return {
    executable: options.executable || DEFAULT_EXECUTABLE,
    args,
    backendStore,
  };
}

/** Arguments with the backend-store password masked, safe for logs and output. */
export function redactArgs(args: readonly string[]): string[] {
  return args.map((arg, i) =>
    i > 0 && args[i - 1] === BACKEND_STORE_URI_FLAG ? redactConnectionString(arg) : arg,
  );
}

/** The redacted argument list joined by single spaces. */
export function formatCommand(spec: CommandSpec): string {
  return redactArgs(spec.args).join(" ");
}

/** A JSON-friendly view of a command, with the password masked. */
export function describeCommand(spec: CommandSpec): CommandSpec {
  const backendStore =
    spec.backendStore.kind === "remote"
      ? { kind: "remote" as const, uri: redactConnectionString(spec.backendStore.uri) }
      : spec.backendStore;
  return {
    executable: spec.executable,
    args: redactArgs(spec.args),
    backendStore,
  };
}
