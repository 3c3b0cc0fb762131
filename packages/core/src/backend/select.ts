import type { BackendStore, ConfigurationVariableSet } from "@tracking-bootstrap/types";
import { buildConnectionString } from "./connection-string";

/** The only branching condition: HOST set to a non-empty string. */
export function hasRemoteHost(vars: ConfigurationVariableSet): boolean {
  return typeof vars.HOST === "string" && vars.HOST.length > 0;
}

export function selectBackendStore(vars: ConfigurationVariableSet): BackendStore {
  if (hasRemoteHost(vars)) {
    return { kind: "remote", uri: buildConnectionString(vars) };
  }
  return { kind: "local" };
}
