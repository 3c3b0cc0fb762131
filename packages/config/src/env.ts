import createDebug from "debug";
import type { ConfigurationVariableSet, VariableName } from "@tracking-bootstrap/types";
import { ConfigurationUnavailableError } from "./errors";
import type { VariableSource } from "./sources/types";

const debug = createDebug("tracking:config");

export const VARIABLE_NAMES: readonly VariableName[] = [
  "HOST",
  "PORT",
  "USERNAME",
  "PASSWORD",
  "DATABASE",
  "BUCKET",
];

/**
 * Picks the bootstrap variables out of a raw name/value mapping.
 * Values are kept verbatim, empty strings included.
 */
export function pickVariables(raw: unknown): ConfigurationVariableSet {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigurationUnavailableError("Configuration variables are not available");
  }

  const picked: Partial<Record<VariableName, string>> = {};
  for (const name of VARIABLE_NAMES) {
    const value: unknown = Reflect.get(raw, name);
    if (typeof value === "string") {
      picked[name] = value;
    }
  }
  return Object.freeze(picked);
}

/** Read the variable set once. Any failure of the source is fatal. */
export async function readVariableSet(source: VariableSource): Promise<ConfigurationVariableSet> {
  let raw: unknown;
  try {
    raw = await source.read();
  } catch (error) {
    if (error instanceof ConfigurationUnavailableError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationUnavailableError(
      `Cannot read configuration from ${source.description}: ${reason}`,
      error,
    );
  }

  const vars = pickVariables(raw);
  debug(
    "readVariableSet: %s provided %s",
    source.description,
    VARIABLE_NAMES.filter((name) => vars[name] !== undefined).join(",") || "nothing",
  );
  return vars;
}
