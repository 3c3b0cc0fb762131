import createDebug from "debug";
import type { VariableSource } from "./types";
import { EnvironmentVariableSource } from "./environment";
import { JsonFileVariableSource } from "./json-file";

const debug = createDebug("tracking:config:source");

export type VariableSourceOptions = {
  /** Path to a JSON variables file. Takes the place of the environment when set. */
  varsFile?: string;
  env?: NodeJS.ProcessEnv;
};

export function resolveVariableSource(options: VariableSourceOptions = {}): VariableSource {
  const source: VariableSource = options.varsFile
    ? new JsonFileVariableSource(options.varsFile)
    : new EnvironmentVariableSource(options.env);
  debug("resolveVariableSource: %s", source.description);
  return source;
}
