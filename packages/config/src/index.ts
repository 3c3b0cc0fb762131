export { VARIABLE_NAMES, pickVariables, readVariableSet } from "./env";
export { ConfigurationUnavailableError } from "./errors";

export type { VariableSource, RawVariables } from "./sources/types";
export { EnvironmentVariableSource } from "./sources/environment";
export { JsonFileVariableSource } from "./sources/json-file";
export { resolveVariableSource } from "./sources/resolve";
export type { VariableSourceOptions } from "./sources/resolve";
