/** Raw name/value pairs as a source exposes them, before the bootstrap picks its variables. */
export type RawVariables = Record<string, string | undefined>;

/** Somewhere the configuration variables can be read from. */
export interface VariableSource {
  readonly description: string;
  read(): Promise<RawVariables>;
}
