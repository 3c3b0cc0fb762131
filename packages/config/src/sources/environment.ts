import type { RawVariables, VariableSource } from "./types";

/** Reads variables from a process environment, `process.env` unless given another. */
export class EnvironmentVariableSource implements VariableSource {
  readonly description = "process environment";

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async read(): Promise<RawVariables> {
    return { ...this.env };
  }
}
