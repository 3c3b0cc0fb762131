import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import createDebug from "debug";
import { ConfigurationUnavailableError } from "../errors";
import type { RawVariables, VariableSource } from "./types";

const debug = createDebug("tracking:config:json-file");

/**
 * Reads variables from a JSON object on disk, e.g. a mounted secret.
 * Scalar values are stringified; nested objects, arrays and nulls are dropped.
 */
export class JsonFileVariableSource implements VariableSource {
  private readonly path: string;

  constructor(path: string) {
    this.path = resolve(path);
  }

  get description(): string {
    return `file ${this.path}`;
  }

  async read(): Promise<RawVariables> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (error) {
      throw new ConfigurationUnavailableError(`Cannot read variables file "${this.path}"`, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationUnavailableError(
        `Variables file "${this.path}" is not valid JSON`,
        error,
      );
    }

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new ConfigurationUnavailableError(
        `Variables file "${this.path}" must contain a JSON object`,
      );
    }

    const result: RawVariables = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === "string") {
        result[key] = value;
      } else if (typeof value === "number" || typeof value === "boolean") {
        result[key] = String(value);
      }
    }
    debug("read %d variables from %s", Object.keys(result).length, this.path);
    return result;
  }
}
