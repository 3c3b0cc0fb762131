/** The variable set could not be read at all. Fatal: nothing is launched. */
export class ConfigurationUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "ConfigurationUnavailableError";
  }
}
