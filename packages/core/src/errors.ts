/** The tracking server could not be started at all (e.g. the executable is missing). */
export class LaunchError extends Error {
  constructor(
    public readonly executable: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "LaunchError";
  }
}

/** A selector was asked to decide and launch more than once. */
export class BootstrapStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BootstrapStateError";
  }
}
