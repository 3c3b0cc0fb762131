import createDebug from "debug";
import type {
  BootstrapLogger,
  CommandSpec,
  ConfigurationVariableSet,
  LaunchOutcome,
} from "@tracking-bootstrap/types";
import { ConfigurationUnavailableError } from "@tracking-bootstrap/config";
import { NOOP_LOGGER } from "@tracking-bootstrap/telemetry";
import { buildLaunchCommand, formatCommand } from "../command/build";
import type { BuildCommandOptions } from "../command/build";
import { launchServer } from "../process/launch";
import type { LaunchOptions } from "../process/launch";
import { BootstrapStateError } from "../errors";

const debug = createDebug("tracking:core:selector");

export type SelectorState = "NotStarted" | "Running" | "Exited";

export type SelectorOptions = BuildCommandOptions & LaunchOptions;

const REMOTE_FIELDS = ["PORT", "USERNAME", "PASSWORD", "DATABASE"] as const;

/**
 * Decides once which tracking-server command to run and runs it.
 * NotStarted -> Running -> Exited; a selector never launches twice.
 */
export class BootstrapSelector {
  private state: SelectorState = "NotStarted";
  private readonly logger: BootstrapLogger;

  constructor(private readonly options: SelectorOptions = {}) {
    this.logger = (options.logger ?? NOOP_LOGGER).child("selector");
  }

  get currentState(): SelectorState {
    return this.state;
  }

  /** The command the selector would run for these variables. Pure; changes no state. */
  decide(vars: ConfigurationVariableSet | null | undefined): CommandSpec {
    if (typeof vars !== "object" || vars === null) {
      throw new ConfigurationUnavailableError("Configuration variables are not available");
    }
    return buildLaunchCommand(vars, { executable: this.options.executable });
  }

  async selectAndLaunch(vars: ConfigurationVariableSet | null | undefined): Promise<LaunchOutcome> {
    if (this.state !== "NotStarted") {
      throw new BootstrapStateError(`Tracking server already launched (state: ${this.state})`);
    }

    const command = this.decide(vars);
    this.warnOnGaps(vars ?? {}, command);
    this.logger.info("launching tracking server", {
      backendStore: command.backendStore.kind,
      command: `${command.executable} ${formatCommand(command)}`,
    });
    debug("selectAndLaunch: backend=%s", command.backendStore.kind);

    this.state = "Running";
    try {
      return await launchServer(command, { ...this.options, logger: this.logger });
    } finally {
      this.state = "Exited";
    }
  }

  private warnOnGaps(vars: ConfigurationVariableSet, command: CommandSpec): void {
    if (!vars.BUCKET) {
      this.logger.warn("BUCKET is not set; the server gets an empty default artifact root");
    }
    if (command.backendStore.kind === "remote") {
      const missing = REMOTE_FIELDS.filter((name) => !vars[name]);
      if (missing.length > 0) {
        this.logger.warn("HOST is set but the connection string is incomplete", { missing });
      }
    }
  }
}

/** Decide and launch with a fresh selector. Resolves when the server exits. */
export function selectAndLaunch(
  vars: ConfigurationVariableSet | null | undefined,
  options: SelectorOptions = {},
): Promise<LaunchOutcome> {
  return new BootstrapSelector(options).selectAndLaunch(vars);
}
