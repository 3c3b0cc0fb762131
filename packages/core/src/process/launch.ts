import { spawn as nodeSpawn } from "node:child_process";
import type { ChildProcess, SpawnOptions } from "node:child_process";
import { constants } from "node:os";
import createDebug from "debug";
import type { BootstrapLogger, CommandSpec, LaunchOutcome } from "@tracking-bootstrap/types";
import { NOOP_LOGGER } from "@tracking-bootstrap/telemetry";
import { LaunchError } from "../errors";
import { formatCommand } from "../command/build";

const debug = createDebug("tracking:core:launch");

export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildProcess;

/** Where termination signals for the bootstrap process arrive. `process` in production. */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export type LaunchOptions = {
  spawn?: SpawnFn;
  /** Environment handed to the server process. Defaults to the bootstrap's own. */
  env?: NodeJS.ProcessEnv;
  signals?: SignalSource;
  forwardSignals?: readonly NodeJS.Signals[];
  logger?: BootstrapLogger;
};

/** Exit status the shell reports for a process ended by a signal. */
export function exitCodeForSignal(signal: NodeJS.Signals): number {
  const number = SIGNAL_NUMBERS.get(signal);
  return number === undefined ? 1 : 128 + number;
}

/**
 * Run the server in the foreground with inherited stdio until it exits.
 * Termination signals sent to the bootstrap are passed on to the server;
 * the server's own exit status becomes the outcome.
 */
export function launchServer(spec: CommandSpec, options: LaunchOptions = {}): Promise<LaunchOutcome> {
  const spawn: SpawnFn = options.spawn ?? nodeSpawn;
  const signals: SignalSource = options.signals ?? process;
  const forwardSignals = options.forwardSignals ?? FORWARDED_SIGNALS;
  const logger = options.logger ?? NOOP_LOGGER;

  debug("launchServer: %s %s", spec.executable, formatCommand(spec));

  return new Promise<LaunchOutcome>((resolve, reject) => {
    let settled = false;
    let child: ChildProcess;

    const forward = (signal: NodeJS.Signals): void => {
      if (child.exitCode !== null || child.signalCode !== null) return;
      logger.info("forwarding signal to tracking server", { signal, serverPid: child.pid });
      child.kill(signal);
    };

    const detach = (): void => {
      for (const signal of forwardSignals) signals.off(signal, forward);
    };

    const fail = (error: unknown): void => {
      if (settled) return;
      settled = true;
      detach();
      const reason = error instanceof Error ? error.message : String(error);
      reject(
        new LaunchError(spec.executable, `Failed to start "${spec.executable}": ${reason}`, error),
      );
    };

    try {
      child = spawn(spec.executable, spec.args, {
        stdio: "inherit",
        env: options.env ?? process.env,
      });
    } catch (error) {
      fail(error);
      return;
    }

    for (const signal of forwardSignals) signals.on(signal, forward);

    child.once("spawn", () => {
      debug("launchServer: started pid=%d", child.pid);
      logger.info("tracking server started", { serverPid: child.pid });
    });

    child.on("error", (error) => {
      if (child.pid === undefined) {
        fail(error);
        return;
      }
      logger.warn("tracking server process error", { error: error.message });
    });

    child.once("exit", (code, signal) => {
      if (settled) return;
      settled = true;
      detach();
      const outcome: LaunchOutcome = {
        exitCode: signal ? exitCodeForSignal(signal) : (code ?? 1),
        signal,
      };
      debug("launchServer: exited code=%s signal=%s", code, signal);
      logger.info("tracking server exited", { ...outcome });
      resolve(outcome);
    });
  });
}
