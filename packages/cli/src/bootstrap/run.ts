import createDebug from "debug";
import type { BootstrapLogger } from "@tracking-bootstrap/types";
import { readVariableSet, resolveVariableSource } from "@tracking-bootstrap/config";
import { createLogger, readTelemetryEnv } from "@tracking-bootstrap/telemetry";
import { BootstrapSelector, describeCommand } from "@tracking-bootstrap/core";
import type { SignalSource, SpawnFn } from "@tracking-bootstrap/core";
import { USAGE, parseArgs } from "./args";

const debug = createDebug("tracking:cli");

export interface OutputStream {
  write(chunk: string): unknown;
}

export type CliRuntime = {
  env?: NodeJS.ProcessEnv;
  stdout?: OutputStream;
  logger?: BootstrapLogger;
  spawn?: SpawnFn;
  signals?: SignalSource;
};

/**
 * Run the bootstrap for a full `process.argv`. Resolves with the exit code
 * for the bootstrap process: the server's own, or 0 for --help and --print.
 */
export async function runCli(argv: readonly string[], runtime: CliRuntime = {}): Promise<number> {
  const env = runtime.env ?? process.env;
  const stdout = runtime.stdout ?? process.stdout;

  const args = parseArgs(argv);
  if (args.help) {
    stdout.write(USAGE);
    return 0;
  }

  const logger = runtime.logger ?? createLogger(readTelemetryEnv(env));
  debug("runCli: varsFile=%s executable=%s print=%s", args.varsFile, args.executable, args.print);

  const source = resolveVariableSource({ varsFile: args.varsFile, env });
  const vars = await readVariableSet(source);
  logger.debug("configuration variables read", { source: source.description });

  const selector = new BootstrapSelector({
    executable: args.executable,
    env,
    spawn: runtime.spawn,
    signals: runtime.signals,
    logger,
  });

  if (args.print) {
    const command = describeCommand(selector.decide(vars));
    stdout.write(JSON.stringify(command, null, 2) + "\n");
    return 0;
  }

  const outcome = await selector.selectAndLaunch(vars);
  return outcome.exitCode;
}
