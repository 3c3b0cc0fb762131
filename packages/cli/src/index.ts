export { parseArgs, CliUsageError, USAGE } from "./bootstrap/args";
export type { CliArgs } from "./bootstrap/args";
export { runCli } from "./bootstrap/run";
export type { CliRuntime, OutputStream } from "./bootstrap/run";
