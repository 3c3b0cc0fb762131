export interface CliArgs {
  varsFile?: string;
  executable?: string;
  print: boolean;
  help: boolean;
}

export const USAGE = `Usage: tracking-server-bootstrap [options]

Starts the tracking server on 0.0.0.0:5000. When HOST is set the server uses
the MySQL database described by HOST, PORT, USERNAME, PASSWORD and DATABASE;
otherwise it keeps its default backend store. BUCKET is the artifact root.

Options:
  --vars-file <path>    read the variables from a JSON file instead of the environment
  --executable <path>   tracking-server executable (default: mlflow)
  --print               print the decided command as JSON and exit
  -h, --help            show this help
`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const VALUE_FLAGS = {
  "--vars-file": "varsFile",
  "--executable": "executable",
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(flag: string): flag is ValueFlag {
  return Object.hasOwn(VALUE_FLAGS, flag);
}

/** Parse `process.argv`; the node binary and script path are skipped. */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { print: false, help: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq !== -1 ? arg.slice(0, eq) : arg;

    if (isValueFlag(flag)) {
      let value: string | undefined;
      if (flag !== arg) {
        value = arg.slice(eq + 1);
      } else {
        value = argv[++i];
      }
      if (!value) {
        throw new CliUsageError(`Missing value for ${flag}`);
      }
      args[VALUE_FLAGS[flag]] = value;
    } else if (arg === "--print") {
      args.print = true;
    } else if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return args;
}
