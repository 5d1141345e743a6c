import { parseArgs } from "util";
import { resolveRCONConfig } from "./config";
import { errorMessage } from "./rcon/errors";
import { withRCONSession } from "./utils/connection";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export interface CLIIO {
  env: Record<string, string | undefined>;
  stdin: NodeJS.ReadableStream & { isTTY?: boolean };
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
}

export interface InterruptibleProcess {
  on(event: "SIGINT", listener: () => void): unknown;
  exit(code?: number): void;
}

export function exitOnInterrupt(proc: InterruptibleProcess): void {
  proc.on("SIGINT", () => {
    proc.exit(EXIT_INTERRUPTED);
  });
}

const USAGE = `Usage: srcon [options] [command...]

Send one command to a Source RCON server and print the response.
With no command words, the command is read from standard input.

Options:
  -H, --host <host>          Server host (env RCON_HOST, default localhost)
  -P, --port <port>          Server port (env RCON_PORT, default 25575)
  -p, --password <password>  RCON password (env RCON_PASSWORD, default test)
  -t, --timeout <seconds>    Connect and read timeout (default 10.0)
  -v, --verbose              Log protocol activity to stderr
  -h, --help                 Show this help
`;

function parseCLIArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      host: { type: "string", short: "H" },
      port: { type: "string", short: "P" },
      password: { type: "string", short: "p" },
      timeout: { type: "string", short: "t" },
      verbose: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" },
    },
  });
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function resolveCommand(positionals: string[], io: CLIIO): Promise<string> {
  if (positionals.length > 0) {
    return positionals.join(" ");
  }
  if (!io.stdin.isTTY) {
    return (await readStream(io.stdin)).trim();
  }
  return "";
}

/**
 * Runs one CLI invocation and returns the process exit code.
 */
export async function runCLI(argv: string[], io: CLIIO): Promise<number> {
  try {
    const { values, positionals } = parseCLIArgs(argv);
    if (values.help) {
      io.stdout.write(USAGE);
      return EXIT_OK;
    }

    const config = resolveRCONConfig(values, io.env);
    const command = await resolveCommand(positionals, io);
    if (!command) {
      io.stderr.write("Error: no command given\n");
      return EXIT_FAILURE;
    }

    const response = await withRCONSession(config, (client) => client.command(command));
    if (response) {
      io.stdout.write(`${response}\n`);
    }
    return EXIT_OK;
  } catch (error) {
    io.stderr.write(`Error: ${errorMessage(error)}\n`);
    return EXIT_FAILURE;
  }
}
