import type { DocumentReader } from "../documents/DocumentReader.js";
import type { AppLogger } from "../observability/logger.js";
import { resolveBootstrapPath } from "../config/settings.js";
import { IdentityResolver } from "../resolver/IdentityResolver.js";
import { showPaths } from "./commands/paths.js";
import { showIdentity } from "./commands/show.js";
import { showStatus } from "./commands/status.js";
import { printErrorLine, printLine, printLines } from "./output.js";

type Command = (resolver: IdentityResolver) => Promise<string[]>;

const COMMANDS: Record<string, Command> = {
  show: showIdentity,
  status: showStatus,
  paths: showPaths,
};

export type ParsedArgs = {
  command?: string;
  bootstrapPath?: string;
};

export type RunOptions = {
  logger?: AppLogger;
  reader?: DocumentReader;
  homeDir?: string;
};

export function usage(): void {
  printLine(
    `persona - resolve the assistant identity
Usage:
  persona show [--bootstrap <path>]     Print the resolved identity as JSON
  persona status [--bootstrap <path>]   Print the degradation level and failed tiers
  persona paths [--bootstrap <path>]    Print the system path table
`,
  );
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = {};
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--bootstrap") {
      const value = argv[index + 1];
      if (!value || value.startsWith("--")) {
        throw new Error("--bootstrap requires a path");
      }
      parsed.bootstrapPath = value;
      index += 1;
      continue;
    }
    if (arg.startsWith("--bootstrap=")) {
      const value = arg.slice("--bootstrap=".length);
      if (!value) {
        throw new Error("--bootstrap requires a path");
      }
      parsed.bootstrapPath = value;
      continue;
    }
    if (arg === "-h" || arg === "--help") {
      parsed.command = "help";
      continue;
    }
    if (arg.startsWith("-")) {
      throw new Error(`Unknown option: ${arg}`);
    }
    if (parsed.command === undefined) {
      parsed.command = arg;
      continue;
    }
    throw new Error(`Unexpected argument: ${arg}`);
  }
  return parsed;
}

/** Runs one CLI invocation and returns the process exit code. */
export async function run(argv: readonly string[], options: RunOptions = {}): Promise<number> {
  const parsed = parseArgs(argv);
  if (parsed.command === undefined || parsed.command === "help") {
    usage();
    return 0;
  }
  const command = COMMANDS[parsed.command];
  if (!command) {
    printErrorLine("Unknown command:", parsed.command);
    usage();
    return 1;
  }

  const resolver = new IdentityResolver({
    bootstrapPath: resolveBootstrapPath(parsed.bootstrapPath, options.homeDir),
    reader: options.reader,
    homeDir: options.homeDir,
    logger: options.logger,
  });
  printLines(await command(resolver));
  return 0;
}
