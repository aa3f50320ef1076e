import path from "path";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";

// Register connectors
import "./connectors/sqlite/index.js";

import { runAll } from "./batch/runner.js";
import type { LineWriter } from "./batch/report-emitter.js";
import { showStatus } from "./commands/status.js";
import { DEFAULT_DSN, getStringFlag, isFlagSet, parseCommandLineArgs, resolveConfig } from "./config/env.js";
import type { ParsedArgs } from "./config/env.js";
import { DEFAULT_CONFIG_FILE } from "./config/toml-loader.js";
import { ConnectorManager } from "./connectors/manager.js";
import { startMcpServer } from "./server.js";
import { ScriptReadError, StoreConnectionError, UsageError } from "./utils/errors.js";

// Create __dirname equivalent for ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const packageJsonSchema = z.object({ version: z.string() });

/**
 * Version from package.json, one level above both src/ and dist/
 */
export function readVersion(): string {
  const packageJsonPath = path.join(__dirname, "..", "package.json");
  return packageJsonSchema.parse(JSON.parse(readFileSync(packageJsonPath, "utf8"))).version;
}

const GLOBAL_FLAGS = ["config", "dsn", "help", "version"];

/** Options each command accepts besides the global ones */
const COMMAND_FLAGS: Record<string, string[]> = {
  "run-all": ["output-file", "verbose"],
  status: [],
  mcp: [],
};

export function usage(): string {
  const samples = Object.values(ConnectorManager.getAllSampleDSNs()).join(", ");
  return `Usage: sqlrunner [--config <path>] [--dsn <dsn>] <command> [options]

Commands:
  run-all     Execute every statement of the script file, in order
                -o, --output-file <path>   Save results to a file
                -v, --verbose              Show statement text and result previews
  status      Show database location, size and table row counts
  mcp         Serve the run_script tool over MCP (stdio)

Configuration:
  --config <path>   TOML configuration file (default: ./${DEFAULT_CONFIG_FILE})
  --dsn <dsn>       Database connection string (default: ${DEFAULT_DSN})
  DSN               Environment variable, used when --dsn is not given
  SCRIPT_FILE       Environment variable naming the script (default: queries.sql)

Example DSN formats: ${samples}`;
}

function validateArgs(args: ParsedArgs): string {
  const [command, ...extra] = args.positionals;
  if (!Object.hasOwn(COMMAND_FLAGS, command)) {
    throw new UsageError(`Unknown command '${command}'`);
  }
  const allowed = COMMAND_FLAGS[command];
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument '${extra[0]}'`);
  }

  for (const flag of Object.keys(args.flags)) {
    if (!GLOBAL_FLAGS.includes(flag) && !allowed.includes(flag)) {
      throw new UsageError(`Unknown option '--${flag}' for command '${command}'`);
    }
  }

  return command;
}

/**
 * Run the command line. Resolves to the process exit code:
 * 0 when the command completed (whatever individual statements did),
 * 1 when it could not start (missing script, unreachable store, bad config),
 * 2 on a usage error.
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  write: LineWriter = (line) => console.log(line)
): Promise<number> {
  try {
    const args = parseCommandLineArgs(argv);

    if (isFlagSet(args, "version")) {
      write(readVersion());
      return 0;
    }
    if (isFlagSet(args, "help") || args.positionals.length === 0) {
      write(usage());
      return isFlagSet(args, "help") ? 0 : 2;
    }

    const command = validateArgs(args);
    const config = resolveConfig(args);
    console.error(`Configuration source: ${config.source}`);

    switch (command) {
      case "run-all":
        await runAll({
          scriptPath: config.scriptPath,
          sources: config.sources,
          sourceId: config.runSourceId,
          outputFile: getStringFlag(args, "output-file"),
          verbose: isFlagSet(args, "verbose"),
          write,
        });
        return 0;
      case "status":
        await showStatus({ sources: config.sources, sourceId: config.runSourceId, write });
        return 0;
      case "mcp":
        await startMcpServer(config.sources, readVersion());
        return 0;
      default:
        throw new UsageError(`Unknown command '${command}'`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}\n`);
      console.error(usage());
      return 2;
    }
    if (error instanceof ScriptReadError || error instanceof StoreConnectionError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    console.error("Fatal error:", error);
    return 1;
  }
}
