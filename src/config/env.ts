import type { SourceConfig } from "../types/config.js";
import { UsageError } from "../utils/errors.js";
import { loadTomlConfig } from "./toml-loader.js";

export const DEFAULT_DSN = "sqlite:///./database.db";
export const DEFAULT_SCRIPT_FILE = "queries.sql";

/** Short command line aliases */
const SHORT_FLAGS: Record<string, string> = {
  o: "output-file",
  v: "verbose",
  h: "help",
};

/** Flags that never take a value */
const BOOLEAN_FLAGS = new Set(["verbose", "help", "version"]);

export interface ParsedArgs {
  positionals: string[];
  /** Flag values; `true` for flags given without a value */
  flags: Record<string, string | true>;
}

/**
 * Parse command line arguments.
 * Supports --key=value, --key value, -k value and boolean flags.
 */
export function parseCommandLineArgs(argv: string[] = process.argv.slice(2)): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, string | true> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    let key: string;
    let inlineValue: string | undefined;
    if (arg.startsWith("--")) {
      const body = arg.substring(2);
      const eq = body.indexOf("=");
      key = eq >= 0 ? body.substring(0, eq) : body;
      inlineValue = eq >= 0 ? body.substring(eq + 1) : undefined;
    } else if (arg.startsWith("-") && arg.length > 1) {
      const short = arg.substring(1);
      key = SHORT_FLAGS[short] ?? short;
    } else {
      positionals.push(arg);
      continue;
    }

    if (inlineValue !== undefined) {
      flags[key] = inlineValue;
    } else if (BOOLEAN_FLAGS.has(key)) {
      flags[key] = true;
    } else {
      const nextArg = argv[i + 1];
      if (nextArg !== undefined && !nextArg.startsWith("-")) {
        flags[key] = nextArg;
        i++;
      } else {
        flags[key] = true;
      }
    }
  }

  return { positionals, flags };
}

/**
 * Value of a flag that requires one
 * @throws UsageError when the flag was given without a value
 */
export function getStringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags[name];
  if (value === true) {
    throw new UsageError(`Option '--${name}' requires a value`);
  }
  return value;
}

export function isFlagSet(args: ParsedArgs, name: string): boolean {
  return args.flags[name] !== undefined;
}

export interface ResolvedConfig {
  sources: SourceConfig[];
  /** Where the source list came from, for display */
  source: string;
  scriptPath: string;
  /** Source used by run-all; the first source when unset */
  runSourceId?: string;
}

/**
 * Resolve the database sources and the script to run.
 * DSN priority: --dsn flag > DSN environment variable > TOML config > default.
 * Script priority: SCRIPT_FILE environment variable > [run] script > ./queries.sql.
 */
export function resolveConfig(args: ParsedArgs): ResolvedConfig {
  const tomlConfig = loadTomlConfig(getStringFlag(args, "config"));
  const dsnFlag = getStringFlag(args, "dsn");
  const scriptPath =
    process.env.SCRIPT_FILE || tomlConfig?.config.run?.script || DEFAULT_SCRIPT_FILE;

  if (dsnFlag) {
    return {
      sources: [{ id: "default", dsn: dsnFlag }],
      source: "command line argument",
      scriptPath,
    };
  }

  if (process.env.DSN) {
    return {
      sources: [{ id: "default", dsn: process.env.DSN }],
      source: "environment variable",
      scriptPath,
    };
  }

  if (tomlConfig) {
    return {
      sources: tomlConfig.config.sources,
      source: tomlConfig.source,
      scriptPath,
      runSourceId: tomlConfig.config.run?.source,
    };
  }

  return {
    sources: [{ id: "default", dsn: DEFAULT_DSN }],
    source: "default",
    scriptPath,
  };
}

/**
 * Pick a configured source by ID, or the first one
 */
export function selectSource(sources: SourceConfig[], sourceId?: string): SourceConfig {
  const source = sourceId ? sources.find((s) => s.id === sourceId) : sources[0];
  if (!source) {
    throw new Error(
      sourceId
        ? `Source '${sourceId}' not found. Available sources: ${sources.map((s) => s.id).join(", ")}`
        : "No sources configured"
    );
  }
  return source;
}
