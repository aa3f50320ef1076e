import fs from "fs";
import path from "path";
import { homedir } from "os";
import toml from "@iarna/toml";
import { z } from "zod";
import type { SourceConfig, TomlConfig } from "../types/config.js";

export const DEFAULT_CONFIG_FILE = "sqlrunner.toml";

const sourceConfigSchema = z.object({
  id: z.string({ required_error: "each source must have an 'id' field" }).min(1),
  dsn: z.string().min(1).optional(),
  type: z
    .literal("sqlite", { errorMap: () => ({ message: "invalid type. Valid types: sqlite" }) })
    .optional(),
  database: z.string().min(1).optional(),
  readonly: z.boolean().optional(),
  connection_timeout: z
    .number()
    .positive("connection_timeout must be a positive number of seconds")
    .optional(),
});

const tomlConfigSchema = z.object({
  sources: z
    .array(sourceConfigSchema, {
      required_error: "must contain a [[sources]] array",
      invalid_type_error: "'sources' must be an array. Use [[sources]] syntax for array of tables in TOML.",
    })
    .min(1, "sources array cannot be empty. Please define at least one source with [[sources]]."),
  run: z
    .object({
      script: z.string().min(1).optional(),
      source: z.string().min(1).optional(),
    })
    .optional(),
});

/**
 * Load and parse TOML configuration file
 * Returns the parsed configuration and the name of the file it came from
 */
export function loadTomlConfig(
  configFlag?: string
): { config: TomlConfig; source: string } | null {
  const configPath = resolveTomlConfigPath(configFlag);
  if (!configPath) {
    return null;
  }

  try {
    const fileContent = fs.readFileSync(configPath, "utf-8");
    const config = validateTomlConfig(toml.parse(fileContent), configPath);

    return {
      config: { ...config, sources: processSourceConfigs(config.sources) },
      source: path.basename(configPath),
    };
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(
        `Failed to load TOML configuration from ${configPath}: ${error.message}`
      );
    }
    throw error;
  }
}

/**
 * Resolve the path to the TOML configuration file
 * Priority: --config flag > ./sqlrunner.toml
 */
function resolveTomlConfigPath(configFlag?: string): string | null {
  if (configFlag) {
    const configPath = expandHomeDir(configFlag);
    if (!fs.existsSync(configPath)) {
      throw new Error(
        `Configuration file specified by --config flag not found: ${configPath}`
      );
    }
    return configPath;
  }

  const defaultConfigPath = path.join(process.cwd(), DEFAULT_CONFIG_FILE);
  if (fs.existsSync(defaultConfigPath)) {
    return defaultConfigPath;
  }

  return null;
}

/**
 * Validate the structure of the parsed TOML configuration
 */
function validateTomlConfig(parsed: unknown, configPath: string): TomlConfig {
  const result = tomlConfigSchema.safeParse(parsed);
  if (!result.success) {
    const problems = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new Error(`Configuration file ${configPath}: ${problems.join("; ")}`);
  }

  const config = result.data;

  // Check for duplicate IDs
  const ids = new Set<string>();
  const duplicates: string[] = [];
  for (const source of config.sources) {
    if (ids.has(source.id)) {
      duplicates.push(source.id);
    } else {
      ids.add(source.id);
    }
  }

  if (duplicates.length > 0) {
    throw new Error(
      `Configuration file ${configPath}: duplicate source IDs found: ${duplicates.join(", ")}. ` +
        `Each source must have a unique 'id' field.`
    );
  }

  for (const source of config.sources) {
    if (!source.dsn && !(source.type && source.database)) {
      throw new Error(
        `Configuration file ${configPath}: source '${source.id}' must have either:\n` +
          `  - 'dsn' field (e.g., dsn = "sqlite:///./database.db")\n` +
          `  - OR type = "sqlite" and a 'database' path`
      );
    }
  }

  if (config.run?.source && !ids.has(config.run.source)) {
    throw new Error(
      `Configuration file ${configPath}: [run] source '${config.run.source}' is not defined. ` +
        `Available sources: ${[...ids].join(", ")}`
    );
  }

  return config;
}

/**
 * Process source configurations (expand paths, etc.)
 */
function processSourceConfigs(sources: SourceConfig[]): SourceConfig[] {
  return sources.map((source) => {
    const processed = { ...source };

    if (processed.database) {
      processed.database = expandHomeDir(processed.database);
    }

    return processed;
  });
}

/**
 * Expand ~ to home directory in paths
 */
export function expandHomeDir(filePath: string): string {
  if (filePath.startsWith("~/")) {
    return path.join(homedir(), filePath.substring(2));
  }
  return filePath;
}

/**
 * Build DSN from source connection parameters
 */
export function buildDSNFromSource(source: SourceConfig): string {
  // If DSN is already provided, use it
  if (source.dsn) {
    return source.dsn;
  }

  if (!source.type) {
    throw new Error(
      `Source '${source.id}': 'type' field is required when 'dsn' is not provided`
    );
  }

  if (!source.database) {
    throw new Error(`Source '${source.id}': 'database' field is required for SQLite`);
  }

  const database = expandHomeDir(source.database);
  if (database === ":memory:") {
    return "sqlite:///:memory:";
  }
  if (path.isAbsolute(database)) {
    return `sqlite://${database}`;
  }
  return `sqlite:///./${database.replace(/^\.\//, "")}`;
}
