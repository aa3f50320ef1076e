/**
 * Configuration types for the TOML-based setup
 */

/**
 * Database connection parameters (alternative to DSN)
 */
export interface ConnectionParams {
  type?: "sqlite";
  database?: string;
}

/**
 * Source configuration from [[sources]] array in TOML
 */
export interface SourceConfig extends ConnectionParams {
  id: string;
  dsn?: string;
  readonly?: boolean;
  connection_timeout?: number; // Busy timeout in seconds
}

/**
 * Settings for the run-all command from the [run] table
 */
export interface RunConfig {
  script?: string;
  source?: string;
}

/**
 * Complete TOML configuration file structure
 */
export interface TomlConfig {
  sources: SourceConfig[];
  run?: RunConfig;
}
