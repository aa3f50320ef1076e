import Database from "better-sqlite3";
import path from "path";
import { homedir } from "os";
import {
  Connector,
  ConnectorConfig,
  ConnectorRegistry,
  DSNParser,
  NoResultSetError,
  SQLCursor,
  TableRowCount,
} from "../interface.js";

const MEMORY_DATABASE = ":memory:";
const DSN_PREFIX = "sqlite://";

/**
 * SQLite DSN Parser
 * Format: sqlite:///path/to/database.db
 * Examples:
 *   sqlite:///:memory:
 *   sqlite:///var/lib/app/data.db   (absolute)
 *   sqlite:///./data.db             (relative to the working directory)
 *   sqlite:///~/data.db             (relative to the home directory)
 */
export class SQLiteDSNParser implements DSNParser {
  parse(dsn: string): { filename: string } {
    if (!this.isValidDSN(dsn)) {
      throw new Error(
        `Invalid SQLite DSN format: ${dsn}. Expected format: ${this.getSampleDSN()}`
      );
    }

    const location = dsn.substring(DSN_PREFIX.length);

    if (location === `/${MEMORY_DATABASE}`) {
      return { filename: MEMORY_DATABASE };
    }
    if (location.startsWith("/~/")) {
      return { filename: path.join(homedir(), location.substring(3)) };
    }
    if (location.startsWith("/./") || location.startsWith("/../")) {
      return { filename: location.substring(1) };
    }
    if (location.length <= 1) {
      throw new Error(`SQLite DSN is missing a database path: ${dsn}`);
    }

    return { filename: location };
  }

  getSampleDSN(): string {
    return "sqlite:///path/to/database.db";
  }

  isValidDSN(dsn: string): boolean {
    return dsn.startsWith(`${DSN_PREFIX}/`);
  }
}

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Integers are read as BigInt and narrowed back to numbers when that loses
 * nothing, so only values beyond 2^53 stay BigInt.
 */
function* toSafeNumbers(rows: IterableIterator<unknown[]>): IterableIterator<unknown[]> {
  for (const row of rows) {
    yield row.map((value) =>
      typeof value === "bigint" && value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value
    );
  }
}

/**
 * SQLite Connector Implementation
 * Executes one statement per call; readers are fetched lazily so large
 * result sets can be consumed row by row.
 */
export class SQLiteConnector implements Connector {
  id = "sqlite" as const;
  name = "SQLite";
  dsnParser = new SQLiteDSNParser();
  private db: Database.Database | null = null;
  private filename: string | null = null;
  private sourceId: string = "default";

  getId(): string {
    return this.sourceId;
  }

  clone(): Connector {
    return new SQLiteConnector();
  }

  async connect(dsn: string, config?: ConnectorConfig): Promise<void> {
    const { filename } = this.dsnParser.parse(dsn);
    if (config?.sourceId) {
      this.sourceId = config.sourceId;
    }

    const options: Database.Options = {
      readonly: config?.readonly ?? false,
      // A missing file means a missing store, not an empty one
      fileMustExist: filename !== MEMORY_DATABASE,
    };
    if (config?.connectionTimeoutSeconds !== undefined) {
      options.timeout = config.connectionTimeoutSeconds * 1000;
    }

    try {
      this.db = new Database(filename, options);
      this.filename = filename;
    } catch (error) {
      console.error(`Failed to open SQLite database '${filename}':`, error);
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  async execute(sql: string): Promise<SQLCursor> {
    const db = this.getConnection();
    const statement = db.prepare<unknown[], unknown[]>(sql);

    if (statement.reader) {
      const columns = statement.columns().map((column) => column.name);
      return {
        columns,
        rows: () => toSafeNumbers(statement.safeIntegers(true).raw(true).iterate()),
      };
    }

    statement.run();
    return {
      columns: [],
      rows: () => {
        throw new NoResultSetError();
      },
    };
  }

  async getTableRowCounts(): Promise<TableRowCount[]> {
    const db = this.getConnection();
    const tables = db
      .prepare<[], { name: string }>(
        `SELECT name FROM sqlite_master
         WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
         ORDER BY name`
      )
      .all();

    return tables.map(({ name }) => {
      const quoted = `"${name.replace(/"/g, '""')}"`;
      const row = db
        .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${quoted}`)
        .get();
      return { table_name: name, row_count: row?.count ?? 0 };
    });
  }

  getLocation(): string | null {
    if (!this.filename || this.filename === MEMORY_DATABASE) {
      return null;
    }
    return path.resolve(this.filename);
  }

  private getConnection(): Database.Database {
    if (!this.db) {
      throw new Error("Not connected to database");
    }
    return this.db;
  }
}

// Create and register the connector
const sqliteConnector = new SQLiteConnector();
ConnectorRegistry.register(sqliteConnector);
