/**
 * Supported database types
 */
export type ConnectorType = "sqlite";

/**
 * Thrown by a cursor when its statement produced no result set to fetch
 * (writes, DDL). Callers treat it as a successful statement without rows.
 */
export class NoResultSetError extends Error {
  constructor(message = "Statement does not return a result set") {
    super(message);
    this.name = "NoResultSetError";
  }
}

/**
 * Handle on one executed statement
 */
export interface SQLCursor {
  /** Ordered column names; empty when there is no result set */
  readonly columns: string[];
  /**
   * Iterate result rows as positional value arrays.
   * Throws NoResultSetError when the statement has no result set.
   */
  rows(): IterableIterator<unknown[]>;
}

/**
 * Connector-specific options
 */
export interface ConnectorConfig {
  sourceId?: string;
  connectionTimeoutSeconds?: number;
  readonly?: boolean;
}

/**
 * Row count of a single table, as reported by the status command
 */
export interface TableRowCount {
  table_name: string;
  row_count: number;
}

export interface DSNParser {
  /**
   * Parse a connection string into the connector's native open arguments
   */
  parse(dsn: string): { filename: string };

  /**
   * Example DSN shown in help output
   */
  getSampleDSN(): string;

  isValidDSN(dsn: string): boolean;
}

export interface Connector {
  /** Connector type, matches the DSN protocol */
  id: ConnectorType;

  /** Display name */
  name: string;

  dsnParser: DSNParser;

  /** Source ID this instance is bound to */
  getId(): string;

  /** Fresh, unconnected instance of the same connector */
  clone(): Connector;

  connect(dsn: string, config?: ConnectorConfig): Promise<void>;

  disconnect(): Promise<void>;

  /**
   * Execute exactly one statement.
   * Throws on execution errors (syntax, constraints, read-only violations).
   */
  execute(sql: string): Promise<SQLCursor>;

  getTableRowCounts(): Promise<TableRowCount[]>;

  /** Path of the backing file, or null for in-memory stores */
  getLocation(): string | null;
}

/**
 * Registry of available connectors
 */
export class ConnectorRegistry {
  private static connectors: Map<ConnectorType, Connector> = new Map();

  static register(connector: Connector): void {
    ConnectorRegistry.connectors.set(connector.id, connector);
  }

  static getConnectorForDSN(dsn: string): Connector | null {
    for (const connector of ConnectorRegistry.connectors.values()) {
      if (connector.dsnParser.isValidDSN(dsn)) {
        return connector;
      }
    }
    return null;
  }

  static getAllSampleDSNs(): { [key in ConnectorType]?: string } {
    const samples: { [key in ConnectorType]?: string } = {};
    for (const [id, connector] of ConnectorRegistry.connectors.entries()) {
      samples[id] = connector.dsnParser.getSampleDSN();
    }
    return samples;
  }
}
