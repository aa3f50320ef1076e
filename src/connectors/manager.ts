import { Connector, ConnectorType, ConnectorRegistry, ConnectorConfig } from "./interface.js";
import type { SourceConfig } from "../types/config.js";
import { buildDSNFromSource } from "../config/toml-loader.js";
import { StoreConnectionError, getErrorMessage } from "../utils/errors.js";

/**
 * Manages database connectors and provides a unified interface to work with them.
 * Instances are passed explicitly to whoever needs a connection; there is no
 * process-wide connection state.
 */
export class ConnectorManager {
  private connectors: Map<string, Connector> = new Map();
  private sourceIds: string[] = []; // Ordered list of source IDs (first is default)

  /**
   * Initialize and connect to databases using source configurations
   */
  async connectWithSources(sources: SourceConfig[]): Promise<void> {
    if (sources.length === 0) {
      throw new Error("No sources provided");
    }

    try {
      for (const source of sources) {
        await this.connectSource(source);
      }
    } catch (error) {
      // Release whatever was opened before the failing source
      await this.disconnect();
      throw error;
    }

    console.error(`Successfully connected to ${sources.length} database source(s)`);
  }

  /**
   * Connect to a single source (helper for connectWithSources)
   */
  private async connectSource(source: SourceConfig): Promise<void> {
    const sourceId = source.id;
    console.error(`Connecting to source '${sourceId || "(default)"}' ...`);

    let dsn: string;
    try {
      dsn = buildDSNFromSource(source);
    } catch (error) {
      throw new StoreConnectionError(sourceId, getErrorMessage(error));
    }

    const connectorPrototype = ConnectorRegistry.getConnectorForDSN(dsn);
    if (!connectorPrototype) {
      throw new StoreConnectionError(
        sourceId,
        `Source '${sourceId}': No connector found for DSN: ${dsn}`
      );
    }

    // Create a new instance of the connector (clone) to avoid sharing state between sources
    const connector = connectorPrototype.clone();

    const config: ConnectorConfig = { sourceId };
    if (source.connection_timeout !== undefined) {
      config.connectionTimeoutSeconds = source.connection_timeout;
    }
    if (source.readonly !== undefined) {
      config.readonly = source.readonly;
    }

    try {
      await connector.connect(dsn, config);
    } catch (error) {
      throw new StoreConnectionError(
        sourceId,
        `Source '${sourceId}': unable to open database: ${getErrorMessage(error)}`
      );
    }

    this.connectors.set(sourceId, connector);
    this.sourceIds.push(sourceId);

    console.error(`  Connected successfully`);
  }

  /**
   * Close all database connections
   */
  async disconnect(): Promise<void> {
    for (const [sourceId, connector] of this.connectors.entries()) {
      try {
        await connector.disconnect();
        console.error(`Disconnected from source '${sourceId || "(default)"}'`);
      } catch (error) {
        console.error(`Error disconnecting from source '${sourceId}':`, error);
      }
    }

    this.connectors.clear();
    this.sourceIds = [];
  }

  /**
   * Get a connector by source ID
   * If sourceId is not provided, returns the default (first) connector
   */
  getConnector(sourceId?: string): Connector {
    const id = sourceId || this.sourceIds[0];
    const connector = this.connectors.get(id);

    if (!connector) {
      if (sourceId) {
        throw new Error(
          `Source '${sourceId}' not found. Available sources: ${this.sourceIds.join(", ")}`
        );
      } else {
        throw new Error("No sources connected. Call connectWithSources() first.");
      }
    }

    return connector;
  }

  /**
   * Get all available source IDs
   */
  getSourceIds(): string[] {
    return [...this.sourceIds];
  }

  /**
   * Get sample DSNs for all available connectors
   */
  static getAllSampleDSNs(): { [key in ConnectorType]?: string } {
    return ConnectorRegistry.getAllSampleDSNs();
  }
}
