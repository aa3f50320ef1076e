import fs from "fs";
import { selectSource } from "../config/env.js";
import { ConnectorManager } from "../connectors/manager.js";
import type { SourceConfig } from "../types/config.js";
import type { LineWriter } from "../batch/report-emitter.js";

export interface StatusOptions {
  sources: SourceConfig[];
  sourceId?: string;
  write?: LineWriter;
}

/**
 * Show where the store lives, its size on disk and the row count of every table
 */
export async function showStatus(options: StatusOptions): Promise<void> {
  const write = options.write ?? ((line: string) => console.log(line));
  const source = selectSource(options.sources, options.sourceId);

  const manager = new ConnectorManager();
  await manager.connectWithSources([source]);

  try {
    const connector = manager.getConnector(source.id);
    write(`Database Status (source '${source.id}')`);
    write("=".repeat(50));

    const location = connector.getLocation();
    if (location) {
      write(`Database: ${location}`);
      write(`   Size: ${fs.statSync(location).size.toLocaleString("en-US")} bytes`);
    } else {
      write("Database: (in-memory)");
    }

    write("");
    write("Database Contents:");
    const counts = await connector.getTableRowCounts();
    if (counts.length === 0) {
      write("   (no tables)");
    }
    for (const { table_name, row_count } of counts) {
      write(`   ${table_name}: ${row_count.toLocaleString("en-US")} records`);
    }
  } finally {
    await manager.disconnect();
  }
}
