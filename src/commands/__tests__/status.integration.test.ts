import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import "../../connectors/sqlite/index.js";
import { showStatus } from "../status.js";
import { SQLiteConnector } from "../../connectors/sqlite/index.js";
import { StoreConnectionError } from "../../utils/errors.js";

describe("status command", () => {
  let tempDir: string;
  let dbPath: string;
  let lines: string[];

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "sqlrunner-status-"));
    dbPath = path.join(tempDir, "app.db");
    fs.writeFileSync(dbPath, "");
    lines = [];
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should list tables with their row counts", async () => {
    const setup = new SQLiteConnector();
    await setup.connect(`sqlite://${dbPath}`);
    await setup.execute("CREATE TABLE orders (id INTEGER)");
    await setup.execute("CREATE TABLE customers (id INTEGER)");
    await setup.execute("INSERT INTO customers VALUES (1), (2), (3)");
    await setup.disconnect();
    const size = fs.statSync(dbPath).size.toLocaleString("en-US");

    await showStatus({ sources: [{ id: "app", dsn: `sqlite://${dbPath}` }], write: (l) => lines.push(l) });

    expect(lines).toEqual([
      "Database Status (source 'app')",
      "=".repeat(50),
      `Database: ${dbPath}`,
      `   Size: ${size} bytes`,
      "",
      "Database Contents:",
      "   customers: 3 records",
      "   orders: 0 records",
    ]);
  });

  it("should say when there are no tables", async () => {
    await showStatus({ sources: [{ id: "app", dsn: `sqlite://${dbPath}` }], write: (l) => lines.push(l) });

    expect(lines.slice(2)).toEqual([
      `Database: ${dbPath}`,
      "   Size: 0 bytes",
      "",
      "Database Contents:",
      "   (no tables)",
    ]);
  });

  it("should describe an in-memory store", async () => {
    await showStatus({
      sources: [
        { id: "file", dsn: `sqlite://${dbPath}` },
        { id: "mem", dsn: "sqlite:///:memory:" },
      ],
      sourceId: "mem",
      write: (l) => lines.push(l),
    });

    expect(lines).toEqual([
      "Database Status (source 'mem')",
      "=".repeat(50),
      "Database: (in-memory)",
      "",
      "Database Contents:",
      "   (no tables)",
    ]);
  });

  it("should fail when the database file is missing", async () => {
    const missing = path.join(tempDir, "missing.db");

    await expect(
      showStatus({ sources: [{ id: "gone", dsn: `sqlite://${missing}` }], write: (l) => lines.push(l) })
    ).rejects.toBeInstanceOf(StoreConnectionError);
    expect(lines).toEqual([]);
  });
});
