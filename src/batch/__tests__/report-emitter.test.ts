import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import { ReportEmitter, formatReportFile, truncate } from "../report-emitter.js";
import type { RunSummary } from "../types.js";

const summary: RunSummary = {
  entries: [
    {
      statement: { position: 1, text: "SELECT id, name FROM users;" },
      outcome: { kind: "rows", rowCount: 2, columnNames: ["id", "name"], preview: [[1, "Ada"], [2, "Bob"]] },
    },
    {
      statement: { position: 2, text: "SELEC 1;" },
      outcome: { kind: "failure", errorMessage: 'near "SELEC": syntax error' },
    },
    {
      statement: { position: 3, text: "DELETE FROM users;" },
      outcome: { kind: "no-rows" },
    },
  ],
  successCount: 2,
  failureCount: 1,
  totalCount: 3,
};

const emptySummary: RunSummary = { entries: [], successCount: 0, failureCount: 0, totalCount: 0 };

function createEmitter(verbose: boolean) {
  const lines: string[] = [];
  const emitter = new ReportEmitter({ verbose, write: (line) => lines.push(line) });
  return { emitter, lines };
}

describe("truncate", () => {
  it("should leave short text alone", () => {
    expect(truncate("abc", 3)).toBe("abc");
  });

  it("should cut long text and add an ellipsis", () => {
    expect(truncate("abcdef", 3)).toBe("abc...");
  });
});

describe("ReportEmitter", () => {
  describe("console report", () => {
    it("should render a compact report without verbose output", () => {
      const { emitter, lines } = createEmitter(false);

      emitter.emit("queries.sql", summary);

      expect(lines).toEqual([
        "Executing statements from queries.sql",
        "=".repeat(60),
        "Found 3 statement(s) to execute",
        "",
        "Statement 1:",
        "   OK: 2 row(s) returned",
        "",
        "Statement 2:",
        '   ERROR: near "SELEC": syntax error',
        "",
        "Statement 3:",
        "   OK: statement executed (no result set)",
        "",
        "Execution Summary",
        "=".repeat(40),
        "Successful: 2",
        "Failed: 1",
        "Total: 3",
      ]);
    });

    it("should show statement text and a preview table in verbose mode", () => {
      const { emitter, lines } = createEmitter(true);

      emitter.statement(summary.entries[0]);

      expect(lines).toEqual([
        "Statement 1:",
        "   SELECT id, name FROM users;",
        "   OK: 2 row(s)",
        "   ┌────┬──────┐",
        "   │ id │ name │",
        "   ├────┼──────┤",
        "   │ 1  │ Ada  │",
        "   │ 2  │ Bob  │",
        "   └────┴──────┘",
        "",
      ]);
    });

    it("should mention the rows left out of a cut preview", () => {
      const { emitter, lines } = createEmitter(true);

      emitter.statement({
        statement: { position: 4, text: "SELECT n FROM numbers;" },
        outcome: { kind: "rows", rowCount: 7, columnNames: ["n"], preview: [[1], [2], [3]] },
      });

      const tableRows = lines.filter((line) => /^ {3}│ \d/.test(line));
      expect(tableRows).toEqual(["   │ 1 │", "   │ 2 │", "   │ 3 │"]);
      expect(lines[lines.length - 2]).toBe("   ... and 4 more row(s)");
    });

    it("should skip the table for an empty result in verbose mode", () => {
      const { emitter, lines } = createEmitter(true);

      emitter.statement({
        statement: { position: 1, text: "SELECT id FROM empty;" },
        outcome: { kind: "rows", rowCount: 0, columnNames: ["id"], preview: [] },
      });

      expect(lines).toEqual(["Statement 1:", "   SELECT id FROM empty;", "   OK: 0 row(s)", ""]);
    });

    it("should truncate long statement text to 100 characters", () => {
      const { emitter, lines } = createEmitter(true);
      const text = `SELECT '${"a".repeat(120)}';`;

      emitter.statement({ statement: { position: 1, text }, outcome: { kind: "no-rows" } });

      expect(lines[1]).toBe(`   ${text.slice(0, 100)}...`);
    });

    it("should truncate long error messages to 200 characters", () => {
      const { emitter, lines } = createEmitter(false);
      const message = "e".repeat(250);

      emitter.statement({
        statement: { position: 1, text: "SELECT 1;" },
        outcome: { kind: "failure", errorMessage: message },
      });

      expect(lines[1]).toBe(`   ERROR: ${"e".repeat(200)}...`);
    });

    it("should print only the header and summary for an empty run", () => {
      const { emitter, lines } = createEmitter(true);

      emitter.emit("empty.sql", emptySummary);

      expect(lines).toEqual([
        "Executing statements from empty.sql",
        "=".repeat(60),
        "Found 0 statement(s) to execute",
        "",
        "Execution Summary",
        "=".repeat(40),
        "Successful: 0",
        "Failed: 0",
        "Total: 0",
      ]);
    });
  });

  describe("report file", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "sqlrunner-report-"));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should format one block per statement", () => {
      expect(formatReportFile(summary)).toBe(
        [
          "Statement Execution Results",
          "==============================",
          "",
          "Statement 1:",
          "SQL: SELECT id, name FROM users;",
          "Status: SUCCESS",
          "Results: 2 row(s)",
          "Columns: id, name",
          "----------------------------------------",
          "",
          "Statement 2:",
          "SQL: SELEC 1;",
          "Status: FAILED",
          'Error: near "SELEC": syntax error',
          "----------------------------------------",
          "",
          "Statement 3:",
          "SQL: DELETE FROM users;",
          "Status: SUCCESS",
          "Results: no result set",
          "----------------------------------------",
          "",
        ].join("\n")
      );
    });

    it("should write the report and confirm the path", () => {
      const { emitter, lines } = createEmitter(false);
      const outputPath = path.join(tempDir, "results.txt");

      expect(emitter.writeReportFile(summary, outputPath)).toBe(true);

      expect(fs.readFileSync(outputPath, "utf-8")).toBe(formatReportFile(summary));
      expect(lines).toEqual(["", `Results saved to: ${outputPath}`]);
    });

    it("should report a write error without throwing", () => {
      const { emitter, lines } = createEmitter(false);
      const outputPath = path.join(tempDir, "missing-dir", "results.txt");

      expect(emitter.writeReportFile(summary, outputPath)).toBe(false);

      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatch(/^Error saving results: ENOENT: no such file or directory/);
      expect(fs.existsSync(outputPath)).toBe(false);
    });
  });
});
