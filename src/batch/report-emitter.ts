import fs from "fs";
import { generateGridTable } from "../utils/grid-table.js";
import { getErrorMessage } from "../utils/errors.js";
import type { Outcome, RunSummary, StatementOutcome } from "./types.js";

export type LineWriter = (line: string) => void;

export interface ReportOptions {
  verbose: boolean;
  /** Defaults to console.log */
  write?: LineWriter;
}

export const STATEMENT_TEXT_LIMIT = 100;
export const ERROR_TEXT_LIMIT = 200;

const INDENT = "   ";
const HEADER_RULE = "=".repeat(60);
const SUMMARY_RULE = "=".repeat(40);
const FILE_HEADER_RULE = "=".repeat(30);
const FILE_DELIMITER = "-".repeat(40);

export function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

/**
 * Console report for a batch run. Statements can be reported one at a time
 * while the run is in progress, or all at once from a finalized summary.
 */
export class ReportEmitter {
  private readonly verbose: boolean;
  private readonly write: LineWriter;

  constructor(options: ReportOptions) {
    this.verbose = options.verbose;
    this.write = options.write ?? ((line) => console.log(line));
  }

  begin(scriptName: string, statementCount: number): void {
    this.write(`Executing statements from ${scriptName}`);
    this.write(HEADER_RULE);
    this.write(`Found ${statementCount} statement(s) to execute`);
    this.write("");
  }

  statement({ statement, outcome }: StatementOutcome): void {
    this.write(`Statement ${statement.position}:`);
    if (this.verbose) {
      this.write(`${INDENT}${truncate(statement.text, STATEMENT_TEXT_LIMIT)}`);
    }
    for (const line of this.describeOutcome(outcome)) {
      this.write(line);
    }
    this.write("");
  }

  summary(summary: RunSummary): void {
    this.write("Execution Summary");
    this.write(SUMMARY_RULE);
    this.write(`Successful: ${summary.successCount}`);
    this.write(`Failed: ${summary.failureCount}`);
    this.write(`Total: ${summary.totalCount}`);
  }

  /**
   * Full report from a finalized summary
   */
  emit(scriptName: string, summary: RunSummary): void {
    this.begin(scriptName, summary.totalCount);
    for (const entry of summary.entries) {
      this.statement(entry);
    }
    this.summary(summary);
  }

  /**
   * Persist the summary to a file. A write failure is reported and swallowed
   * so it never changes the outcome of the run.
   */
  writeReportFile(summary: RunSummary, outputPath: string): boolean {
    try {
      fs.writeFileSync(outputPath, formatReportFile(summary), "utf-8");
    } catch (error) {
      this.write(`Error saving results: ${getErrorMessage(error)}`);
      return false;
    }
    this.write("");
    this.write(`Results saved to: ${outputPath}`);
    return true;
  }

  private describeOutcome(outcome: Outcome): string[] {
    switch (outcome.kind) {
      case "rows":
        return this.describeRows(outcome.rowCount, outcome.columnNames, outcome.preview);
      case "no-rows":
        return [`${INDENT}OK: statement executed (no result set)`];
      case "failure":
        return [`${INDENT}ERROR: ${truncate(outcome.errorMessage, ERROR_TEXT_LIMIT)}`];
    }
  }

  private describeRows(
    rowCount: number,
    columnNames: readonly string[],
    preview: readonly (readonly unknown[])[]
  ): string[] {
    if (!this.verbose) {
      return [`${INDENT}OK: ${rowCount} row(s) returned`];
    }

    const lines = [`${INDENT}OK: ${rowCount} row(s)`];
    if (preview.length > 0) {
      const table = generateGridTable(columnNames, preview);
      lines.push(...table.split("\n").map((line) => `${INDENT}${line}`));
    }
    if (rowCount > preview.length) {
      lines.push(`${INDENT}... and ${rowCount - preview.length} more row(s)`);
    }
    return lines;
  }
}

/**
 * Plain-text report, one block per statement
 */
export function formatReportFile(summary: RunSummary): string {
  const lines = ["Statement Execution Results", FILE_HEADER_RULE, ""];

  for (const { statement, outcome } of summary.entries) {
    lines.push(`Statement ${statement.position}:`);
    lines.push(`SQL: ${truncate(statement.text, STATEMENT_TEXT_LIMIT)}`);
    lines.push(`Status: ${outcome.kind === "failure" ? "FAILED" : "SUCCESS"}`);

    switch (outcome.kind) {
      case "rows":
        lines.push(`Results: ${outcome.rowCount} row(s)`);
        if (outcome.columnNames.length > 0) {
          lines.push(`Columns: ${outcome.columnNames.join(", ")}`);
        }
        break;
      case "no-rows":
        lines.push("Results: no result set");
        break;
      case "failure":
        lines.push(`Error: ${outcome.errorMessage}`);
        break;
    }

    lines.push(FILE_DELIMITER, "");
  }

  return lines.join("\n");
}
