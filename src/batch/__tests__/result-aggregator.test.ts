import { describe, it, expect } from "vitest";
import { ResultAggregator } from "../result-aggregator.js";
import type { Outcome } from "../types.js";

const rows: Outcome = { kind: "rows", rowCount: 1, columnNames: ["a"], preview: [[1]] };
const noRows: Outcome = { kind: "no-rows" };
const failure: Outcome = { kind: "failure", errorMessage: "boom" };

describe("ResultAggregator", () => {
  it("should keep entries in recording order and count outcomes", () => {
    const aggregator = new ResultAggregator();
    aggregator.record({ position: 1, text: "SELECT 1;" }, rows);
    aggregator.record({ position: 2, text: "SELEC 2;" }, failure);
    aggregator.record({ position: 3, text: "DELETE FROM t;" }, noRows);

    const summary = aggregator.finalize();

    expect(summary.entries.map((e) => e.statement.position)).toEqual([1, 2, 3]);
    expect(summary.entries.map((e) => e.outcome)).toEqual([rows, failure, noRows]);
    expect(summary.successCount).toBe(2);
    expect(summary.failureCount).toBe(1);
    expect(summary.totalCount).toBe(3);
  });

  it("should produce an empty summary when nothing was recorded", () => {
    expect(new ResultAggregator().finalize()).toEqual({
      entries: [],
      successCount: 0,
      failureCount: 0,
      totalCount: 0,
    });
  });

  it("should freeze the finalized summary", () => {
    const aggregator = new ResultAggregator();
    aggregator.record({ position: 1, text: "SELECT 1;" }, rows);

    const summary = aggregator.finalize();

    expect(Object.isFrozen(summary)).toBe(true);
    expect(Object.isFrozen(summary.entries)).toBe(true);
    expect(Object.isFrozen(summary.entries[0])).toBe(true);
  });

  it("should return the same summary from repeated finalize calls", () => {
    const aggregator = new ResultAggregator();
    expect(aggregator.finalize()).toBe(aggregator.finalize());
  });

  it("should reject outcomes recorded after finalization", () => {
    const aggregator = new ResultAggregator();
    aggregator.finalize();

    expect(() => aggregator.record({ position: 1, text: "SELECT 1;" }, rows)).toThrow(
      "Cannot record an outcome after the run summary was finalized"
    );
  });

  it("should always have successes plus failures equal to the total", () => {
    const aggregator = new ResultAggregator();
    const outcomes = [rows, failure, failure, noRows, rows, failure];
    outcomes.forEach((outcome, i) => aggregator.record({ position: i + 1, text: `S${i};` }, outcome));

    const summary = aggregator.finalize();

    expect(summary.successCount + summary.failureCount).toBe(summary.totalCount);
    expect(summary.totalCount).toBe(outcomes.length);
    expect(summary.failureCount).toBe(3);
  });
});
