import { isSuccess } from "./types.js";
import type { Outcome, RunSummary, Statement, StatementOutcome } from "./types.js";

/**
 * Collects statement outcomes in execution order
 */
export class ResultAggregator {
  private entries: StatementOutcome[] = [];
  private successCount = 0;
  private failureCount = 0;
  private finalized: RunSummary | null = null;

  record(statement: Statement, outcome: Outcome): void {
    if (this.finalized) {
      throw new Error("Cannot record an outcome after the run summary was finalized");
    }

    this.entries.push(Object.freeze({ statement, outcome }));
    if (isSuccess(outcome)) {
      this.successCount++;
    } else {
      this.failureCount++;
    }
  }

  /**
   * Freeze the collected outcomes. Calling it again returns the same summary.
   */
  finalize(): RunSummary {
    if (!this.finalized) {
      this.finalized = Object.freeze({
        entries: Object.freeze([...this.entries]),
        successCount: this.successCount,
        failureCount: this.failureCount,
        totalCount: this.entries.length,
      });
    }
    return this.finalized;
  }
}
