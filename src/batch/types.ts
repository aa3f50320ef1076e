/**
 * One statement extracted from a script
 */
export interface Statement {
  /** 1-based position in script order */
  readonly position: number;
  /** Trimmed statement text, including its terminating semicolon */
  readonly text: string;
}

/**
 * Statement succeeded and produced a result set
 */
export interface RowsOutcome {
  readonly kind: "rows";
  readonly rowCount: number;
  readonly columnNames: readonly string[];
  /** At most PREVIEW_LIMIT rows; see execution-driver.ts */
  readonly preview: readonly (readonly unknown[])[];
}

/**
 * Statement succeeded without a result set (writes, DDL)
 */
export interface NoRowsOutcome {
  readonly kind: "no-rows";
}

export interface FailureOutcome {
  readonly kind: "failure";
  readonly errorMessage: string;
}

export type Outcome = RowsOutcome | NoRowsOutcome | FailureOutcome;

export interface StatementOutcome {
  readonly statement: Statement;
  readonly outcome: Outcome;
}

/**
 * Finalized result of one batch run
 */
export interface RunSummary {
  readonly entries: readonly StatementOutcome[];
  readonly successCount: number;
  readonly failureCount: number;
  readonly totalCount: number;
}

export function isSuccess(outcome: Outcome): boolean {
  return outcome.kind !== "failure";
}
