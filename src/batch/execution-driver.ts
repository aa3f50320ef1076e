import { NoResultSetError } from "../connectors/interface.js";
import type { Connector } from "../connectors/interface.js";
import { getErrorMessage } from "../utils/errors.js";
import type { Outcome, Statement, StatementOutcome } from "./types.js";

/** Results with at most this many rows are previewed in full */
export const PREVIEW_LIMIT = 5;

/** Rows kept in the preview of a result larger than PREVIEW_LIMIT */
export const TRUNCATED_PREVIEW_ROWS = 3;

/**
 * The part of a connector the driver needs
 */
export type StatementExecutor = Pick<Connector, "execute">;

/**
 * Count every row but keep only the first PREVIEW_LIMIT of them
 */
function collectRows(
  rows: IterableIterator<unknown[]>
): { rowCount: number; preview: unknown[][] } {
  const kept: unknown[][] = [];
  let rowCount = 0;

  for (const row of rows) {
    if (rowCount < PREVIEW_LIMIT) {
      kept.push(row);
    }
    rowCount++;
  }

  const preview = rowCount > PREVIEW_LIMIT ? kept.slice(0, TRUNCATED_PREVIEW_ROWS) : kept;
  return { rowCount, preview };
}

/**
 * Execute a single statement. Never throws: execution errors become
 * failure outcomes, and a statement without a result set is a success.
 */
export async function executeStatement(
  executor: StatementExecutor,
  statement: Statement
): Promise<Outcome> {
  try {
    const cursor = await executor.execute(statement.text);

    let collected: { rowCount: number; preview: unknown[][] };
    try {
      collected = collectRows(cursor.rows());
    } catch (error) {
      if (error instanceof NoResultSetError) {
        return { kind: "no-rows" };
      }
      throw error;
    }

    return {
      kind: "rows",
      rowCount: collected.rowCount,
      columnNames: [...cursor.columns],
      preview: collected.preview,
    };
  } catch (error) {
    return { kind: "failure", errorMessage: getErrorMessage(error) };
  }
}

/**
 * Execute statements strictly in order, each one finishing before the next
 * is submitted. Every statement is attempted whatever happened before it.
 */
export async function* executeStatements(
  executor: StatementExecutor,
  statements: readonly Statement[]
): AsyncGenerator<StatementOutcome> {
  for (const statement of statements) {
    const outcome = await executeStatement(executor, statement);
    yield { statement, outcome };
  }
}
