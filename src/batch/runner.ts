import fs from "fs";
import { selectSource } from "../config/env.js";
import { ConnectorManager } from "../connectors/manager.js";
import type { SourceConfig } from "../types/config.js";
import { ScriptReadError, getErrorMessage } from "../utils/errors.js";
import { executeStatements } from "./execution-driver.js";
import type { StatementExecutor } from "./execution-driver.js";
import { ReportEmitter } from "./report-emitter.js";
import type { LineWriter } from "./report-emitter.js";
import { ResultAggregator } from "./result-aggregator.js";
import { splitStatements } from "./statement-splitter.js";
import type { RunSummary, StatementOutcome } from "./types.js";

/**
 * Progress callbacks for a run in progress
 */
export interface RunObserver {
  onStart?(statementCount: number): void;
  onOutcome?(entry: StatementOutcome): void;
}

export interface RunAllOptions {
  scriptPath: string;
  sources: SourceConfig[];
  /** Source to run against; the first source when unset */
  sourceId?: string;
  outputFile?: string;
  verbose: boolean;
  write?: LineWriter;
}

/**
 * Read the whole script file
 * @throws ScriptReadError when the file is missing or unreadable
 */
export function readScript(scriptPath: string): string {
  if (!fs.existsSync(scriptPath)) {
    throw new ScriptReadError(scriptPath, `Script file not found: ${scriptPath}`);
  }

  try {
    return fs.readFileSync(scriptPath, "utf-8");
  } catch (error) {
    throw new ScriptReadError(
      scriptPath,
      `Error reading ${scriptPath}: ${getErrorMessage(error)}`
    );
  }
}

/**
 * Split a script and execute every statement in order against one store.
 * Statement failures are recorded in the summary; nothing here aborts the run.
 */
export async function runScript(
  executor: StatementExecutor,
  script: string,
  observer: RunObserver = {}
): Promise<RunSummary> {
  const statements = splitStatements(script);
  const aggregator = new ResultAggregator();

  observer.onStart?.(statements.length);
  for await (const entry of executeStatements(executor, statements)) {
    aggregator.record(entry.statement, entry.outcome);
    observer.onOutcome?.(entry);
  }

  return aggregator.finalize();
}

/**
 * The run-all command: read the script, open the store, run every statement,
 * report live to the console and optionally to a file, then close the store.
 *
 * @throws ScriptReadError or StoreConnectionError before any statement runs
 */
export async function runAll(options: RunAllOptions): Promise<RunSummary> {
  const source = selectSource(options.sources, options.sourceId);
  const script = readScript(options.scriptPath);

  const manager = new ConnectorManager();
  await manager.connectWithSources([source]);

  try {
    const emitter = new ReportEmitter({ verbose: options.verbose, write: options.write });
    const summary = await runScript(manager.getConnector(source.id), script, {
      onStart: (count) => emitter.begin(options.scriptPath, count),
      onOutcome: (entry) => emitter.statement(entry),
    });

    emitter.summary(summary);
    if (options.outputFile) {
      emitter.writeReportFile(summary, options.outputFile);
    }

    return summary;
  } finally {
    await manager.disconnect();
  }
}
