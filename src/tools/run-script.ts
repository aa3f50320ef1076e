import { z } from "zod";
import { ConnectorManager } from "../connectors/manager.js";
import type { Connector } from "../connectors/interface.js";
import { runScript } from "../batch/runner.js";
import { createToolSuccessResponse, createToolErrorResponse } from "../utils/response-formatter.js";
import type { ToolResponse } from "../utils/response-formatter.js";
import { getErrorMessage } from "../utils/errors.js";

export const RUN_SCRIPT_TOOL = "run_script";

// Schema for run_script tool
export const runScriptSchema = {
  sql: z
    .string()
    .describe(
      "SQL script: statements terminated by ';' at the end of a line, with -- line comments and /* */ block comments on their own lines"
    ),
  source_id: z
    .string()
    .optional()
    .describe("Source to run against (defaults to the first configured source)"),
};

export interface RunScriptArgs {
  sql: string;
  source_id?: string;
}

/**
 * Create a run_script tool handler bound to a connector manager.
 * Every statement is attempted; failed statements are reported in the
 * summary rather than as a tool error.
 *
 * Requests can arrive while an earlier run is still in flight. Runs on the
 * same source are queued so that their statements never interleave on the
 * shared connection.
 */
export function createRunScriptToolHandler(manager: ConnectorManager) {
  const queues = new WeakMap<Connector, Promise<void>>();

  const runExclusively = <T>(
    connector: Connector,
    task: (connector: Connector) => Promise<T>
  ): Promise<T> => {
    const previous = queues.get(connector) ?? Promise.resolve();
    const result = previous.then(() => task(connector));
    // The queue only tracks completion; callers still see the rejection through `result`
    queues.set(
      connector,
      result.then(
        () => undefined,
        () => undefined
      )
    );
    return result;
  };

  return async (args: RunScriptArgs): Promise<ToolResponse> => {
    let connector: Connector;
    try {
      connector = manager.getConnector(args.source_id);
    } catch (error) {
      return createToolErrorResponse(getErrorMessage(error), "SOURCE_NOT_FOUND");
    }

    const summary = await runExclusively(connector, (target) => runScript(target, args.sql));
    return createToolSuccessResponse({
      source_id: connector.getId(),
      ...summary,
    });
  };
}
