/**
 * The script file is missing or unreadable. Fatal: nothing is executed.
 */
export class ScriptReadError extends Error {
  constructor(
    readonly scriptPath: string,
    message: string
  ) {
    super(message);
    this.name = "ScriptReadError";
  }
}

/**
 * The store cannot be opened. Fatal: nothing is executed.
 */
export class StoreConnectionError extends Error {
  constructor(
    readonly sourceId: string,
    message: string
  ) {
    super(message);
    this.name = "StoreConnectionError";
  }
}

/**
 * Bad command line
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
