import { describeBlob } from "./grid-table.js";

/**
 * MCP tool response carrying one JSON text block
 */
export type ToolResponse = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

/**
 * Serialize values JSON cannot carry: BigInt as a decimal string, binary
 * values as the same placeholder the console preview prints.
 * Buffers define toJSON, so the original value is read from the holder.
 */
export function resultValueReplacer(this: unknown, key: string, value: unknown): unknown {
  const original: unknown =
    typeof this === "object" && this !== null ? Reflect.get(this, key) : value;
  if (original instanceof Uint8Array) {
    return describeBlob(original);
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  return value;
}

export function createToolSuccessResponse(data: unknown): ToolResponse {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify({ success: true, data }, resultValueReplacer, 2),
      },
    ],
  };
}

export function createToolErrorResponse(error: string, code: string = "ERROR"): ToolResponse {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify({ success: false, error, code }, null, 2),
      },
    ],
    isError: true,
  };
}
