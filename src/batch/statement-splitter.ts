import type { Statement } from "./types.js";

/**
 * Scanner state. Block comments open and close on their own lines, so the
 * whole machine advances one trimmed line at a time.
 */
export type SplitterState = "normal" | "in-block-comment";

/**
 * What a single line contributes
 */
export type LineAction =
  | { type: "skip" }
  | { type: "append"; terminates: boolean };

const LINE_COMMENT = "--";
const BLOCK_COMMENT_OPEN = "/*";
const BLOCK_COMMENT_CLOSE = "*/";
const TERMINATOR = ";";

/**
 * Advance the machine by one trimmed line.
 * Line comments are dropped in either state and never terminate a statement.
 */
export function scanLine(
  state: SplitterState,
  line: string
): { state: SplitterState; action: LineAction } {
  if (line.length === 0 || line.startsWith(LINE_COMMENT)) {
    return { state, action: { type: "skip" } };
  }

  // An opening line (re)enters the comment even when it also ends with */
  if (line.startsWith(BLOCK_COMMENT_OPEN)) {
    return { state: "in-block-comment", action: { type: "skip" } };
  }

  switch (state) {
    case "in-block-comment":
      // No nesting: the first closing line ends the comment
      return {
        state: line.endsWith(BLOCK_COMMENT_CLOSE) ? "normal" : "in-block-comment",
        action: { type: "skip" },
      };

    case "normal":
      return {
        state,
        action: { type: "append", terminates: line.endsWith(TERMINATOR) },
      };
  }
}

/**
 * A fragment holding nothing but whitespace and terminators is not a statement
 */
function isEmptyFragment(fragment: string): boolean {
  return fragment.replace(/[\s;]/g, "").length === 0;
}

/**
 * Split a script into statements.
 *
 * Terminators are recognized only at the end of a line: a `;` in the middle
 * of a line does not split, and a `;` ending a line inside a string literal
 * does. An unterminated trailing fragment is returned as the last statement.
 */
export function splitStatements(script: string): Statement[] {
  const fragments: string[] = [];
  let state: SplitterState = "normal";
  let buffer: string[] = [];

  for (const rawLine of script.split("\n")) {
    const line = rawLine.trim();
    const next = scanLine(state, line);
    state = next.state;

    if (next.action.type === "skip") {
      continue;
    }

    buffer.push(line);
    if (next.action.terminates) {
      fragments.push(buffer.join(" ").trim());
      buffer = [];
    }
  }

  if (buffer.length > 0) {
    fragments.push(buffer.join(" ").trim());
  }

  return fragments
    .filter((fragment) => !isEmptyFragment(fragment))
    .map((text, index) => ({ position: index + 1, text }));
}
