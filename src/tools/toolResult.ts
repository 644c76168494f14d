import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

/** Wraps {@link text} in a single text content block. */
export function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}
