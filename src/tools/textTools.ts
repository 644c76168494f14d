import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import { textResult } from "./toolResult.js";

export const TEXT_WORKER_INFO = { name: "string-server", version: "1.0.0" } as const;

export const DEFAULT_CONCAT_SEPARATOR = " ";

/** Operations exposed by the text worker, keyed by tool name. */
export const TEXT_OPERATIONS = {
  uppercase: (text: string): string => text.toUpperCase(),
  concat: (a: string, b: string, separator: string = DEFAULT_CONCAT_SEPARATOR): string => `${a}${separator}${b}`,
} as const;

/** Builds the text worker server exposing `uppercase` and `concat`. */
export function createTextWorkerServer(): McpServer {
  const server = new McpServer(TEXT_WORKER_INFO);

  server.registerTool(
    "uppercase",
    {
      title: "Uppercase",
      description: "Convert a string to upper case.",
      inputSchema: {
        text: z.string().describe("Text to convert"),
      },
    },
    async ({ text }) => textResult(TEXT_OPERATIONS.uppercase(text)),
  );

  server.registerTool(
    "concat",
    {
      title: "Concatenate",
      description: "Join two strings with a separator.",
      inputSchema: {
        a: z.string().describe("First string"),
        b: z.string().describe("Second string"),
        separator: z.string().default(DEFAULT_CONCAT_SEPARATOR).describe("Separator placed between the strings"),
      },
    },
    async ({ a, b, separator }) => textResult(TEXT_OPERATIONS.concat(a, b, separator)),
  );

  return server;
}
