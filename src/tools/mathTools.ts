import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import { textResult } from "./toolResult.js";

export const MATH_WORKER_INFO = { name: "math-server", version: "1.0.0" } as const;

type IntegerOperation = (a: number, b: number) => number;

/** Operations exposed by the math worker, keyed by tool name. */
export const MATH_OPERATIONS = {
  add: (a, b) => a + b,
  multiply: (a, b) => a * b,
} as const satisfies Record<string, IntegerOperation>;

export type MathToolName = keyof typeof MATH_OPERATIONS;

const OperandsShape = {
  a: z.number().int().describe("First integer operand"),
  b: z.number().int().describe("Second integer operand"),
};

/**
 * Runs {@link name} over two integers and renders the result in decimal.
 * Results outside the safe integer range are rejected rather than rounded.
 */
export function runMathOperation(name: MathToolName, a: number, b: number): string {
  const result = MATH_OPERATIONS[name](a, b);
  if (!Number.isSafeInteger(result)) {
    throw new Error(`Result of ${name}(${a}, ${b}) is outside the safe integer range`);
  }
  return String(result);
}

/** Builds the math worker server exposing `add` and `multiply`. */
export function createMathWorkerServer(): McpServer {
  const server = new McpServer(MATH_WORKER_INFO);

  server.registerTool(
    "add",
    {
      title: "Add",
      description: "Add two integers and return their sum.",
      inputSchema: OperandsShape,
    },
    async ({ a, b }) => textResult(runMathOperation("add", a, b)),
  );

  server.registerTool(
    "multiply",
    {
      title: "Multiply",
      description: "Multiply two integers and return their product.",
      inputSchema: OperandsShape,
    },
    async ({ a, b }) => textResult(runMathOperation("multiply", a, b)),
  );

  return server;
}
