import { describe, it } from "mocha";
import { expect } from "chai";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { createMathWorkerServer, runMathOperation } from "../../src/tools/mathTools.js";
import { TEXT_OPERATIONS, createTextWorkerServer } from "../../src/tools/textTools.js";

async function connectClient(server: McpServer): Promise<Client> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new Client({ name: "tools-test", version: "0.0.0" });
  await client.connect(clientTransport);
  return client;
}

async function callText(client: Client, name: string, args: Record<string, unknown>): Promise<string> {
  const result = await client.callTool({ name, arguments: args });
  const content: unknown = result.content;
  if (!Array.isArray(content)) {
    throw new Error("tool result carried no content");
  }
  const [first]: unknown[] = content;
  if (typeof first !== "object" || first === null || !("text" in first) || typeof first.text !== "string") {
    throw new Error("tool result did not start with text");
  }
  return first.text;
}

describe("tools/math", () => {
  it("renders integer results in decimal", () => {
    expect(runMathOperation("add", 5, 3)).to.equal("8");
    expect(runMathOperation("add", -10, 5)).to.equal("-5");
    expect(runMathOperation("multiply", -3, 4)).to.equal("-12");
    expect(runMathOperation("multiply", 100, 0)).to.equal("0");
    expect(runMathOperation("multiply", -3, 0)).to.equal("0");
  });

  it("rejects results outside the safe integer range", () => {
    expect(() => runMathOperation("multiply", Number.MAX_SAFE_INTEGER, 2)).to.throw(
      `Result of multiply(${Number.MAX_SAFE_INTEGER}, 2) is outside the safe integer range`,
    );
  });

  it("serves add and multiply over the protocol", async () => {
    const server = createMathWorkerServer();
    const client = await connectClient(server);
    try {
      const { tools } = await client.listTools();
      expect(tools.map((tool) => tool.name)).to.deep.equal(["add", "multiply"]);
      expect(tools[1]?.inputSchema.required).to.deep.equal(["a", "b"]);

      expect(await callText(client, "add", { a: 5, b: 3 })).to.equal("8");
      expect(await callText(client, "multiply", { a: 100, b: 0 })).to.equal("0");
    } finally {
      await client.close();
      await server.close();
    }
  });
});

describe("tools/text", () => {
  it("upper-cases and concatenates strings", () => {
    expect(TEXT_OPERATIONS.uppercase("HeLLo WoRLd")).to.equal("HELLO WORLD");
    expect(TEXT_OPERATIONS.uppercase("")).to.equal("");
    expect(TEXT_OPERATIONS.concat("Hello", "World", ", ")).to.equal("Hello, World");
    expect(TEXT_OPERATIONS.concat("Hello", "World")).to.equal("Hello World");
    expect(TEXT_OPERATIONS.concat("", "", "-")).to.equal("-");
  });

  it("serves uppercase and concat with a default separator", async () => {
    const server = createTextWorkerServer();
    const client = await connectClient(server);
    try {
      const { tools } = await client.listTools();
      expect(tools.map((tool) => tool.name)).to.deep.equal(["uppercase", "concat"]);
      expect(tools[1]?.inputSchema.required).to.deep.equal(["a", "b"]);

      expect(await callText(client, "uppercase", { text: "mixed Case" })).to.equal("MIXED CASE");
      expect(await callText(client, "concat", { a: "left", b: "right" })).to.equal("left right");
      expect(await callText(client, "concat", { a: "left", b: "right", separator: "|" })).to.equal("left|right");
    } finally {
      await client.close();
      await server.close();
    }
  });
});
