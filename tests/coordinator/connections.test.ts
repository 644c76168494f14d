import { describe, it } from "mocha";
import { expect } from "chai";

import { ConnectionRegistry } from "../../src/coordinator/connections.js";
import { UnknownServerError } from "../../src/errors.js";

describe("coordinator/connections", () => {
  it("keeps registrations in order and replaces entries in place", () => {
    const registry = new ConnectionRegistry();
    registry.register({ name: "math", command: "first", args: [] });
    registry.register({ name: "text", command: "text-worker", args: [] });

    const { connection, replaced } = registry.register({ name: "math", command: "second", args: ["--fast"] });

    expect(replaced?.config.command).to.equal("first");
    expect(connection.session).to.equal(null);
    expect(registry.size).to.equal(2);
    expect(registry.names()).to.deep.equal(["math", "text"]);
    expect(registry.require("math").config).to.deep.equal({ name: "math", command: "second", args: ["--fast"] });
  });

  it("throws UnknownServerError for unregistered names", () => {
    const registry = new ConnectionRegistry();

    expect(registry.has("ghost")).to.equal(false);
    expect(() => registry.require("ghost")).to.throw(UnknownServerError, "Unknown worker 'ghost'");
  });

  it("summarises the connection state", () => {
    const registry = new ConnectionRegistry();
    const { connection } = registry.register({ name: "math", command: "math-worker", args: [] });
    connection.tools = [{ name: "add", description: "", inputSchema: { type: "object" } }];

    expect(registry.summaries()).to.deep.equal([
      { name: "math", command: "math-worker", connected: false, toolNames: ["add"] },
    ]);

    registry.detach(connection);
    expect(connection.tools).to.deep.equal([]);
    expect(connection.release).to.equal(null);
  });
});
