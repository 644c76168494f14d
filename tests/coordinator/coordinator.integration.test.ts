/**
 * End-to-end coordinator scenarios. Workers are real MCP servers served over
 * the stdio pipes of in-process stub children, so the whole stack from the
 * JSON-RPC framing to the routing is exercised without spawning processes.
 */
import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { loadCoordinatorSettings } from "../../src/config/settings.js";
import { Coordinator, withCoordinator, type CoordinatorOptions } from "../../src/coordinator/coordinator.js";
import {
  HandshakeError,
  InvalidWorkerConfigError,
  LaunchError,
  NotConnectedError,
  NotInitializedError,
  ToolNotFoundError,
  UnknownServerError,
} from "../../src/errors.js";
import type { ChildProcessGateway } from "../../src/gateways/childProcess.js";
import { createMathWorkerServer } from "../../src/tools/mathTools.js";
import { createTextWorkerServer } from "../../src/tools/textTools.js";
import { WorkerSession } from "../../src/workers/workerSession.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";
import { StubGateway, attachServer, createInProcessGateway, enoent } from "../helpers/workerDoubles.js";

const MATH = { name: "math-server", command: "math-worker", args: [] };
const TEXT = { name: "string-server", command: "text-worker", args: [] };

function workersGateway(): StubGateway {
  return createInProcessGateway({ "math-worker": createMathWorkerServer, "text-worker": createTextWorkerServer });
}

function options(gateway: ChildProcessGateway, extra: Partial<CoordinatorOptions> = {}): CoordinatorOptions {
  return {
    settings: loadCoordinatorSettings({}),
    logger: new RecordingLogger(),
    gateway,
    timeouts: { launchTimeoutMs: 500, handshakeTimeoutMs: 500, requestTimeoutMs: 500, shutdownTimeoutMs: 100 },
    ...extra,
  };
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

describe("coordinator (integration)", () => {
  it("merges the catalogs of both workers", async () => {
    await withCoordinator(options(workersGateway()), async (coordinator) => {
      coordinator.addServer(MATH);
      coordinator.addServer(TEXT);
      await coordinator.connectAll();

      const records = coordinator.listAllTools();
      expect(records).to.have.length(4);
      expect(records.map((record) => [record.workerName, record.name])).to.deep.equal([
        ["math-server", "add"],
        ["math-server", "multiply"],
        ["string-server", "uppercase"],
        ["string-server", "concat"],
      ]);
      expect(records[0]?.description).to.equal("Add two integers and return their sum.");
      expect(coordinator.resolveTool("concat")).to.equal("string-server");
    });
  });

  it("routes each call to the worker owning the tool", async () => {
    await withCoordinator(options(workersGateway()), async (coordinator) => {
      coordinator.addServer(MATH);
      coordinator.addServer(TEXT);
      await coordinator.connectAll();

      expect(await coordinator.callTool("add", { a: 5, b: 3 })).to.equal("8");
      expect(await coordinator.callTool("add", { a: -10, b: 5 })).to.equal("-5");
      expect(await coordinator.callTool("multiply", { a: -3, b: 4 })).to.equal("-12");
      expect(await coordinator.callTool("multiply", { a: 100, b: 0 })).to.equal("0");
      expect(await coordinator.callTool("uppercase", { text: "HeLLo WoRLd" })).to.equal("HELLO WORLD");
      expect(await coordinator.callTool("uppercase", { text: "" })).to.equal("");
      expect(await coordinator.callTool("concat", { a: "Hello", b: "World", separator: ", " })).to.equal(
        "Hello, World",
      );
      expect(await coordinator.callTool("concat", { a: "Hello", b: "World" })).to.equal("Hello World");
      expect(await coordinator.callTool("concat", { a: "", b: "", separator: "-" })).to.equal("-");
    });
  });

  it("keeps per-worker ordering across interleaved calls", async () => {
    await withCoordinator(options(workersGateway()), async (coordinator) => {
      coordinator.addServer(MATH);
      coordinator.addServer(TEXT);
      await coordinator.connectAll();

      const sums: string[] = [];
      for (let index = 0; index < 10; index += 1) {
        sums.push(await coordinator.callTool("add", { a: index, b: index }));
        expect(await coordinator.callTool("uppercase", { text: `call ${index}` })).to.equal(`CALL ${index}`);
      }
      expect(sums).to.deep.equal(["0", "2", "4", "6", "8", "10", "12", "14", "16", "18"]);

      const concurrent = await Promise.all([1, 2, 3, 4, 5].map((value) => coordinator.callTool("multiply", { a: value, b: 10 })));
      expect(concurrent).to.deep.equal(["10", "20", "30", "40", "50"]);
    });
  });

  it("reports unknown tools by name", async () => {
    await withCoordinator(options(workersGateway()), async (coordinator) => {
      coordinator.addServer(MATH);
      await coordinator.connectAll();

      const error = await rejectionOf(coordinator.callTool("unknown_tool", {}));

      expect(error).to.be.instanceOf(ToolNotFoundError);
      if (error instanceof ToolNotFoundError) {
        expect(error.toolName).to.equal("unknown_tool");
        expect(error.message).to.contain("unknown_tool");
      }
    });
  });

  it("keeps a single entry when a name is registered twice", async () => {
    const coordinator = new Coordinator(options(workersGateway())).open();
    try {
      coordinator.addServer({ name: "math-server", command: "first-command", args: [] });
      coordinator.addServer(MATH);

      expect(coordinator.listConnections()).to.deep.equal([
        { name: "math-server", command: "math-worker", connected: false, toolNames: [] },
      ]);
      expect(await coordinator.connectToServer("math-server")).to.have.length(2);
    } finally {
      await coordinator.close();
    }
  });

  it("validates worker configurations", () => {
    const coordinator = new Coordinator(options(workersGateway()));

    expect(() => coordinator.addServer({ name: "", command: "math-worker" })).to.throw(InvalidWorkerConfigError);
    expect(() => coordinator.addServer({ name: "math", command: "math-worker", env: { DEBUG: 1 } })).to.throw(
      InvalidWorkerConfigError,
    );
  });

  it("tears down idempotently and terminates every worker", async () => {
    const gateway = workersGateway();
    const coordinator = new Coordinator(options(gateway)).open();
    coordinator.addServer(MATH);
    coordinator.addServer(TEXT);
    await coordinator.connectAll();

    const report = await coordinator.close();
    const again = await coordinator.close();

    expect(report).to.deep.equal({ released: ["worker:math-server", "worker:string-server"], failures: [] });
    expect(again).to.deep.equal({ released: [], failures: [] });
    expect(coordinator.state).to.equal("closed");
    expect(coordinator.listAllTools()).to.deep.equal([]);
    expect(coordinator.listConnections()).to.deep.equal([]);
    expect(() => coordinator.resolveTool("add")).to.throw(ToolNotFoundError);
    for (const { child } of gateway.spawned) {
      expect(child.hasExited).to.equal(true);
      expect(child.killInvocations).to.deep.equal(["SIGTERM"]);
    }
  });

  it("refuses to work outside the open scope", async () => {
    const coordinator = new Coordinator(options(workersGateway()));
    coordinator.addServer(MATH);

    expect(await rejectionOf(coordinator.callTool("add", { a: 1, b: 2 }))).to.be.instanceOf(NotInitializedError);
    expect(await rejectionOf(coordinator.connectToServer("math-server"))).to.be.instanceOf(NotInitializedError);
    expect(await rejectionOf(coordinator.connectAll())).to.be.instanceOf(NotInitializedError);

    await coordinator.close();

    expect(() => coordinator.open()).to.throw(NotInitializedError);
    expect(() => coordinator.addServer(TEXT)).to.throw(NotInitializedError);
    expect(await rejectionOf(coordinator.callTool("add", { a: 1, b: 2 }))).to.be.instanceOf(NotInitializedError);
  });

  it("raises NotConnectedError when the owner has no live session", async () => {
    await withCoordinator(options(workersGateway()), async (coordinator) => {
      coordinator.addServer(MATH);
      coordinator.addServer(TEXT);
      await coordinator.connectAll();

      coordinator.addServer(TEXT);

      const error = await rejectionOf(coordinator.callTool("uppercase", { text: "x" }));
      expect(error).to.be.instanceOf(NotConnectedError);
      if (error instanceof NotConnectedError) {
        expect(error.workerName).to.equal("string-server");
      }
      expect(await coordinator.callTool("add", { a: 1, b: 1 })).to.equal("2");
    });
  });

  it("keeps a replaced worker running until the coordinator closes", async () => {
    const gateway = workersGateway();
    const coordinator = new Coordinator(options(gateway)).open();
    coordinator.addServer(MATH);
    coordinator.addServer(TEXT);
    await coordinator.connectAll();
    const [replacedChild] = gateway.childrenFor("text-worker");

    coordinator.addServer(TEXT);
    await coordinator.disconnectAll();

    expect(replacedChild?.hasExited).to.equal(false);
    expect(gateway.childrenFor("math-worker")[0]?.hasExited).to.equal(true);

    const report = await coordinator.close();

    expect(report).to.deep.equal({ released: ["worker:string-server"], failures: [] });
    expect(replacedChild?.hasExited).to.equal(true);
    expect(replacedChild?.killInvocations).to.deep.equal(["SIGTERM"]);
  });

  it("rejects unknown worker names", async () => {
    await withCoordinator(options(workersGateway()), async (coordinator) => {
      expect(await rejectionOf(coordinator.connectToServer("ghost"))).to.be.instanceOf(UnknownServerError);
    });
  });

  it("stops connectAll at the first failure and keeps earlier workers connected", async () => {
    const gateway = workersGateway();
    await withCoordinator(options(gateway), async (coordinator) => {
      coordinator.addServer(MATH);
      coordinator.addServer({ name: "broken", command: "missing-worker", args: [] });
      coordinator.addServer(TEXT);

      const error = await rejectionOf(coordinator.connectAll());

      expect(error).to.be.instanceOf(LaunchError);
      expect(coordinator.listConnections().map((connection) => [connection.name, connection.connected])).to.deep.equal([
        ["math-server", true],
        ["broken", false],
        ["string-server", false],
      ]);
      expect(coordinator.listAllTools().map((record) => record.name)).to.deep.equal(["add", "multiply"]);
      expect(gateway.childrenFor("text-worker")).to.have.length(0);
      expect(await coordinator.callTool("add", { a: 2, b: 2 })).to.equal("4");
    });
  });

  it("terminates a worker whose handshake fails and leaves it unconnected", async () => {
    const gateway = new StubGateway((child, spawnOptions) => {
      if (spawnOptions.command === "silent-worker") {
        child.emitSpawnSoon();
        return;
      }
      if (spawnOptions.command === "math-worker") {
        attachServer(child, createMathWorkerServer());
        child.emitSpawnSoon();
        return;
      }
      child.failToSpawn(enoent(spawnOptions.command));
    });
    const coordinatorOptions = options(gateway, {
      timeouts: { launchTimeoutMs: 500, handshakeTimeoutMs: 40, requestTimeoutMs: 500, shutdownTimeoutMs: 50 },
    });

    await withCoordinator(coordinatorOptions, async (coordinator) => {
      coordinator.addServer(MATH);
      coordinator.addServer({ name: "silent", command: "silent-worker", args: [] });
      await coordinator.connectToServer("math-server");

      const error = await rejectionOf(coordinator.connectToServer("silent"));

      expect(error).to.be.instanceOf(HandshakeError);
      expect(coordinator.getConnection("silent")).to.deep.equal({
        name: "silent",
        command: "silent-worker",
        connected: false,
        toolNames: [],
      });
      const [silentChild] = gateway.childrenFor("silent-worker");
      expect(silentChild?.hasExited).to.equal(true);
      expect(coordinator.getConnection("math-server")?.connected).to.equal(true);
    });
  });

  it("releases the previous session when reconnecting", async () => {
    const gateway = workersGateway();
    await withCoordinator(options(gateway), async (coordinator) => {
      coordinator.addServer(MATH);
      await coordinator.connectToServer("math-server");
      await coordinator.connectToServer("math-server");

      const [first, second] = gateway.childrenFor("math-worker");
      expect(first?.killInvocations).to.deep.equal(["SIGTERM"]);
      expect(second?.killInvocations).to.deep.equal([]);
      expect(await coordinator.callTool("multiply", { a: 6, b: 7 })).to.equal("42");
    });
  });

  it("disconnects every worker and allows reconnecting", async () => {
    const gateway = workersGateway();
    await withCoordinator(options(gateway), async (coordinator) => {
      coordinator.addServer(MATH);
      await coordinator.disconnectAll();
      await coordinator.connectAll();

      await coordinator.disconnectAll();
      await coordinator.disconnectAll();

      expect(coordinator.listAllTools()).to.deep.equal([]);
      expect(await rejectionOf(coordinator.callTool("add", { a: 1, b: 1 }))).to.be.instanceOf(ToolNotFoundError);

      await coordinator.connectAll();
      expect(await coordinator.callTool("add", { a: 1, b: 1 })).to.equal("2");
      expect(gateway.childrenFor("math-worker")).to.have.length(2);
    });
  });

  it("closes the coordinator when the body throws", async () => {
    const gateway = workersGateway();
    let captured: Coordinator | null = null;

    const error = await rejectionOf(
      withCoordinator(options(gateway), async (coordinator) => {
        captured = coordinator;
        coordinator.addServer(MATH);
        await coordinator.connectAll();
        throw new Error("body failed");
      }),
    );

    expect(error instanceof Error ? error.message : "").to.equal("body failed");
    expect(captured).to.be.instanceOf(Coordinator);
    expect(gateway.spawned.every(({ child }) => child.hasExited)).to.equal(true);
  });
  it("collects release failures without stopping the teardown", async () => {
    const gateway = workersGateway();
    const logger = new RecordingLogger();
    const failure = new Error("kill failed");
    const coordinator = new Coordinator(options(gateway, { logger })).open();
    coordinator.addServer(MATH);
    coordinator.addServer(TEXT);
    await coordinator.connectAll();

    const closeStub = sinon.stub(WorkerSession.prototype, "close");
    closeStub.onFirstCall().rejects(failure);
    closeStub.callThrough();
    try {
      const report = await coordinator.close();

      expect(report).to.deep.equal({
        released: ["worker:string-server"],
        failures: [{ label: "worker:math-server", error: failure }],
      });
      expect(closeStub.callCount).to.equal(2);
      expect(logger.find("scope_release_failed")).to.deep.equal([
        { level: "warn", message: "scope_release_failed", payload: { label: "worker:math-server", error: failure } },
      ]);
      expect(gateway.childrenFor("text-worker")[0]?.hasExited).to.equal(true);
    } finally {
      closeStub.restore();
      gateway.childrenFor("math-worker")[0]?.exitSoon(0, null);
    }
  });
});
