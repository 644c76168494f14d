/**
 * Mocha bootstrap keeping the suite hermetic:
 *
 * 1. Coordinator settings read from the environment get short, predictable
 *    values so a test relying on defaults never waits for the production
 *    timeouts. Values already present in the environment win.
 * 2. Outbound network access fails fast. Workers are always in-process
 *    doubles, so any socket or `fetch` usage points at a test bug.
 */
import { after } from "mocha";
import { Socket } from "node:net";

type RestoreHook = () => void;

const restores: RestoreHook[] = [];

const TEST_ENV_DEFAULTS: Record<string, string> = {
  COORDINATOR_LAUNCH_TIMEOUT_MS: "1000",
  COORDINATOR_HANDSHAKE_TIMEOUT_MS: "1000",
  COORDINATOR_REQUEST_TIMEOUT_MS: "1000",
  COORDINATOR_SHUTDOWN_TIMEOUT_MS: "200",
  COORDINATOR_LOG_LEVEL: "error",
};

for (const [key, value] of Object.entries(TEST_ENV_DEFAULTS)) {
  if (!process.env[key]) {
    process.env[key] = value;
  }
}

/** Error raised by the network guard. */
export class NetworkBlockedError extends Error {
  public readonly code = "E-NETWORK-BLOCKED";

  constructor(primitive: string) {
    super(`network access via ${primitive} is disabled during tests`);
    this.name = "NetworkBlockedError";
  }
}

function installNetworkGuards(): void {
  const originalConnect = Socket.prototype.connect;
  Socket.prototype.connect = function blockedConnect(): never {
    throw new NetworkBlockedError("net.Socket#connect");
  };
  restores.push(() => {
    Socket.prototype.connect = originalConnect;
  });

  if (typeof globalThis.fetch === "function") {
    const originalFetch = globalThis.fetch;
    globalThis.fetch = async (): Promise<never> => {
      throw new NetworkBlockedError("fetch");
    };
    restores.push(() => {
      globalThis.fetch = originalFetch;
    });
  }
}

installNetworkGuards();

after(() => {
  while (restores.length > 0) {
    restores.pop()?.();
  }
});
