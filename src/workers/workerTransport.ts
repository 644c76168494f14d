import { Buffer } from "node:buffer";

import { ReadBuffer, serializeMessage } from "@modelcontextprotocol/sdk/shared/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { JSONRPCMessage } from "@modelcontextprotocol/sdk/types.js";

import { ProtocolError } from "../errors.js";
import type { WorkerProcess } from "./workerProcess.js";

/**
 * Newline delimited JSON-RPC transport over the stdio pipes of a
 * {@link WorkerProcess}. Lines that do not parse as JSON-RPC messages are
 * reported through `onerror` as {@link ProtocolError}s and reading continues
 * with the next line. Closing the transport terminates the worker.
 */
export class WorkerTransport implements Transport {
  onclose?: Transport["onclose"];
  onerror?: Transport["onerror"];
  onmessage?: Transport["onmessage"];

  private readonly worker: WorkerProcess;
  private readonly readBuffer = new ReadBuffer();
  private started = false;
  private closed = false;

  constructor(worker: WorkerProcess) {
    this.worker = worker;
  }

  async start(): Promise<void> {
    if (this.started) {
      throw new Error(`Transport for worker '${this.worker.name}' already started`);
    }
    this.started = true;
    if (this.worker.exited) {
      throw new ProtocolError(this.worker.name, "transport", "worker process has already exited", {
        hint: "worker_exited",
      });
    }
    this.worker.stdout.on("data", this.handleData);
    this.worker.once("exit", this.handleExit);
  }

  async send(message: JSONRPCMessage): Promise<void> {
    if (this.closed || this.worker.exited) {
      throw new ProtocolError(this.worker.name, "transport", "worker process has exited", { hint: "worker_exited" });
    }
    const payload = serializeMessage(message);
    await new Promise<void>((resolve, reject) => {
      this.worker.stdin.write(payload, (error?: Error | null) => {
        if (error) {
          reject(
            new ProtocolError(this.worker.name, "transport", `unable to write to the worker: ${error.message}`, {
              hint: "worker_exited",
              cause: error,
            }),
          );
          return;
        }
        resolve();
      });
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.detach();
    try {
      await this.worker.terminate();
    } finally {
      this.onclose?.();
    }
  }

  private readonly handleData = (chunk: Buffer | string): void => {
    this.readBuffer.append(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
    this.drain();
  };

  private readonly handleExit = (): void => {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.detach();
    this.onclose?.();
  };

  private drain(): void {
    for (;;) {
      let message: JSONRPCMessage | null;
      try {
        message = this.readBuffer.readMessage();
      } catch (error) {
        // readMessage consumes the offending line before throwing.
        this.onerror?.(
          new ProtocolError(this.worker.name, "transport", "worker wrote a line that is not a JSON-RPC message", {
            cause: error,
          }),
        );
        continue;
      }
      if (message === null) {
        return;
      }
      this.onmessage?.(message);
    }
  }

  private detach(): void {
    this.worker.stdout.off("data", this.handleData);
    this.worker.off("exit", this.handleExit);
    this.readBuffer.clear();
  }
}
