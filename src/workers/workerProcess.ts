import { EventEmitter } from "node:events";
import type { Readable, Writable } from "node:stream";

import { DEFAULT_TIMEOUTS } from "../config/settings.js";
import { LaunchError } from "../errors.js";
import {
  createChildProcessGateway,
  type ChildProcessGateway,
  type WorkerChildProcess,
} from "../gateways/childProcess.js";
import { StructuredLogger } from "../logger.js";
import type { WorkerConfig } from "../types.js";

/** Gateway used when callers do not inject one explicitly. */
const defaultChildProcessGateway: ChildProcessGateway = createChildProcessGateway();

/** Number of stderr lines retained for diagnostics. */
const STDERR_TAIL_SIZE = 50;

/** Exit information recorded once the worker process is gone. */
export interface WorkerExitEvent {
  code: number | null;
  signal: NodeJS.Signals | null;
  at: number;
  /** True when the coordinator had to escalate to SIGKILL. */
  forced: boolean;
  /** OS level error reported instead of a regular exit (for example ENOENT). */
  error: Error | null;
}

/** Outcome of {@link WorkerProcess.terminate}. */
export interface WorkerTerminationResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  forced: boolean;
  /** True when the process did not confirm its exit even after SIGKILL. */
  abandoned: boolean;
  durationMs: number;
}

export interface WorkerTerminateOptions {
  /** First signal sent to the worker. Defaults to SIGTERM. */
  signal?: NodeJS.Signals;
  /** Wait applied after each signal before escalating or giving up. */
  timeoutMs?: number;
}

export interface LaunchWorkerOptions {
  gateway?: ChildProcessGateway;
  logger?: StructuredLogger;
  /** Time allowed for the OS to confirm the process started. */
  launchTimeoutMs?: number;
  /** Default grace period used by {@link WorkerProcess.terminate}. */
  shutdownTimeoutMs?: number;
  cwd?: string;
}

interface WorkerProcessParams {
  config: WorkerConfig;
  child: WorkerChildProcess;
  logger: StructuredLogger;
  shutdownTimeoutMs: number;
}

/**
 * Handle over one spawned worker. Owns the process lifecycle and exposes the
 * stdin/stdout byte channel used by the session transport. A handle is never
 * reused once the process has exited or been terminated.
 *
 * Emits `exit` with a {@link WorkerExitEvent} exactly once.
 */
export class WorkerProcess extends EventEmitter {
  public readonly name: string;
  public readonly command: string;
  public readonly args: readonly string[];

  private readonly child: WorkerChildProcess;
  private readonly logger: StructuredLogger;
  private readonly shutdownTimeoutMs: number;

  private readonly spawnOutcome: Promise<Error | null>;
  private settleSpawn: ((outcome: Error | null) => void) | null = null;

  private readonly exitPromise: Promise<WorkerExitEvent>;
  private resolveExit: ((event: WorkerExitEvent) => void) | null = null;
  private exitEvent: WorkerExitEvent | null = null;

  private termination: Promise<WorkerTerminationResult> | null = null;
  private forcedKill = false;
  private stderrBuffer = "";
  private readonly stderrTail: string[] = [];

  constructor(params: WorkerProcessParams) {
    super();
    this.name = params.config.name;
    this.command = params.config.command;
    this.args = Object.freeze([...params.config.args]);
    this.child = params.child;
    this.logger = params.logger;
    this.shutdownTimeoutMs = params.shutdownTimeoutMs;

    this.spawnOutcome = new Promise<Error | null>((resolve) => {
      this.settleSpawn = resolve;
    });
    this.exitPromise = new Promise<WorkerExitEvent>((resolve) => {
      this.resolveExit = resolve;
    });

    this.setupListeners();
  }

  get pid(): number {
    return this.child.pid ?? -1;
  }

  /** True once the process exited or failed to start. */
  get exited(): boolean {
    return this.exitEvent !== null;
  }

  /** Request channel towards the worker. */
  get stdin(): Writable {
    return this.child.stdin;
  }

  /** Response channel from the worker. */
  get stdout(): Readable {
    return this.child.stdout;
  }

  /** Last lines the worker wrote on stderr, oldest first. */
  recentStderr(): string[] {
    this.flushStderr();
    return [...this.stderrTail];
  }

  /**
   * Resolves once the OS confirmed the process started. Rejects with the OS
   * error, or after {@link timeoutMs} when neither outcome is reported.
   */
  async waitUntilSpawned(timeoutMs: number): Promise<void> {
    let timer: NodeJS.Timeout | null = null;
    const timeout = new Promise<Error>((resolve) => {
      timer = setTimeout(() => resolve(new Error(`process did not start within ${timeoutMs}ms`)), timeoutMs);
    });
    try {
      const outcome = await Promise.race([this.spawnOutcome, timeout]);
      if (outcome) {
        throw outcome;
      }
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }

  /**
   * Resolves once the process exits. With {@link timeoutMs} the promise
   * rejects when the process is still alive after the delay.
   */
  async waitForExit(timeoutMs?: number): Promise<WorkerExitEvent> {
    if (timeoutMs === undefined) {
      return this.exitPromise;
    }
    const event = await this.exitWithin(timeoutMs);
    if (!event) {
      throw new Error(`Timed out waiting for worker '${this.name}' to exit`);
    }
    return event;
  }

  /**
   * Ends the request channel, signals the worker and waits for it to exit.
   * Escalates to SIGKILL when the grace period elapses and gives up after a
   * second grace period, reporting the process as abandoned. Concurrent
   * callers share the same termination.
   */
  terminate(options: WorkerTerminateOptions = {}): Promise<WorkerTerminationResult> {
    if (!this.termination) {
      this.termination = this.performTermination(options);
    }
    return this.termination;
  }

  private async performTermination(options: WorkerTerminateOptions): Promise<WorkerTerminationResult> {
    const { signal = "SIGTERM", timeoutMs = this.shutdownTimeoutMs } = options;
    const started = Date.now();

    if (this.exitEvent) {
      return { ...this.describeExit(this.exitEvent), abandoned: false, durationMs: 0 };
    }

    this.logger.debug("worker_terminate_requested", { worker: this.name, pid: this.pid, signal, timeout_ms: timeoutMs });
    if (!this.child.stdin.writableEnded) {
      this.child.stdin.end();
    }
    if (signal === "SIGKILL") {
      this.forcedKill = true;
    }
    this.sendSignal(signal);

    let exit = await this.exitWithin(timeoutMs);
    if (!exit && signal !== "SIGKILL") {
      this.forcedKill = true;
      this.logger.warn("worker_shutdown_timeout", { worker: this.name, pid: this.pid, signal, timeout_ms: timeoutMs });
      this.sendSignal("SIGKILL");
      exit = await this.exitWithin(timeoutMs);
    }

    const durationMs = Date.now() - started;
    if (!exit) {
      this.logger.error("worker_kill_unconfirmed", { worker: this.name, pid: this.pid, duration_ms: durationMs });
      return { code: null, signal: null, forced: true, abandoned: true, durationMs };
    }

    this.logger.info("worker_terminated", {
      worker: this.name,
      pid: this.pid,
      code: exit.code,
      signal: exit.signal,
      forced: exit.forced,
      duration_ms: durationMs,
    });
    return { ...this.describeExit(exit), abandoned: false, durationMs };
  }

  private describeExit(event: WorkerExitEvent): Pick<WorkerTerminationResult, "code" | "signal" | "forced"> {
    return { code: event.code, signal: event.signal, forced: event.forced };
  }

  private sendSignal(signal: NodeJS.Signals): void {
    try {
      this.child.kill(signal);
    } catch (error) {
      this.logger.warn("worker_signal_failed", { worker: this.name, pid: this.pid, signal, error });
      throw error;
    }
  }

  /** Resolves with the exit event, or `null` when {@link timeoutMs} elapses first. */
  private async exitWithin(timeoutMs: number): Promise<WorkerExitEvent | null> {
    let timer: NodeJS.Timeout | null = null;
    const timeout = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), Math.max(0, timeoutMs));
    });
    try {
      return await Promise.race([this.exitPromise, timeout]);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }

  private recordExit(code: number | null, signal: NodeJS.Signals | null, error: Error | null): void {
    if (this.exitEvent) {
      return;
    }
    const event: WorkerExitEvent = { code, signal, at: Date.now(), forced: this.forcedKill, error };
    this.exitEvent = event;
    this.flushStderr();
    this.resolveExit?.(event);
    this.emit("exit", event);
  }

  private setupListeners(): void {
    this.child.once("spawn", () => {
      this.settleSpawn?.(null);
    });

    this.child.on("error", (error: Error) => {
      this.settleSpawn?.(error);
      this.logger.warn("worker_process_error", { worker: this.name, pid: this.pid, error });
      this.recordExit(null, null, error);
    });

    this.child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      this.logger.debug("worker_exit", { worker: this.name, pid: this.pid, code, signal });
      this.recordExit(code, signal, null);
    });

    // Some failure modes only surface through `close`.
    this.child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
      this.recordExit(code, signal, null);
    });

    this.child.stdin.on("error", (error: Error) => {
      this.logger.debug("worker_stdin_error", { worker: this.name, pid: this.pid, error });
    });
    this.child.stdout.on("error", (error: Error) => {
      this.logger.debug("worker_stdout_error", { worker: this.name, pid: this.pid, error });
    });

    this.child.stderr.setEncoding("utf8");
    this.child.stderr.on("data", (chunk: string) => {
      this.consumeStderr(chunk);
    });
    this.child.stderr.on("end", () => {
      this.flushStderr();
    });
  }

  private consumeStderr(chunk: string): void {
    this.stderrBuffer += chunk;
    let newlineIndex = this.stderrBuffer.indexOf("\n");
    while (newlineIndex !== -1) {
      const rawLine = this.stderrBuffer.slice(0, newlineIndex);
      this.stderrBuffer = this.stderrBuffer.slice(newlineIndex + 1);
      this.recordStderrLine(rawLine);
      newlineIndex = this.stderrBuffer.indexOf("\n");
    }
  }

  private flushStderr(): void {
    if (this.stderrBuffer.length > 0) {
      this.recordStderrLine(this.stderrBuffer);
      this.stderrBuffer = "";
    }
  }

  private recordStderrLine(line: string): void {
    const cleaned = line.replace(/\r$/, "");
    if (!cleaned.trim()) {
      return;
    }
    this.stderrTail.push(cleaned);
    if (this.stderrTail.length > STDERR_TAIL_SIZE) {
      this.stderrTail.splice(0, this.stderrTail.length - STDERR_TAIL_SIZE);
    }
    this.logger.debug("worker_stderr", { worker: this.name, line: cleaned });
  }
}

/**
 * Spawns the worker described by {@link config} and waits for the OS to
 * confirm the process started. Any failure is reported as a
 * {@link LaunchError}; a process that never confirmed its start is killed.
 */
export async function launchWorker(config: WorkerConfig, options: LaunchWorkerOptions = {}): Promise<WorkerProcess> {
  const gateway = options.gateway ?? defaultChildProcessGateway;
  const logger = options.logger ?? new StructuredLogger({ stream: null });
  const launchTimeoutMs = options.launchTimeoutMs ?? DEFAULT_TIMEOUTS.launchTimeoutMs;

  let child: WorkerChildProcess;
  try {
    child = gateway.spawn({
      command: config.command,
      args: config.args,
      envOverrides: config.env ?? {},
      ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
    });
  } catch (error) {
    logger.error("worker_launch_failed", { worker: config.name, command: config.command, error });
    throw new LaunchError(config.name, config.command, error);
  }

  const worker = new WorkerProcess({
    config,
    child,
    logger,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULT_TIMEOUTS.shutdownTimeoutMs,
  });

  try {
    await worker.waitUntilSpawned(launchTimeoutMs);
  } catch (error) {
    logger.error("worker_launch_failed", { worker: config.name, command: config.command, error });
    await worker.terminate({ signal: "SIGKILL" }).catch((terminationError: unknown) => {
      logger.warn("worker_launch_cleanup_failed", { worker: config.name, error: terminationError });
    });
    throw new LaunchError(config.name, config.command, error);
  }

  logger.info("worker_launched", {
    worker: config.name,
    pid: worker.pid,
    command: config.command,
    args: config.args,
    env_keys: Object.keys(config.env ?? {}).sort(),
  });
  return worker;
}
