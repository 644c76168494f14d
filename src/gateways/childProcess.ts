/**
 * Gateway responsible for spawning worker processes. The factory validates the
 * command line, builds the child environment from an allow-list plus explicit
 * overrides and guarantees piped stdio so sessions always get a channel.
 */
import { spawn as nodeSpawn, type SpawnOptions } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable, Writable } from "node:stream";


/**
 * Variables inherited from the coordinator environment by default. Anything
 * else must be passed explicitly through the worker configuration.
 */
export const DEFAULT_INHERITED_ENV_KEYS: readonly string[] =
  process.platform === "win32"
    ? [
        "APPDATA",
        "HOMEDRIVE",
        "HOMEPATH",
        "LOCALAPPDATA",
        "PATH",
        "PATHEXT",
        "PROCESSOR_ARCHITECTURE",
        "SYSTEMDRIVE",
        "SYSTEMROOT",
        "TEMP",
        "USERNAME",
        "USERPROFILE",
      ]
    : ["HOME", "LOGNAME", "PATH", "SHELL", "TERM", "USER"];

/**
 * Structural view of a spawned worker process. Real `ChildProcess` instances
 * spawned with piped stdio satisfy it; tests provide in-process doubles.
 */
export interface WorkerChildProcess extends EventEmitter {
  readonly pid?: number | undefined;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
}

/** Options accepted by {@link ChildProcessGateway.spawn}. */
export interface SpawnWorkerOptions {
  /** Executable name or absolute path. Must not be empty. */
  readonly command: string;
  /** Ordered list of arguments forwarded as-is. */
  readonly args?: readonly string[];
  /** Optional working directory of the child process. */
  readonly cwd?: string;
  /** Keys copied from {@link inheritEnv}; defaults to {@link DEFAULT_INHERITED_ENV_KEYS}. */
  readonly inheritedEnvKeys?: readonly string[];
  /** Snapshot of the environment to inherit from (defaults to {@link process.env}). */
  readonly inheritEnv?: NodeJS.ProcessEnv;
  /** Explicit overrides, applied after the inherited keys. */
  readonly envOverrides?: Readonly<Record<string, string>>;
}

/** Contract exposed by the gateway. May throw synchronously on invalid input. */
export interface ChildProcessGateway {
  spawn(options: SpawnWorkerOptions): WorkerChildProcess;
}

/** Error raised when the requested command name is invalid. */
export class InvalidChildProcessCommandError extends Error {
  constructor(command: string) {
    super(`Child process command must be a non-empty string. Received: "${command}".`);
    this.name = "InvalidChildProcessCommandError";
  }
}

/** Error raised when an argument is not a valid string. */
export class InvalidChildProcessArgumentError extends TypeError {
  constructor(value: unknown, index: number) {
    super(`Child process arguments must be NUL-free strings. Argument at index ${index} is invalid (${typeof value}).`);
    this.name = "InvalidChildProcessArgumentError";
  }
}

/** Error raised when the spawned process does not expose piped stdio. */
export class MissingStdioError extends Error {
  constructor(command: string) {
    super(`Child process "${command}" was spawned without piped stdin/stdout/stderr.`);
    this.name = "MissingStdioError";
  }
}

/** Process returned by a {@link SpawnImplementation}; stdio may be missing. */
export interface SpawnedProcess extends EventEmitter {
  readonly pid?: number | undefined;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

/** Signature of the spawn function used by the gateway; Node's `spawn` satisfies it. */
export type SpawnImplementation = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedProcess;

interface ChildProcessGatewayDeps {
  /** Concrete spawn implementation (defaults to Node.js {@link nodeSpawn}). */
  readonly spawnImpl?: SpawnImplementation;
}

/**
 * Factory returning the child process gateway. Tests can inject a mock
 * {@link ChildProcessGatewayDeps.spawnImpl} to observe the wiring without
 * launching real commands.
 */
export function createChildProcessGateway({ spawnImpl = nodeSpawn }: ChildProcessGatewayDeps = {}): ChildProcessGateway {
  return {
    spawn(options: SpawnWorkerOptions): WorkerChildProcess {
      const command = options.command;
      if (typeof command !== "string" || command.trim().length === 0 || command.includes("\u0000")) {
        throw new InvalidChildProcessCommandError(command);
      }

      const spawnOptions: SpawnOptions = {
        env: buildWorkerEnv({
          inheritedKeys: options.inheritedEnvKeys ?? DEFAULT_INHERITED_ENV_KEYS,
          inheritEnv: options.inheritEnv ?? process.env,
          overrides: options.envOverrides ?? {},
        }),
        stdio: ["pipe", "pipe", "pipe"],
        shell: false,
        windowsHide: true,
        ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
      };

      const child = spawnImpl(command, normaliseArgs(options.args), spawnOptions);
      const { stdin, stdout, stderr } = child;
      if (!stdin || !stdout || !stderr) {
        child.kill("SIGKILL");
        throw new MissingStdioError(command);
      }

      // Re-expose the piped streams with their non-null types while keeping
      // the process itself as the event source.
      return Object.assign(child, { stdin, stdout, stderr });
    },
  };
}

/**
 * Ensures the argument list exclusively contains strings and returns a copy so
 * later mutations by the caller do not leak into the spawned process.
 */
function normaliseArgs(args: SpawnWorkerOptions["args"]): readonly string[] {
  if (args === undefined) {
    return [];
  }
  if (!Array.isArray(args)) {
    throw new InvalidChildProcessArgumentError(args, -1);
  }
  return args.map((value: unknown, index) => {
    if (typeof value !== "string" || value.includes("\u0000")) {
      throw new InvalidChildProcessArgumentError(value, index);
    }
    return value;
  });
}

interface BuildEnvOptions {
  readonly inheritedKeys: readonly string[];
  readonly inheritEnv: NodeJS.ProcessEnv;
  readonly overrides: Readonly<Record<string, string>>;
}

/** Produces the child environment: allow-listed inherited keys, then overrides. */
export function buildWorkerEnv({ inheritedKeys, inheritEnv, overrides }: BuildEnvOptions): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  for (const key of inheritedKeys) {
    const inherited = inheritEnv[key];
    if (inherited !== undefined) {
      env[key] = inherited;
    }
  }
  for (const [key, value] of Object.entries(overrides)) {
    env[key] = value;
  }
  return env;
}
