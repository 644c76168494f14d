import { NotInitializedError } from "../errors.js";
import { StructuredLogger } from "../logger.js";

/** Cleanup action registered with {@link ResourceScope.defer}. */
export type ReleaseAction = () => Promise<unknown> | unknown;

export interface ScopeReleaseFailure {
  label: string;
  error: unknown;
}

/** Summary returned when the scope is closed. */
export interface ScopeReleaseReport {
  /** Labels of the actions that completed, in release order. */
  released: string[];
  failures: ScopeReleaseFailure[];
}

/** Releases one registered resource ahead of the scope. Resolves with the failure, if any. */
export type EarlyRelease = () => Promise<ScopeReleaseFailure | null>;

interface ScopeEntry {
  readonly id: number;
  readonly label: string;
  readonly action: ReleaseAction;
}

/**
 * Collects cleanup actions and releases them in reverse registration order.
 * A failing action never prevents the remaining ones from running; failures
 * are logged and reported once the scope is closed.
 */
export class ResourceScope {
  private readonly logger: StructuredLogger;
  private readonly entries: ScopeEntry[] = [];
  private nextId = 0;
  private closed = false;

  constructor(logger: StructuredLogger = new StructuredLogger({ stream: null })) {
    this.logger = logger;
  }

  get size(): number {
    return this.entries.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Registers {@link action}. The returned handle releases the resource early
   * and removes it from the scope; calling it twice is a no-op.
   */
  defer(label: string, action: ReleaseAction): EarlyRelease {
    if (this.closed) {
      throw new NotInitializedError(`register '${label}'`, "the resource scope is already closed");
    }
    const entry: ScopeEntry = { id: this.nextId++, label, action };
    this.entries.push(entry);

    return async () => {
      const index = this.entries.findIndex((candidate) => candidate.id === entry.id);
      if (index === -1) {
        return null;
      }
      this.entries.splice(index, 1);
      return this.release(entry);
    };
  }

  /** Releases every registered action, newest first. Later calls return an empty report. */
  async close(): Promise<ScopeReleaseReport> {
    if (this.closed) {
      return { released: [], failures: [] };
    }
    this.closed = true;

    const report: ScopeReleaseReport = { released: [], failures: [] };
    while (this.entries.length > 0) {
      const entry = this.entries.pop();
      if (!entry) {
        break;
      }
      const failure = await this.release(entry);
      if (failure) {
        report.failures.push(failure);
      } else {
        report.released.push(entry.label);
      }
    }

    this.logger.info("scope_closed", { released: report.released.length, failures: report.failures.length });
    return report;
  }

  private async release(entry: ScopeEntry): Promise<ScopeReleaseFailure | null> {
    try {
      await entry.action();
      return null;
    } catch (error) {
      this.logger.warn("scope_release_failed", { label: entry.label, error });
      return { label: entry.label, error };
    }
  }
}
