import { describeError, ErrorKind } from "./errors.js";
import { createLogger } from "./log.js";
import { emptySnapshot, Snapshot } from "./schema.js";
import { nowMs } from "./util.js";

const log = createLogger("cache");

export type LastError = {
  message: string;
  kind: ErrorKind;
  at: number;
};

export type CacheStatus = {
  refreshing: boolean;
  fetchedAt: number | null;
  ageMs: number | null;
  errorCount: number;
  durationMs: number;
  droppedEntities: number;
  nodeCount: number;
  edgeCount: number;
  lastError: LastError | null;
  refreshes: number;
  failures: number;
};

type CacheOptions = {
  /** Called after each successful refresh with the new snapshot. */
  onSnapshot?: (snapshot: Snapshot) => void | Promise<void>;
};

/**
 * Holds the one current snapshot. Refreshes are single-flight: a call made
 * while a cycle is running joins it instead of starting another.
 */
export class SnapshotCache {
  private current: Snapshot = emptySnapshot();
  private inFlight: Promise<Snapshot> | null = null;
  private lastError: LastError | null = null;
  private refreshes = 0;
  private failures = 0;

  constructor(
    private readonly run: () => Promise<Snapshot>,
    private readonly options: CacheOptions = {}
  ) {}

  get(): Snapshot {
    return this.current;
  }

  isRefreshing(): boolean {
    return this.inFlight != null;
  }

  refresh(): Promise<Snapshot> {
    if (this.inFlight) return this.inFlight;
    const cycle = this.runCycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async runCycle(): Promise<Snapshot> {
    try {
      const next = await this.run();
      this.current = next;
      this.lastError = null;
      this.refreshes += 1;
      log.info(
        `snapshot updated: ${next.graph.nodes.length} nodes, ${next.graph.edges.length} edges, ` +
          `${next.errorCount} errors`
      );
      if (this.options.onSnapshot) {
        try {
          await this.options.onSnapshot(next);
        } catch (err) {
          log.error(`snapshot hook failed: ${describeError(err).message}`, err);
        }
      }
      return next;
    } catch (err) {
      const { message, kind } = describeError(err);
      this.lastError = { message, kind, at: nowMs() };
      this.failures += 1;
      log.error(`refresh failed (${kind}): ${message}; keeping previous snapshot`, err);
      throw err;
    }
  }

  /** Installs a snapshot restored at startup, unless a refresh already landed. */
  seed(snapshot: Snapshot) {
    if (this.current.fetchedAt != null && snapshot.fetchedAt != null && this.current.fetchedAt >= snapshot.fetchedAt) {
      return;
    }
    this.current = snapshot;
  }

  status(now = nowMs()): CacheStatus {
    const snap = this.current;
    return {
      refreshing: this.inFlight != null,
      fetchedAt: snap.fetchedAt,
      ageMs: snap.fetchedAt == null ? null : Math.max(0, now - snap.fetchedAt),
      errorCount: snap.errorCount,
      durationMs: snap.durationMs,
      droppedEntities: snap.droppedEntities,
      nodeCount: snap.graph.nodes.length,
      edgeCount: snap.graph.edges.length,
      lastError: this.lastError,
      refreshes: this.refreshes,
      failures: this.failures,
    };
  }
}
