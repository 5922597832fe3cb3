import { describe, expect, it, vi } from "vitest";
import { ConnectionError } from "./errors.js";
import { emptyGraph, Snapshot } from "./schema.js";
import { SnapshotCache } from "./snapshot-cache.js";

function snapshot(fetchedAt: number, errorCount = 0): Snapshot {
  return { graph: emptyGraph(), fetchedAt, errorCount, durationMs: 5, droppedEntities: 0 };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("SnapshotCache", () => {
  it("starts with a valid empty snapshot", () => {
    const cache = new SnapshotCache(async () => snapshot(1));
    expect(cache.get().fetchedAt).toBeNull();
    expect(cache.get().graph.nodes).toEqual([]);
    expect(cache.status().ageMs).toBeNull();
  });

  it("joins a refresh already in flight", async () => {
    const pending = deferred<Snapshot>();
    const run = vi.fn(() => pending.promise);
    const cache = new SnapshotCache(run);

    const first = cache.refresh();
    const second = cache.refresh();
    expect(second).toBe(first);
    expect(cache.status().refreshing).toBe(true);

    pending.resolve(snapshot(1000));
    await expect(first).resolves.toMatchObject({ fetchedAt: 1000 });
    expect(run).toHaveBeenCalledTimes(1);
    expect(cache.status().refreshing).toBe(false);
  });

  it("keeps the previous snapshot when a refresh fails", async () => {
    const run = vi
      .fn<() => Promise<Snapshot>>()
      .mockResolvedValueOnce(snapshot(1000, 2))
      .mockRejectedValueOnce(new ConnectionError("controller unreachable"));
    const cache = new SnapshotCache(run);

    await cache.refresh();
    await expect(cache.refresh()).rejects.toThrow("controller unreachable");

    expect(cache.get().fetchedAt).toBe(1000);
    const status = cache.status(4000);
    expect(status.ageMs).toBe(3000);
    expect(status.errorCount).toBe(2);
    expect(status.lastError).toMatchObject({ message: "controller unreachable", kind: "connection_failed" });
    expect(status.failures).toBe(1);
  });

  it("clears the last error after a successful refresh", async () => {
    const run = vi
      .fn<() => Promise<Snapshot>>()
      .mockRejectedValueOnce(new Error("boom"))
      .mockResolvedValueOnce(snapshot(2000));
    const cache = new SnapshotCache(run);

    await expect(cache.refresh()).rejects.toThrow("boom");
    expect(cache.status().lastError?.kind).toBe("internal");
    await cache.refresh();
    expect(cache.status().lastError).toBeNull();
  });

  it("hands each new snapshot to the hook", async () => {
    const onSnapshot = vi.fn();
    const cache = new SnapshotCache(async () => snapshot(3000), { onSnapshot });
    await cache.refresh();
    expect(onSnapshot).toHaveBeenCalledWith(expect.objectContaining({ fetchedAt: 3000 }));
  });

  it("seeds a restored snapshot only when it is newer", async () => {
    const cache = new SnapshotCache(async () => snapshot(5000));
    cache.seed(snapshot(1000));
    expect(cache.get().fetchedAt).toBe(1000);
    await cache.refresh();
    cache.seed(snapshot(2000));
    expect(cache.get().fetchedAt).toBe(5000);
  });
});
