import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { listExports } from "./archive.js";
import { FakeSource, LEAF_IEEE, RELAY_IEEE, ROOT_IEEE, smallMesh } from "./fake-source.js";
import { MeshmapServer } from "./server.js";

describe("MeshmapServer", () => {
  let dir: string;
  let server: MeshmapServer;
  let source: FakeSource;
  let refuse: boolean;
  let base: string;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), "meshmap-server-"));
    source = smallMesh();
    refuse = false;
    server = new MeshmapServer({
      port: 0,
      host: "127.0.0.1",
      dataDir: dir,
      connect: async () => {
        if (refuse) throw new Error("ECONNREFUSED");
        return source;
      },
      collect: { timeoutMs: 2000 },
      autoRefreshMinutes: 0,
      refreshOnStart: false,
    });
    await server.start();
    base = `http://127.0.0.1:${server.address().port}`;
  });

  afterEach(async () => {
    await server.stop();
    rmSync(dir, { recursive: true, force: true });
  });

  async function call(path: string, init?: RequestInit) {
    const res = await fetch(`${base}${path}`, init);
    const body: unknown = await res.json();
    return { status: res.status, body };
  }

  function post(path: string, payload: unknown) {
    return call(path, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: typeof payload === "string" ? payload : JSON.stringify(payload),
    });
  }

  it("answers health checks before any refresh", async () => {
    const { status, body } = await call("/health");
    expect(status).toBe(200);
    expect(body).toMatchObject({ ok: true, has_snapshot: false });
  });

  it("serves an empty topology until the first refresh", async () => {
    const { body } = await call("/api/topology");
    expect(body).toMatchObject({ rootId: null, nodes: [], edges: [], fetched_at: null, error_count: 0 });
  });

  it("refreshes on request and serves the fused graph", async () => {
    const refreshed = await post("/api/refresh?wait=1", {});
    expect(refreshed.status).toBe(200);
    expect(refreshed.body).toMatchObject({ ok: true, node_count: 3, edge_count: 2, error_count: 0, dropped_entities: 1 });

    const { body } = await call("/api/topology");
    expect(body).toMatchObject({
      rootId: ROOT_IEEE,
      edges: [
        { source: RELAY_IEEE, target: ROOT_IEEE, kind: "route" },
        { source: LEAF_IEEE, target: RELAY_IEEE, kind: "neighbor", lqi: 200 },
      ],
      refreshing: false,
      last_error: null,
    });
    expect(listExports(dir)).toHaveLength(1);
    expect(source.closed).toBe(1);
  });

  it("accepts a refresh without waiting", async () => {
    const { status, body } = await post("/api/refresh", {});
    expect(status).toBe(202);
    expect(body).toEqual({ ok: true, refreshing: true });
    await expect(server.cache.refresh()).resolves.toMatchObject({ errorCount: 0 });
  });

  it("reports a failed refresh next to the last good snapshot", async () => {
    await post("/api/refresh?wait=1", {});
    refuse = true;
    const failed = await post("/api/refresh?wait=1", {});
    expect(failed.status).toBe(502);
    expect(failed.body).toMatchObject({ ok: false, kind: "connection_failed" });

    const { body } = await call("/api/status");
    expect(body).toMatchObject({
      ok: false,
      node_count: 3,
      failures: 1,
      last_error: { kind: "connection_failed", message: "cannot open controller session: ECONNREFUSED" },
    });
  });

  it("stores positions and merges them into the topology", async () => {
    await post("/api/refresh?wait=1", {});
    const saved = await post("/api/positions", { id: RELAY_IEEE.toUpperCase(), x: 120, y: 40 });
    expect(saved).toEqual({
      status: 200,
      body: { ok: true, id: RELAY_IEEE, position: { x: 120, y: 40, space: "free" } },
    });

    const bulk = await post("/api/positions", {
      positions: { [LEAF_IEEE]: { x: 1, y: 2, space: "image:floor1.png" }, "aa:ff": { x: 0, y: 0 } },
    });
    expect(bulk.body).toEqual({ ok: true, saved: 2 });

    const { body } = await call("/api/topology");
    expect(body).toMatchObject({
      nodes: expect.arrayContaining([
        expect.objectContaining({ id: RELAY_IEEE, position: { x: 120, y: 40, space: "free" } }),
        expect.objectContaining({ id: ROOT_IEEE, position: null }),
      ]),
    });

    const listed = await call("/api/positions");
    expect(listed.body).toEqual({
      positions: {
        [RELAY_IEEE]: { x: 120, y: 40, space: "free" },
        [LEAF_IEEE]: { x: 1, y: 2, space: "image:floor1.png" },
        "aa:ff": { x: 0, y: 0, space: "free" },
      },
    });
  });

  it("resets positions per space", async () => {
    await post("/api/positions", { id: "aa:01", x: 1, y: 1 });
    await post("/api/positions", { id: "aa:02", x: 2, y: 2, space: "image:floor1.png" });
    const reset = await post("/api/positions/reset", {});
    expect(reset.body).toEqual({ ok: true, space: "free", removed: 1 });
    const { body } = await call("/api/positions");
    expect(body).toEqual({ positions: { "aa:02": { x: 2, y: 2, space: "image:floor1.png" } } });
  });

  it("rejects malformed position payloads", async () => {
    const missingId = await post("/api/positions", { x: 1, y: 1 });
    expect(missingId.status).toBe(400);
    expect(missingId.body).toMatchObject({ ok: false, kind: "invalid_input" });

    const badJson = await post("/api/positions", "{ nope");
    expect(badJson.status).toBe(400);

    const badCoords = await post("/api/positions", { id: "aa:01", x: "left", y: 1 });
    expect(badCoords.status).toBe(400);
  });

  it("answers an oversized body with 413", async () => {
    const huge = JSON.stringify({ id: "aa:01", x: 1, y: 1, note: "x".repeat(1024 * 1024) });
    const { status, body } = await post("/api/positions", huge);
    expect(status).toBe(413);
    expect(body).toEqual({ ok: false, error: "body too large" });
    expect(server.positions.all()).toEqual({});
  });

  it("summarizes the current snapshot", async () => {
    await post("/api/refresh?wait=1", {});
    const { body } = await call("/api/summary");
    expect(body).toMatchObject({
      devices: { total: 3, root: 1, relay: 1, leaf: 1 },
      weakDevices: [{ id: LEAF_IEEE, lqi: 40 }],
    });
  });

  it("answers unknown paths with 404", async () => {
    const { status } = await call("/api/nope");
    expect(status).toBe(404);
  });
});
