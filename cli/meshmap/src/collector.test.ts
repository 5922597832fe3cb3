import { describe, expect, it } from "vitest";
import { collect } from "./collector.js";
import { CollectionError, ConnectionError } from "./errors.js";
import { FakeSource, smallMesh } from "./fake-source.js";

function ieee(i: number) {
  return `ff:00:00:00:00:00:00:0${i}`;
}

function tenNodes(): FakeSource {
  const devices = Array.from({ length: 10 }, (_, i) => ({
    ieee: ieee(i),
    nwk: i,
    device_type: i === 0 ? "Coordinator" : "Router",
    neighbors: [],
    routes: i === 0 ? [] : [{ dest_nwk: 0, next_hop: 0, route_status: "Active" }],
  }));
  return new FakeSource(devices);
}

describe("collect", () => {
  it("collects nodes and entity facts", async () => {
    const source = smallMesh();
    const result = await collect(source, { timeoutMs: 2000 });
    expect(result.listed).toBe(3);
    expect(result.fetched).toBe(3);
    expect(result.errors).toBe(0);
    expect(result.timedOut).toBe(false);
    expect(result.nodes.map((n) => n.role)).toEqual(["root", "relay", "leaf"]);
    expect(result.entities.map((e) => e.entityId)).toEqual(["sensor.orphan", "switch.hall_plug"]);
    expect(result.devices).toHaveLength(2);
  });

  it("counts fetches abandoned at the deadline and keeps the rest", async () => {
    const source = tenNodes();
    for (const i of [7, 8, 9]) source.hang.add(ieee(i));
    const result = await collect(source, { timeoutMs: 150 });
    expect(result.errors).toBe(3);
    expect(result.fetched).toBe(7);
    expect(result.nodes).toHaveLength(7);
    expect(result.timedOut).toBe(true);
    expect(result.errorDetails).toHaveLength(3);
  });

  it("accepts exactly half of the listed nodes", async () => {
    const source = tenNodes();
    for (const i of [5, 6, 7, 8, 9]) source.fail.add(ieee(i));
    const result = await collect(source, { timeoutMs: 2000 });
    expect(result.nodes).toHaveLength(5);
    expect(result.errors).toBe(5);
  });

  it("fails when fewer than half of the nodes answer", async () => {
    const source = tenNodes();
    for (const i of [4, 5, 6, 7, 8, 9]) source.fail.add(ieee(i));
    const run = collect(source, { timeoutMs: 2000 });
    await expect(run).rejects.toBeInstanceOf(CollectionError);
    await expect(run).rejects.toMatchObject({ kind: "success_floor" });
  });

  it("reports a failed listing as a connection failure", async () => {
    const source = tenNodes();
    source.failListing = true;
    await expect(collect(source, { timeoutMs: 2000 })).rejects.toBeInstanceOf(ConnectionError);
  });

  it("treats an empty mesh as a valid collection", async () => {
    const result = await collect(new FakeSource([]), { timeoutMs: 2000 });
    expect(result.nodes).toEqual([]);
    expect(result.errors).toBe(0);
  });

  it("bounds concurrent node fetches", async () => {
    const source = tenNodes();
    source.delayMs = 10;
    await collect(source, { timeoutMs: 2000, concurrency: 2 });
    expect(source.maxInFlight).toBe(2);
  });

  it("counts a failed bulk fetch once and carries on", async () => {
    const source = smallMesh();
    source.failBulk.add("states");
    const result = await collect(source, { timeoutMs: 2000 });
    expect(result.errors).toBe(1);
    expect(result.entities.find((e) => e.entityId === "switch.hall_plug")).toEqual({
      entityId: "switch.hall_plug",
      name: "switch.hall_plug",
      state: "unknown",
      deviceId: "dev-relay",
    });
  });

  it("fires the scan request without waiting for it", async () => {
    const source = smallMesh();
    const result = await collect(source, { timeoutMs: 2000, scanWaitMs: 30_000 });
    expect(source.scans).toBe(1);
    expect(result.timedOut).toBe(false);
    expect(result.nodes).toHaveLength(3);
  });

  it("skips the scan request when no scan wait is configured", async () => {
    const source = smallMesh();
    await collect(source, { timeoutMs: 2000 });
    expect(source.scans).toBe(0);
  });
});
