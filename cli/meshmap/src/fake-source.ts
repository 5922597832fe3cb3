import { MeshSession } from "./collector.js";
import { sleep } from "./util.js";

type RawRecord = Record<string, unknown>;

export type FakeRegistry = {
  devices?: unknown[];
  entities?: unknown[];
  states?: unknown[];
};

type BulkKind = "devices" | "entities" | "states";

/** In-memory mesh source for tests. */
export class FakeSource implements MeshSession {
  readonly hang = new Set<string>();
  readonly fail = new Set<string>();
  readonly failBulk = new Set<BulkKind>();
  failListing = false;
  delayMs = 0;
  closed = 0;
  scans = 0;
  inFlight = 0;
  maxInFlight = 0;

  constructor(public devices: RawRecord[], public registry: FakeRegistry = {}) {}

  async listNodeIds(): Promise<string[]> {
    if (this.failListing) throw new Error("listing refused");
    return this.devices.map((d) => (typeof d.ieee === "string" ? d.ieee : ""));
  }

  async fetchNode(id: string): Promise<unknown> {
    if (this.hang.has(id)) return new Promise<unknown>(() => undefined);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs) await sleep(this.delayMs);
      if (this.fail.has(id)) throw new Error(`node ${id} unreachable`);
      const device = this.devices.find((d) => d.ieee === id);
      if (!device) throw new Error(`unknown node ${id}`);
      return structuredClone(device);
    } finally {
      this.inFlight -= 1;
    }
  }

  private async bulk(kind: BulkKind, rows: unknown[] | undefined): Promise<unknown> {
    if (this.failBulk.has(kind)) throw new Error(`${kind} unavailable`);
    return structuredClone(rows ?? []);
  }

  fetchDeviceRegistry(): Promise<unknown> {
    return this.bulk("devices", this.registry.devices);
  }

  fetchEntityRegistry(): Promise<unknown> {
    return this.bulk("entities", this.registry.entities);
  }

  fetchStates(): Promise<unknown> {
    return this.bulk("states", this.registry.states);
  }

  requestScan(): Promise<void> {
    this.scans += 1;
    return new Promise<void>(() => undefined);
  }

  close() {
    this.closed += 1;
  }
}

export const ROOT_IEEE = "aa:00:00:00:00:00:00:01";
export const RELAY_IEEE = "aa:00:00:00:00:00:00:02";
export const LEAF_IEEE = "aa:00:00:00:00:00:00:03";

/**
 * Coordinator, one router with an active route to it, and an end device
 * that only the router reports (LQI 200).
 */
export function smallMesh(): FakeSource {
  const devices: RawRecord[] = [
    {
      ieee: ROOT_IEEE,
      nwk: "0x0000",
      device_type: "Coordinator",
      manufacturer: "Acme",
      model: "Stick",
      neighbors: [{ ieee: RELAY_IEEE, nwk: "0x1a2b", lqi: 120, relationship: "Child", device_type: "Router" }],
      routes: [],
    },
    {
      ieee: RELAY_IEEE,
      nwk: "0x1a2b",
      device_type: "Router",
      name: "Plug",
      user_given_name: "Hall plug",
      lqi: 180,
      neighbors: [{ ieee: LEAF_IEEE, nwk: "0x3c4d", lqi: 200, relationship: "Child", device_type: "EndDevice" }],
      routes: [{ dest_nwk: "0x0000", next_hop: "0x0000", route_status: "Active" }],
    },
    {
      ieee: LEAF_IEEE,
      nwk: "0x3c4d",
      device_type: "EndDevice",
      name: "Door sensor",
      lqi: 40,
      neighbors: [],
      routes: [],
    },
  ];
  return new FakeSource(devices, {
    devices: [
      { id: "dev-relay", identifiers: [["zha", RELAY_IEEE.toUpperCase()]], name_by_user: null },
      { id: "dev-other", identifiers: [["mqtt", "x"]], name_by_user: null },
    ],
    entities: [
      { entity_id: "switch.hall_plug", device_id: "dev-relay", platform: "zha" },
      { entity_id: "sensor.orphan", device_id: "dev-missing", platform: "zha" },
      { entity_id: "sun.sun", device_id: null, platform: "sun" },
    ],
    states: [{ entity_id: "switch.hall_plug", state: "on", attributes: { friendly_name: "Hall plug switch" } }],
  });
}
