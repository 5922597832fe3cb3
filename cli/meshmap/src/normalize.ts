import { z } from "zod";
import { ValidationError } from "./errors.js";
import {
  DeviceContainer,
  MeshNode,
  NeighborObservation,
  NeighborRelationship,
  NodeRole,
  ObservedRole,
  RawEntity,
  RouteEntry,
} from "./schema.js";
import { asNumber, compareIds, normalizeHardwareId, parseNwk } from "./util.js";

const numberish = z.union([z.number(), z.string()]).nullish();

const neighborSchema = z
  .object({
    ieee: z.string().min(1),
    nwk: numberish,
    lqi: numberish,
    relationship: z.string().nullish(),
    device_type: z.string().nullish(),
  })
  .passthrough();

const routeSchema = z
  .object({
    dest_nwk: numberish,
    next_hop: numberish,
    route_status: z.string().nullish(),
  })
  .passthrough();

const deviceSchema = z
  .object({
    ieee: z.string().min(1),
    nwk: numberish,
    device_type: z.string().nullish(),
    manufacturer: z.string().nullish(),
    model: z.string().nullish(),
    name: z.string().nullish(),
    user_given_name: z.string().nullish(),
    last_seen: z.union([z.string(), z.number()]).nullish(),
    available: z.boolean().nullish(),
    lqi: numberish,
    rssi: numberish,
    neighbors: z.array(neighborSchema).nullish(),
    routes: z.array(routeSchema).nullish(),
  })
  .passthrough();

export type ControllerDevice = z.infer<typeof deviceSchema>;

const deviceRegistrySchema = z
  .object({
    id: z.string().min(1),
    identifiers: z.array(z.array(z.union([z.string(), z.number()]))).nullish(),
    name_by_user: z.string().nullish(),
    name: z.string().nullish(),
  })
  .passthrough();

const entityRegistrySchema = z
  .object({
    entity_id: z.string().min(1),
    device_id: z.string().nullish(),
    platform: z.string().nullish(),
    name: z.string().nullish(),
    original_name: z.string().nullish(),
  })
  .passthrough();

const stateSchema = z
  .object({
    entity_id: z.string().min(1),
    state: z.string(),
    attributes: z.object({ friendly_name: z.string().nullish() }).passthrough().nullish(),
  })
  .passthrough();

export type ControllerState = z.infer<typeof stateSchema>;

/** Integration whose identifiers carry the mesh hardware address. */
export const MESH_INTEGRATION = "zha";

const ROOT_NWK = 0x0000;

const ROUTE_STATUS_STALENESS: Record<string, number> = {
  active: 0,
  validation_underway: 1,
  discovery_underway: 2,
  inactive: 3,
  discovery_failed: 3,
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown, label: string): z.infer<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`invalid ${label}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

export function parseDevice(raw: unknown): ControllerDevice {
  return parseWith(deviceSchema, raw, "device");
}

export function deviceRole(deviceType: string | null | undefined): NodeRole {
  const t = (deviceType ?? "").toLowerCase();
  if (t === "coordinator") return "root";
  if (t === "router") return "relay";
  return "leaf";
}

function observedRole(deviceType: string | null | undefined): ObservedRole {
  const t = (deviceType ?? "").toLowerCase();
  if (t === "coordinator") return "root";
  if (t === "router") return "relay";
  if (t === "enddevice" || t === "end_device") return "leaf";
  return "unknown";
}

function relationship(raw: string | null | undefined): NeighborRelationship {
  const r = (raw ?? "").toLowerCase();
  if (r === "parent") return "parent";
  if (r === "child") return "child";
  if (r === "sibling") return "sibling";
  if (r === "previous_child" || r === "previouschild") return "previous_child";
  return "unknown";
}

export function routeStaleness(status: string | null | undefined): number {
  const key = (status ?? "").toLowerCase();
  return ROUTE_STATUS_STALENESS[key] ?? 3;
}

function parseLqi(value: string | number | null | undefined): number | null {
  if (value == null || value === "") return null;
  const n = asNumber(value, Number.NaN);
  return Number.isFinite(n) ? Math.round(n) : null;
}

function parseLastSeen(value: string | number | null | undefined): number | null {
  if (value == null) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const ms = Date.parse(value);
  return Number.isFinite(ms) ? ms : null;
}

function formatNwk(nwk: number) {
  return `0x${nwk.toString(16).padStart(4, "0")}`;
}

/**
 * Turns the controller's device payloads into mesh nodes.
 *
 * Route next hops are given as short addresses; they are resolved to hardware
 * ids against the whole device set, so this runs only once every device has
 * been fetched. A next hop that matches no device keeps its short address as
 * its id and shows up later as a dangling reference.
 */
export function buildNodes(devices: readonly ControllerDevice[]): MeshNode[] {
  const facts = (d: ControllerDevice) => (d.neighbors?.length ?? 0) + (d.routes?.length ?? 0);
  const sorted = [...devices].sort(
    (a, b) =>
      compareIds(normalizeHardwareId(a.ieee), normalizeHardwareId(b.ieee)) ||
      facts(b) - facts(a) ||
      compareIds(JSON.stringify(a), JSON.stringify(b))
  );

  const coordinators = sorted.filter((d) => deviceRole(d.device_type) === "root");
  const rootId = coordinators.length ? normalizeHardwareId(coordinators[0].ieee) : null;

  const nwkToId = new Map<number, string>();
  for (const device of sorted) {
    const nwk = parseNwk(device.nwk);
    if (nwk != null && !nwkToId.has(nwk)) nwkToId.set(nwk, normalizeHardwareId(device.ieee));
  }
  if (rootId) nwkToId.set(ROOT_NWK, rootId);

  const seen = new Set<string>();
  const nodes: MeshNode[] = [];

  for (const device of sorted) {
    const id = normalizeHardwareId(device.ieee);
    if (seen.has(id)) continue;
    seen.add(id);

    let role = deviceRole(device.device_type);
    // Only one anchor per graph; extra coordinators still forward traffic.
    if (role === "root" && id !== rootId) role = "relay";

    const neighbors: NeighborObservation[] = [];
    let parent: string | null = null;
    for (const n of device.neighbors ?? []) {
      const observed = normalizeHardwareId(n.ieee);
      if (observed === id) continue;
      const rel = relationship(n.relationship);
      neighbors.push({
        observer: id,
        observed,
        lqi: parseLqi(n.lqi) ?? 0,
        observedRole: observedRole(n.device_type),
        relationship: rel,
      });
      if (rel === "parent" && parent == null) parent = observed;
    }
    neighbors.sort((a, b) => compareIds(a.observed, b.observed));

    const routes: RouteEntry[] = [];
    for (const r of device.routes ?? []) {
      if (parseNwk(r.dest_nwk) !== ROOT_NWK) continue;
      const hop = parseNwk(r.next_hop);
      if (hop == null) continue;
      routes.push({
        node: id,
        nextHop: nwkToId.get(hop) ?? formatNwk(hop),
        staleness: routeStaleness(r.route_status),
      });
    }

    nodes.push({
      id,
      nwk: parseNwk(device.nwk),
      role,
      lastSeen: parseLastSeen(device.last_seen),
      manufacturer: device.manufacturer ?? "Unknown",
      model: device.model ?? "Unknown",
      name: device.user_given_name || device.name || id,
      available: device.available ?? true,
      lqi: parseLqi(device.lqi),
      rssi: parseLqi(device.rssi),
      neighbors,
      routes,
      parent,
    });
  }

  return nodes;
}

export function parseDeviceRegistry(raw: unknown): { devices: DeviceContainer[]; errors: string[] } {
  const devices: DeviceContainer[] = [];
  const errors: string[] = [];
  for (const entry of Array.isArray(raw) ? raw : []) {
    const parsed = deviceRegistrySchema.safeParse(entry);
    if (!parsed.success) {
      errors.push(`device registry entry: ${formatIssues(parsed.error).join("; ")}`);
      continue;
    }
    let hardwareId: string | null = null;
    for (const pair of parsed.data.identifiers ?? []) {
      if (pair.length >= 2 && pair[0] === MESH_INTEGRATION) {
        hardwareId = normalizeHardwareId(String(pair[1]));
        break;
      }
    }
    devices.push({
      id: parsed.data.id,
      hardwareId,
      nameByUser: parsed.data.name_by_user ?? null,
    });
  }
  return { devices, errors };
}

/**
 * Joins entity registry entries owned by the mesh integration with their live
 * state. Entries of other integrations are skipped, not counted.
 */
export function parseEntities(
  registryRaw: unknown,
  statesRaw: unknown
): { entities: RawEntity[]; errors: string[] } {
  const errors: string[] = [];
  const states = new Map<string, ControllerState>();
  for (const entry of Array.isArray(statesRaw) ? statesRaw : []) {
    const parsed = stateSchema.safeParse(entry);
    if (parsed.success) states.set(parsed.data.entity_id, parsed.data);
  }

  const entities: RawEntity[] = [];
  for (const entry of Array.isArray(registryRaw) ? registryRaw : []) {
    const parsed = entityRegistrySchema.safeParse(entry);
    if (!parsed.success) {
      errors.push(`entity registry entry: ${formatIssues(parsed.error).join("; ")}`);
      continue;
    }
    const reg = parsed.data;
    if (reg.platform !== MESH_INTEGRATION) continue;
    const state = states.get(reg.entity_id);
    entities.push({
      entityId: reg.entity_id,
      name: state?.attributes?.friendly_name || reg.name || reg.original_name || reg.entity_id,
      state: state?.state ?? "unknown",
      deviceId: reg.device_id ?? null,
    });
  }
  entities.sort((a, b) => compareIds(a.entityId, b.entityId));
  return { entities, errors };
}
