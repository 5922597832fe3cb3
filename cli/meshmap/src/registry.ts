import { DeviceContainer, EntityRecord, MeshNode, RawEntity } from "./schema.js";
import { compareIds } from "./util.js";

export type MatchResult = {
  byNode: Map<string, EntityRecord[]>;
  deviceRegistryIds: Map<string, string>;
  matched: number;
  dropped: number;
  droppedIds: string[];
};

/**
 * Attaches entities to nodes by following entity -> registry device ->
 * hardware identifier. Names are never consulted: an entity whose chain
 * breaks anywhere is dropped and counted.
 */
export function matchEntities(
  nodes: readonly MeshNode[],
  entities: readonly RawEntity[],
  devices: readonly DeviceContainer[]
): MatchResult {
  const nodeIds = new Set(nodes.map((n) => n.id));
  const containers = new Map<string, DeviceContainer>();
  for (const device of devices) containers.set(device.id, device);

  const byNode = new Map<string, EntityRecord[]>();
  const deviceRegistryIds = new Map<string, string>();
  const droppedIds: string[] = [];
  let matched = 0;

  for (const device of devices) {
    if (device.hardwareId && nodeIds.has(device.hardwareId) && !deviceRegistryIds.has(device.hardwareId)) {
      deviceRegistryIds.set(device.hardwareId, device.id);
    }
  }

  for (const entity of entities) {
    const container = entity.deviceId ? containers.get(entity.deviceId) : undefined;
    const nodeId = container?.hardwareId;
    if (!nodeId || !nodeIds.has(nodeId)) {
      droppedIds.push(entity.entityId);
      continue;
    }
    const list = byNode.get(nodeId) ?? [];
    list.push({ entityId: entity.entityId, name: entity.name, state: entity.state, nodeId });
    byNode.set(nodeId, list);
    matched += 1;
  }

  for (const list of byNode.values()) {
    list.sort((a, b) => compareIds(a.entityId, b.entityId));
  }
  droppedIds.sort(compareIds);

  return { byNode, deviceRegistryIds, matched, dropped: droppedIds.length, droppedIds };
}
