import {
  Edge,
  EntityRecord,
  FusedGraph,
  FusionDiagnostics,
  GraphNode,
  MeshNode,
  NeighborObservation,
  UpstreamKind,
} from "./schema.js";
import { compareIds } from "./util.js";

/** Route entries staler than this (validation underway) are ignored. */
export const ROUTE_STALENESS_LIMIT = 1;

/** Both directions of a mutual observation must reach this LQI for a sibling edge. */
export const SIBLING_LQI_FLOOR = 100;

export type FusionAnnotations = {
  entitiesByNode?: ReadonlyMap<string, EntityRecord[]>;
  deviceRegistryIds?: ReadonlyMap<string, string>;
};

type Resolution = {
  target: string;
  kind: UpstreamKind;
  lqi: number | null;
};

const KIND_STRENGTH: Record<UpstreamKind, number> = {
  fallback: 0,
  neighbor: 1,
  parent: 2,
  route: 3,
};

/** Duplicate records of one id: the one carrying more facts wins, then the lower serialized form. */
function compareRecords(a: MeshNode, b: MeshNode) {
  const facts = (n: MeshNode) => n.routes.length + n.neighbors.length + (n.parent ? 1 : 0);
  return compareIds(a.id, b.id) || facts(b) - facts(a) || compareIds(JSON.stringify(a), JSON.stringify(b));
}

function reporterRank(role: MeshNode["role"] | undefined) {
  return role === "root" || role === "relay" ? 0 : 1;
}

/**
 * Fuses one cycle's node records into a tree rooted at the coordinator.
 *
 * Each non-root node gets exactly one upstream edge, chosen by route, then
 * declared parent, then the strongest report of the node by another node,
 * then a fallback straight to the root. Cycles among parent/neighbor choices
 * are broken by demoting one member to fallback; a final walk from the root
 * forces anything still unreached to fallback as well.
 *
 * The result depends only on the input set, never on its order.
 */
export function fuseTopology(input: readonly MeshNode[], annotations: FusionAnnotations = {}): FusedGraph {
  const byId = new Map<string, MeshNode>();
  for (const node of [...input].sort(compareRecords)) {
    if (!byId.has(node.id)) byId.set(node.id, node);
  }
  const ids = [...byId.keys()];
  const rootId = ids.find((id) => byId.get(id)?.role === "root") ?? null;

  const diagnostics: FusionDiagnostics = {
    missingRoot: rootId == null,
    cycles: [],
    demoted: [],
    forced: [],
    staleRoutes: 0,
    danglingRefs: 0,
  };

  // Reports of each node by the other nodes of this snapshot.
  const observationsOf = new Map<string, NeighborObservation[]>();
  const observed = new Map<string, number>();
  for (const id of ids) {
    const node = byId.get(id);
    if (!node) continue;
    for (const obs of node.neighbors) {
      if (obs.observed === id) continue;
      if (!byId.has(obs.observed)) {
        diagnostics.danglingRefs += 1;
        continue;
      }
      const list = observationsOf.get(obs.observed) ?? [];
      list.push({ ...obs, observer: id });
      observationsOf.set(obs.observed, list);
      const key = `${id}>${obs.observed}`;
      observed.set(key, Math.max(observed.get(key) ?? 0, obs.lqi));
    }
    for (const route of node.routes) {
      if (route.staleness > ROUTE_STALENESS_LIMIT) diagnostics.staleRoutes += 1;
      else if (!byId.has(route.nextHop)) diagnostics.danglingRefs += 1;
    }
    if (node.parent && !byId.has(node.parent)) diagnostics.danglingRefs += 1;
  }

  if (rootId == null) {
    return {
      rootId: null,
      nodes: ids.map((id) => toGraphNode(byId, id, null, [], annotations, false)),
      edges: [],
      diagnostics,
    };
  }

  const nonRoot = ids.filter((id) => id !== rootId);
  const resolved = new Map<string, Resolution>();
  const fallback = (): Resolution => ({ target: rootId, kind: "fallback", lqi: null });

  const routeHops = (node: MeshNode) =>
    node.routes
      .filter((r) => r.staleness <= ROUTE_STALENESS_LIMIT && r.nextHop !== node.id && byId.has(r.nextHop))
      .sort((a, b) => a.staleness - b.staleness || compareIds(a.nextHop, b.nextHop))
      .map((r) => r.nextHop);

  const chainToRoot = (id: string): string[] => {
    const chain: string[] = [];
    let cur = id;
    for (let guard = 0; guard <= ids.length && cur !== rootId; guard += 1) {
      const res = resolved.get(cur);
      if (!res) break;
      chain.push(res.target);
      cur = res.target;
    }
    return chain;
  };

  // 1. Routes, to a fixpoint: a next hop qualifies once it is anchored.
  let changed = true;
  while (changed) {
    changed = false;
    for (const id of nonRoot) {
      if (resolved.has(id)) continue;
      const node = byId.get(id);
      if (!node) continue;
      const hop = routeHops(node).find((h) => h === rootId || resolved.has(h));
      if (hop) {
        resolved.set(id, { target: hop, kind: "route", lqi: null });
        changed = true;
      }
    }
  }

  // 2. Declared parent, best report by another node, or fallback.
  for (const id of nonRoot) {
    if (resolved.has(id)) continue;
    const node = byId.get(id);
    if (!node) continue;
    if (node.parent && node.parent !== id && byId.has(node.parent)) {
      resolved.set(id, { target: node.parent, kind: "parent", lqi: null });
      continue;
    }
    const best = bestReporter(observationsOf.get(id) ?? [], byId);
    resolved.set(id, best ? { target: best.observer, kind: "neighbor", lqi: best.lqi } : fallback());
  }

  // 3. Break cycles: demote the weakest member of each loop.
  const demoted = new Set<string>();
  const state = new Map<string, "walking" | "done">();
  for (const start of nonRoot) {
    if (state.get(start) === "done") continue;
    const trail: string[] = [];
    let cur = start;
    while (cur !== rootId && state.get(cur) !== "done") {
      if (state.get(cur) === "walking") {
        const cycle = trail.slice(trail.indexOf(cur));
        const victim = pickVictim(cycle, resolved);
        resolved.set(victim, fallback());
        demoted.add(victim);
        diagnostics.cycles.push(rotateToLowest(cycle));
        break;
      }
      state.set(cur, "walking");
      trail.push(cur);
      const res = resolved.get(cur);
      if (!res) break;
      cur = res.target;
    }
    for (const id of trail) state.set(id, "done");
  }
  diagnostics.demoted = [...demoted].sort(compareIds);

  // 4. Upgrade to a route wherever its next hop is now anchored without
  //    passing back through the node.
  changed = true;
  while (changed) {
    changed = false;
    for (const id of nonRoot) {
      const current = resolved.get(id);
      if (!current || current.kind === "route" || demoted.has(id)) continue;
      const node = byId.get(id);
      if (!node) continue;
      const hop = routeHops(node).find((h) => h === rootId || !chainToRoot(h).includes(id));
      if (hop) {
        resolved.set(id, { target: hop, kind: "route", lqi: null });
        changed = true;
      }
    }
  }

  // 5. Reachability walk from the root.
  const children = new Map<string, string[]>();
  for (const id of nonRoot) {
    const res = resolved.get(id);
    if (!res) continue;
    const list = children.get(res.target) ?? [];
    list.push(id);
    children.set(res.target, list);
  }
  const reached = new Set<string>([rootId]);
  const queue = [rootId];
  while (queue.length) {
    const cur = queue.shift();
    if (cur == null) break;
    for (const child of children.get(cur) ?? []) {
      if (reached.has(child)) continue;
      reached.add(child);
      queue.push(child);
    }
  }
  for (const id of nonRoot) {
    if (reached.has(id)) continue;
    resolved.set(id, fallback());
    diagnostics.forced.push(id);
  }

  const edges: Edge[] = [];
  for (const id of nonRoot) {
    const res = resolved.get(id);
    if (!res) continue;
    edges.push({
      source: id,
      target: res.target,
      kind: res.kind,
      lqi: res.kind === "neighbor" ? res.lqi : null,
      directional: true,
    });
  }
  edges.push(...siblingEdges(ids, byId, observed, resolved));

  const nodes = ids.map((id) => {
    const res = resolved.get(id);
    return toGraphNode(byId, id, res ?? null, id === rootId ? [] : chainToRoot(id), annotations, id === rootId);
  });

  return { rootId, nodes, edges, diagnostics };
}

function bestReporter(
  reports: readonly NeighborObservation[],
  byId: ReadonlyMap<string, MeshNode>
): NeighborObservation | null {
  let best: NeighborObservation | null = null;
  for (const obs of reports) {
    if (!best) {
      best = obs;
      continue;
    }
    const byLqi = obs.lqi - best.lqi;
    const byRole = reporterRank(byId.get(best.observer)?.role) - reporterRank(byId.get(obs.observer)?.role);
    if (byLqi > 0 || (byLqi === 0 && byRole > 0) || (byLqi === 0 && byRole === 0 && obs.observer < best.observer)) {
      best = obs;
    }
  }
  return best;
}

function pickVictim(cycle: readonly string[], resolved: ReadonlyMap<string, Resolution>): string {
  return [...cycle].sort((a, b) => {
    const ka = KIND_STRENGTH[resolved.get(a)?.kind ?? "fallback"];
    const kb = KIND_STRENGTH[resolved.get(b)?.kind ?? "fallback"];
    return ka - kb || compareIds(a, b);
  })[0];
}

function rotateToLowest(cycle: readonly string[]): string[] {
  let start = 0;
  for (let i = 1; i < cycle.length; i += 1) {
    if (cycle[i] < cycle[start]) start = i;
  }
  return [...cycle.slice(start), ...cycle.slice(0, start)];
}

function siblingEdges(
  ids: readonly string[],
  byId: ReadonlyMap<string, MeshNode>,
  observed: ReadonlyMap<string, number>,
  resolved: ReadonlyMap<string, Resolution>
): Edge[] {
  const edges: Edge[] = [];
  for (const a of ids) {
    const node = byId.get(a);
    if (!node) continue;
    const others = [...new Set(node.neighbors.map((n) => n.observed))].sort(compareIds);
    for (const b of others) {
      if (b <= a || !byId.has(b)) continue;
      const ab = observed.get(`${a}>${b}`);
      const ba = observed.get(`${b}>${a}`);
      if (ab == null || ba == null) continue;
      if (ab < SIBLING_LQI_FLOOR || ba < SIBLING_LQI_FLOOR) continue;
      if (resolved.get(a)?.target === b || resolved.get(b)?.target === a) continue;
      edges.push({ source: a, target: b, kind: "sibling", lqi: Math.min(ab, ba), directional: false });
    }
  }
  return edges;
}

function toGraphNode(
  byId: ReadonlyMap<string, MeshNode>,
  id: string,
  res: Resolution | null,
  path: string[],
  annotations: FusionAnnotations,
  isRoot: boolean
): GraphNode {
  const node = byId.get(id);
  if (!node) throw new Error(`unknown node ${id}`);
  const entities = [...(annotations.entitiesByNode?.get(id) ?? [])].sort((a, b) => compareIds(a.entityId, b.entityId));
  return {
    id,
    name: node.name,
    role: isRoot ? "root" : node.role === "root" ? "relay" : node.role,
    nwk: node.nwk,
    manufacturer: node.manufacturer,
    model: node.model,
    available: node.available,
    lastSeen: node.lastSeen,
    lqi: node.lqi,
    rssi: node.rssi,
    deviceRegistryId: annotations.deviceRegistryIds?.get(id) ?? null,
    entities,
    upstream: res?.target ?? null,
    upstreamKind: res?.kind ?? null,
    depth: path.length,
    path,
    neighbors: node.neighbors,
    position: null,
  };
}
