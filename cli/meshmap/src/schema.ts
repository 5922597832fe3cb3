export type NodeRole = "root" | "relay" | "leaf";

export type ObservedRole = NodeRole | "unknown";

export type NeighborRelationship = "parent" | "child" | "sibling" | "previous_child" | "unknown";

export type EdgeKind = "route" | "parent" | "neighbor" | "fallback" | "sibling";

/** Edge kinds that count as a node's resolved upstream. */
export type UpstreamKind = Exclude<EdgeKind, "sibling">;

export type NeighborObservation = {
  observer: string;
  observed: string;
  lqi: number;
  observedRole: ObservedRole;
  relationship: NeighborRelationship;
};

export type RouteEntry = {
  node: string;
  nextHop: string;
  /** 0 = active, 1 = validation underway, 2 = discovery underway, 3 = inactive or failed. */
  staleness: number;
};

export type MeshNode = {
  id: string;
  nwk: number | null;
  role: NodeRole;
  lastSeen: number | null;
  manufacturer: string;
  model: string;
  name: string;
  available: boolean;
  lqi: number | null;
  rssi: number | null;
  neighbors: NeighborObservation[];
  routes: RouteEntry[];
  parent: string | null;
};

export type EntityRecord = {
  entityId: string;
  name: string;
  state: string;
  nodeId: string;
};

/** Entity as it arrives from the controller, before its owning node is known. */
export type RawEntity = {
  entityId: string;
  name: string;
  state: string;
  deviceId: string | null;
};

/** A registry device entry: the container an entity hangs off. */
export type DeviceContainer = {
  id: string;
  hardwareId: string | null;
  nameByUser: string | null;
};

export type Edge = {
  source: string;
  target: string;
  kind: EdgeKind;
  /** null means the link quality is unknown for this edge. */
  lqi: number | null;
  directional: boolean;
};

export type Position = {
  x: number;
  y: number;
  space: string;
};

export type GraphNode = {
  id: string;
  name: string;
  role: NodeRole;
  nwk: number | null;
  manufacturer: string;
  model: string;
  available: boolean;
  lastSeen: number | null;
  lqi: number | null;
  rssi: number | null;
  deviceRegistryId: string | null;
  entities: EntityRecord[];
  upstream: string | null;
  upstreamKind: UpstreamKind | null;
  depth: number;
  path: string[];
  neighbors: NeighborObservation[];
  position: Position | null;
};

export type FusionDiagnostics = {
  missingRoot: boolean;
  cycles: string[][];
  demoted: string[];
  forced: string[];
  staleRoutes: number;
  danglingRefs: number;
};

export type FusedGraph = {
  rootId: string | null;
  nodes: GraphNode[];
  edges: Edge[];
  diagnostics: FusionDiagnostics;
};

export type Snapshot = {
  graph: FusedGraph;
  fetchedAt: number | null;
  errorCount: number;
  durationMs: number;
  droppedEntities: number;
};

export function emptyGraph(): FusedGraph {
  return {
    rootId: null,
    nodes: [],
    edges: [],
    diagnostics: {
      missingRoot: false,
      cycles: [],
      demoted: [],
      forced: [],
      staleRoutes: 0,
      danglingRefs: 0,
    },
  };
}

export function emptySnapshot(): Snapshot {
  return {
    graph: emptyGraph(),
    fetchedAt: null,
    errorCount: 0,
    durationMs: 0,
    droppedEntities: 0,
  };
}
