import { EdgeKind, FusedGraph } from "./schema.js";
import { compareIds } from "./util.js";

export const WEAK_LQI = 50;

type LqiStats = { average: number; min: number; max: number };

export type SummaryReport = {
  devices: { total: number; root: number; relay: number; leaf: number };
  deviceLqi: LqiStats | null;
  weakDevices: { id: string; name: string; lqi: number }[];
  links: { count: number; lqi: LqiStats | null };
  edges: Record<EdgeKind, number>;
  cycles: number;
  demoted: number;
  forced: number;
};

function stats(values: readonly number[]): LqiStats | null {
  if (!values.length) return null;
  const total = values.reduce((sum, v) => sum + v, 0);
  return {
    average: Math.round(total / values.length),
    min: Math.min(...values),
    max: Math.max(...values),
  };
}

export function summarize(graph: FusedGraph): SummaryReport {
  const devices = { total: graph.nodes.length, root: 0, relay: 0, leaf: 0 };
  for (const node of graph.nodes) devices[node.role] += 1;

  const deviceLqis: number[] = [];
  const weakDevices: SummaryReport["weakDevices"] = [];
  for (const node of graph.nodes) {
    if (node.lqi == null) continue;
    deviceLqis.push(node.lqi);
    if (node.lqi < WEAK_LQI) weakDevices.push({ id: node.id, name: node.name, lqi: node.lqi });
  }
  weakDevices.sort((a, b) => a.lqi - b.lqi || compareIds(a.id, b.id));

  // Directed observations between nodes of this graph; zero means unmeasured.
  const present = new Set(graph.nodes.map((n) => n.id));
  const linkLqis: number[] = [];
  for (const node of graph.nodes) {
    for (const obs of node.neighbors) {
      if (present.has(obs.observed) && obs.lqi > 0) linkLqis.push(obs.lqi);
    }
  }

  const edges: Record<EdgeKind, number> = { route: 0, parent: 0, neighbor: 0, fallback: 0, sibling: 0 };
  for (const edge of graph.edges) edges[edge.kind] += 1;

  return {
    devices,
    deviceLqi: stats(deviceLqis),
    weakDevices,
    links: { count: linkLqis.length, lqi: stats(linkLqis) },
    edges,
    cycles: graph.diagnostics.cycles.length,
    demoted: graph.diagnostics.demoted.length,
    forced: graph.diagnostics.forced.length,
  };
}

function pct(lqi: number) {
  return Math.round((lqi / 255) * 100);
}

/** Plain-text rendering of a report, one line per entry. */
export function formatSummary(report: SummaryReport): string[] {
  const lines = [
    `Devices: ${report.devices.total} total`,
    `  - Coordinator: ${report.devices.root}`,
    `  - Routers: ${report.devices.relay}`,
    `  - End devices: ${report.devices.leaf}`,
  ];
  if (report.deviceLqi) {
    const { average, min, max } = report.deviceLqi;
    lines.push("Device signal quality:");
    lines.push(`  - Average: ${average}/255 (${pct(average)}%)`);
    lines.push(`  - Range: ${min} - ${max}`);
  }
  if (report.weakDevices.length) {
    lines.push(`Weak devices (LQI < ${WEAK_LQI}):`);
    for (const weak of report.weakDevices) lines.push(`  - ${weak.name}: LQI ${weak.lqi}`);
  }
  lines.push(`Mesh links: ${report.links.count} observations`);
  if (report.links.lqi) {
    const { average, min, max } = report.links.lqi;
    lines.push(`  - Average link LQI: ${average}/255 (${pct(average)}%)`);
    lines.push(`  - Range: ${min} - ${max}`);
  }
  const e = report.edges;
  lines.push(
    `Edges: route ${e.route}, parent ${e.parent}, neighbor ${e.neighbor}, fallback ${e.fallback}, sibling ${e.sibling}`
  );
  if (report.cycles || report.forced) {
    lines.push(`Repairs: ${report.cycles} cycles broken, ${report.forced} nodes forced to fallback`);
  }
  return lines;
}
