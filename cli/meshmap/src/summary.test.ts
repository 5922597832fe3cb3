import { describe, expect, it } from "vitest";
import { LEAF_IEEE, smallMesh } from "./fake-source.js";
import { runPipeline } from "./pipeline.js";
import { formatSummary, summarize } from "./summary.js";

describe("summarize", () => {
  it("reports roles, signal quality and edge kinds", async () => {
    const { graph } = await runPipeline(async () => smallMesh(), { timeoutMs: 2000 });
    const report = summarize(graph);

    expect(report.devices).toEqual({ total: 3, root: 1, relay: 1, leaf: 1 });
    expect(report.deviceLqi).toEqual({ average: 110, min: 40, max: 180 });
    expect(report.weakDevices).toEqual([{ id: LEAF_IEEE, name: "Door sensor", lqi: 40 }]);
    expect(report.links).toEqual({ count: 2, lqi: { average: 160, min: 120, max: 200 } });
    expect(report.edges).toEqual({ route: 1, parent: 0, neighbor: 1, fallback: 0, sibling: 0 });
    expect(report.cycles).toBe(0);
  });

  it("renders a plain-text report", async () => {
    const { graph } = await runPipeline(async () => smallMesh(), { timeoutMs: 2000 });
    expect(formatSummary(summarize(graph))).toEqual([
      "Devices: 3 total",
      "  - Coordinator: 1",
      "  - Routers: 1",
      "  - End devices: 1",
      "Device signal quality:",
      "  - Average: 110/255 (43%)",
      "  - Range: 40 - 180",
      "Weak devices (LQI < 50):",
      "  - Door sensor: LQI 40",
      "Mesh links: 2 observations",
      "  - Average link LQI: 160/255 (63%)",
      "  - Range: 120 - 200",
      "Edges: route 1, parent 0, neighbor 1, fallback 0, sibling 0",
    ]);
  });

  it("handles an empty graph", () => {
    const report = summarize({
      rootId: null,
      nodes: [],
      edges: [],
      diagnostics: { missingRoot: false, cycles: [], demoted: [], forced: [], staleRoutes: 0, danglingRefs: 0 },
    });
    expect(report.deviceLqi).toBeNull();
    expect(report.links).toEqual({ count: 0, lqi: null });
  });
});
