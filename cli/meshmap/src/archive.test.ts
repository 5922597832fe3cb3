import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { exportFileName, listExports, loadLatestExport, saveExport } from "./archive.js";
import { smallMesh } from "./fake-source.js";
import { runPipeline } from "./pipeline.js";
import { emptyGraph, Snapshot } from "./schema.js";

const BASE = Date.UTC(2026, 0, 15, 12, 0, 0);

function snapshot(fetchedAt: number): Snapshot {
  return { graph: emptyGraph(), fetchedAt, errorCount: 0, durationMs: 12, droppedEntities: 0 };
}

describe("archive", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "meshmap-archive-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("names exports by timestamp", () => {
    expect(exportFileName(BASE)).toMatch(/^mesh_export_\d{8}_\d{6}\.json$/);
  });

  it("keeps only the newest five exports", () => {
    const stamps = Array.from({ length: 7 }, (_, i) => BASE + i * 60_000);
    for (const ms of stamps) saveExport(dir, snapshot(ms));
    expect(listExports(dir)).toEqual(
      stamps
        .slice(2)
        .reverse()
        .map((ms) => exportFileName(ms))
    );
  });

  it("restores the newest export", async () => {
    const fused = await runPipeline(async () => smallMesh(), { timeoutMs: 2000 });
    saveExport(dir, snapshot(BASE));
    saveExport(dir, fused, BASE + 60_000);

    const latest = loadLatestExport(dir);
    expect(latest?.path).toBe(join(dir, exportFileName(BASE + 60_000)));
    expect(latest?.snapshot).toEqual(fused);
  });

  it("skips an unreadable newest export", () => {
    saveExport(dir, snapshot(BASE));
    writeFileSync(join(dir, exportFileName(BASE + 60_000)), "{ truncated", "utf8");
    expect(loadLatestExport(dir)?.snapshot.fetchedAt).toBe(BASE);
  });

  it("returns null when there is nothing to restore", () => {
    expect(loadLatestExport(join(dir, "missing"))).toBeNull();
  });
});
