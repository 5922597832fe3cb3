import { existsSync, mkdirSync, readdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { createLogger } from "./log.js";
import { Snapshot } from "./schema.js";
import { fileStamp, isoFromMs, nowMs } from "./util.js";

const log = createLogger("archive");

export const EXPORT_PREFIX = "mesh_export_";
export const KEEP_EXPORTS = 5;

const EXPORT_PATTERN = /^mesh_export_\d{8}_\d{6}\.json$/;

const roleSchema = z.enum(["root", "relay", "leaf"]);
const kindSchema = z.enum(["route", "parent", "neighbor", "fallback"]);

const neighborSchema = z.object({
  observer: z.string(),
  observed: z.string(),
  lqi: z.number(),
  observedRole: z.enum(["root", "relay", "leaf", "unknown"]),
  relationship: z.enum(["parent", "child", "sibling", "previous_child", "unknown"]),
});

const graphNodeSchema = z.object({
  id: z.string(),
  name: z.string(),
  role: roleSchema,
  nwk: z.number().nullable(),
  manufacturer: z.string(),
  model: z.string(),
  available: z.boolean(),
  lastSeen: z.number().nullable(),
  lqi: z.number().nullable(),
  rssi: z.number().nullable(),
  deviceRegistryId: z.string().nullable(),
  entities: z.array(z.object({ entityId: z.string(), name: z.string(), state: z.string(), nodeId: z.string() })),
  upstream: z.string().nullable(),
  upstreamKind: kindSchema.nullable(),
  depth: z.number(),
  path: z.array(z.string()),
  neighbors: z.array(neighborSchema),
  position: z.object({ x: z.number(), y: z.number(), space: z.string() }).nullable(),
});

const snapshotSchema = z.object({
  graph: z.object({
    rootId: z.string().nullable(),
    nodes: z.array(graphNodeSchema),
    edges: z.array(
      z.object({
        source: z.string(),
        target: z.string(),
        kind: z.enum(["route", "parent", "neighbor", "fallback", "sibling"]),
        lqi: z.number().nullable(),
        directional: z.boolean(),
      })
    ),
    diagnostics: z.object({
      missingRoot: z.boolean(),
      cycles: z.array(z.array(z.string())),
      demoted: z.array(z.string()),
      forced: z.array(z.string()),
      staleRoutes: z.number(),
      danglingRefs: z.number(),
    }),
  }),
  fetchedAt: z.number().nullable(),
  errorCount: z.number(),
  durationMs: z.number(),
  droppedEntities: z.number(),
});

const exportSchema = z.object({
  version: z.literal(1),
  exported_at: z.string(),
  snapshot: snapshotSchema,
});

export function exportFileName(ms: number): string {
  return `${EXPORT_PREFIX}${fileStamp(ms)}.json`;
}

/** Export file names in `dir`, newest first. */
export function listExports(dir: string): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter((name) => EXPORT_PATTERN.test(name))
    .sort()
    .reverse();
}

export function exportDocument(snapshot: Snapshot, ms = nowMs()) {
  return { version: 1 as const, exported_at: isoFromMs(ms), snapshot };
}

/** Writes `snapshot` as a timestamped export and prunes all but the newest few. */
export function saveExport(dir: string, snapshot: Snapshot, ms = snapshot.fetchedAt ?? nowMs()): string {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, exportFileName(ms));
  const tempPath = `${path}.tmp.${process.pid}.${Date.now()}`;
  writeFileSync(tempPath, `${JSON.stringify(exportDocument(snapshot, ms), null, 2)}\n`, "utf8");
  renameSync(tempPath, path);
  log.debug(`saved ${path}`);
  pruneExports(dir);
  return path;
}

export function pruneExports(dir: string, keep = KEEP_EXPORTS): string[] {
  const removed: string[] = [];
  for (const name of listExports(dir).slice(keep)) {
    try {
      unlinkSync(join(dir, name));
      removed.push(name);
    } catch (err) {
      log.warn(`cannot remove old export ${name}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  return removed;
}

/** Newest readable export, or null. Unreadable exports are skipped. */
export function loadLatestExport(dir: string): { path: string; snapshot: Snapshot } | null {
  for (const name of listExports(dir)) {
    const path = join(dir, name);
    try {
      const parsed = exportSchema.safeParse(JSON.parse(readFileSync(path, "utf8")));
      if (parsed.success) return { path, snapshot: parsed.data.snapshot };
      log.warn(`skipping ${name}: unexpected layout`);
    } catch (err) {
      log.warn(`skipping ${name}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  return null;
}
