import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import { createLogger } from "./log.js";
import { FusedGraph, Position } from "./schema.js";
import { normalizeHardwareId } from "./util.js";

const log = createLogger("positions");

export const DEFAULT_SPACE = "free";
export const POSITIONS_FILE = "positions.json";

export const positionSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  space: z.string().min(1).default(DEFAULT_SPACE),
});

const fileSchema = z.record(z.unknown());

// Older files wrap the mapping as { version: 1, positions }.
const envelopeSchema = z.object({
  version: z.literal(1),
  positions: z.record(z.unknown()),
});

/**
 * Durable node layout keyed by node id. Entries outlive their nodes: a node
 * that leaves the mesh keeps its slot for when it comes back.
 *
 * Every mutation rewrites the whole file through a temp file and a rename,
 * synchronously, so writes never interleave.
 */
export class PositionStore {
  private positions = new Map<string, Position>();
  readonly path: string;

  constructor(dataDir: string) {
    this.path = join(dataDir, POSITIONS_FILE);
    this.load();
  }

  private load() {
    if (!existsSync(this.path)) return;
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, "utf8"));
    } catch (err) {
      log.error(`cannot read ${this.path}; starting with no positions`, err);
      return;
    }
    const envelope = envelopeSchema.safeParse(raw);
    const file = fileSchema.safeParse(envelope.success ? envelope.data.positions : raw);
    if (!file.success) {
      log.error(`ignoring ${this.path}: unexpected layout`);
      return;
    }
    let skipped = 0;
    for (const [id, value] of Object.entries(file.data)) {
      const parsed = positionSchema.safeParse(value);
      if (!parsed.success || !id.trim()) {
        skipped += 1;
        continue;
      }
      this.positions.set(normalizeHardwareId(id), parsed.data);
    }
    if (skipped) log.warn(`skipped ${skipped} malformed position entries`);
    log.debug(`loaded ${this.positions.size} positions`);
  }

  private persist() {
    const positions: Record<string, Position> = {};
    for (const id of [...this.positions.keys()].sort()) {
      const pos = this.positions.get(id);
      if (pos) positions[id] = pos;
    }
    mkdirSync(dirname(this.path), { recursive: true });
    const tempPath = `${this.path}.tmp.${process.pid}.${Date.now()}`;
    writeFileSync(tempPath, `${JSON.stringify(positions, null, 2)}\n`, "utf8");
    renameSync(tempPath, this.path);
  }

  get(id: string): Position | null {
    return this.positions.get(normalizeHardwareId(id)) ?? null;
  }

  all(): Record<string, Position> {
    const out: Record<string, Position> = {};
    for (const id of [...this.positions.keys()].sort()) {
      const pos = this.positions.get(id);
      if (pos) out[id] = { ...pos };
    }
    return out;
  }

  set(id: string, position: unknown): Position {
    const key = normalizeHardwareId(id);
    if (!key) throw new ValidationError("invalid position", ["id: must not be empty"]);
    const parsed = parsePosition(position, key);
    this.positions.set(key, parsed);
    this.persist();
    return parsed;
  }

  /** Upserts a batch. Nothing is applied if any entry is invalid. */
  setMany(batch: Record<string, unknown>): number {
    const staged = new Map<string, Position>();
    for (const [id, value] of Object.entries(batch)) {
      const key = normalizeHardwareId(id);
      if (!key) throw new ValidationError("invalid position", ["id: must not be empty"]);
      staged.set(key, parsePosition(value, key));
    }
    if (!staged.size) return 0;
    for (const [key, pos] of staged) this.positions.set(key, pos);
    this.persist();
    return staged.size;
  }

  /** Drops every entry in `space`; returns how many went. */
  reset(space: string = DEFAULT_SPACE): number {
    let removed = 0;
    for (const [id, pos] of [...this.positions]) {
      if (pos.space !== space) continue;
      this.positions.delete(id);
      removed += 1;
    }
    if (removed) this.persist();
    log.info(`reset ${removed} positions in ${space}`);
    return removed;
  }

  merge(graph: FusedGraph): FusedGraph {
    return {
      ...graph,
      nodes: graph.nodes.map((node) => {
        const pos = this.positions.get(node.id);
        return { ...node, position: pos ? { ...pos } : null };
      }),
    };
  }
}

function parsePosition(value: unknown, id: string): Position {
  const parsed = positionSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(
      `invalid position for ${id}`,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return parsed.data;
}
