import { collect, CollectOptions, MeshSession, SourceFactory } from "./collector.js";
import { ConnectionError, describeError } from "./errors.js";
import { fuseTopology } from "./fusion.js";
import { createLogger } from "./log.js";
import { matchEntities } from "./registry.js";
import { Snapshot } from "./schema.js";
import { nowMs } from "./util.js";

const log = createLogger("pipeline");

/** One refresh cycle: connect, collect, match entities, fuse. */
export async function runPipeline(connect: SourceFactory, options: CollectOptions): Promise<Snapshot> {
  let session: MeshSession;
  try {
    session = await connect();
  } catch (err) {
    if (err instanceof ConnectionError) throw err;
    throw new ConnectionError(`cannot open controller session: ${describeError(err).message}`);
  }

  try {
    const result = await collect(session, options);
    const match = matchEntities(result.nodes, result.entities, result.devices);
    if (match.dropped > 0) {
      log.debug(`dropped ${match.dropped} entities without an owning node: ${match.droppedIds.slice(0, 10).join(", ")}`);
    }

    const graph = fuseTopology(result.nodes, {
      entitiesByNode: match.byNode,
      deviceRegistryIds: match.deviceRegistryIds,
    });
    for (const cycle of graph.diagnostics.cycles) {
      log.warn(`broke upstream cycle ${cycle.join(" -> ")}`);
    }
    if (graph.diagnostics.missingRoot && graph.nodes.length > 0) {
      log.warn("no coordinator in this snapshot; emitting nodes without edges");
    }

    return {
      graph,
      fetchedAt: nowMs(),
      errorCount: result.errors,
      durationMs: result.durationMs,
      droppedEntities: match.dropped,
    };
  } finally {
    session.close();
  }
}
