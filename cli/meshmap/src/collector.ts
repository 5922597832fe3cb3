import { performance } from "node:perf_hooks";
import { CollectionError, CommandError, ConnectionError, describeError } from "./errors.js";
import { createLogger } from "./log.js";
import { buildNodes, ControllerDevice, parseDevice, parseDeviceRegistry, parseEntities } from "./normalize.js";
import { DeviceContainer, MeshNode, RawEntity } from "./schema.js";
import { mapLimit } from "./util.js";

const log = createLogger("collector");

/** Where per-node and per-entity facts come from. */
export interface MeshSource {
  listNodeIds(signal?: AbortSignal): Promise<string[]>;
  fetchNode(id: string, signal?: AbortSignal): Promise<unknown>;
  fetchDeviceRegistry(signal?: AbortSignal): Promise<unknown>;
  fetchEntityRegistry(signal?: AbortSignal): Promise<unknown>;
  fetchStates(signal?: AbortSignal): Promise<unknown>;
  /** Asks the controller to rescan the network. Never awaited by collection. */
  requestScan?(signal?: AbortSignal): Promise<void>;
}

export interface MeshSession extends MeshSource {
  close(): void;
}

export type SourceFactory = () => Promise<MeshSession>;

export const MIN_SUCCESS_FRACTION = 0.5;
export const DEFAULT_CONCURRENCY = 4;
const MAX_ERROR_DETAILS = 20;

export type CollectOptions = {
  timeoutMs: number;
  concurrency?: number;
  /** Legacy scan wait. Only switches on the non-blocking scan request. */
  scanWaitMs?: number;
  minSuccessFraction?: number;
};

export type CollectionResult = {
  nodes: MeshNode[];
  entities: RawEntity[];
  devices: DeviceContainer[];
  listed: number;
  fetched: number;
  errors: number;
  errorDetails: string[];
  durationMs: number;
  timedOut: boolean;
};

/** Settles with `work`, or rejects once `signal` fires, whichever is first. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal, label: string): Promise<T> {
  if (signal.aborted) return Promise.reject(new CommandError(label, "abandoned at collection deadline", "timeout"));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CommandError(label, "abandoned at collection deadline", "timeout"));
    signal.addEventListener("abort", onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Gathers one cycle of raw facts within a hard time budget.
 *
 * Node fetches run with bounded concurrency; each failure or timeout is
 * counted and the node left out. Only a failed listing (connection failure)
 * or fewer than `minSuccessFraction` of listed nodes answering fails the
 * whole collection.
 */
export async function collect(source: MeshSource, options: CollectOptions): Promise<CollectionResult> {
  const started = performance.now();
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  const floor = options.minSuccessFraction ?? MIN_SUCCESS_FRACTION;
  const details: string[] = [];
  let errors = 0;
  let timedOut = false;

  const record = (what: string, err: unknown) => {
    errors += 1;
    const { message } = describeError(err);
    if (details.length < MAX_ERROR_DETAILS) details.push(`${what}: ${message}`);
    log.debug(`${what} failed: ${message}`);
  };

  const abort = new AbortController();
  const signal = abort.signal;
  const deadline = setTimeout(() => {
    timedOut = true;
    abort.abort();
  }, options.timeoutMs);

  try {
    let listed: string[];
    try {
      listed = await untilAborted(source.listNodeIds(signal), signal, "list nodes");
    } catch (err) {
      if (err instanceof ConnectionError) throw err;
      throw new ConnectionError(`cannot list nodes: ${describeError(err).message}`);
    }
    const ids = [...new Set(listed)];

    if ((options.scanWaitMs ?? 0) > 0 && source.requestScan) {
      log.debug("requesting network scan without waiting for it");
      void source.requestScan(signal).catch((err: unknown) => {
        log.debug(`scan request ended: ${describeError(err).message}`);
      });
    }

    const bulk = async (label: string, fetch: () => Promise<unknown>): Promise<unknown> => {
      try {
        return await untilAborted(fetch(), signal, label);
      } catch (err) {
        record(label, err);
        return [];
      }
    };

    const [devices, registry] = await Promise.all([
      mapLimit(ids, concurrency, async (id): Promise<ControllerDevice | null> => {
        try {
          return parseDevice(await untilAborted(source.fetchNode(id, signal), signal, `node ${id}`));
        } catch (err) {
          record(`node ${id}`, err);
          return null;
        }
      }),
      Promise.all([
        bulk("device registry", () => source.fetchDeviceRegistry(signal)),
        bulk("entity registry", () => source.fetchEntityRegistry(signal)),
        bulk("states", () => source.fetchStates(signal)),
      ]),
    ]);

    const fetched = devices.filter((d): d is ControllerDevice => d != null);
    if (ids.length > 0 && fetched.length / ids.length < floor) {
      throw new CollectionError(
        `only ${fetched.length} of ${ids.length} nodes answered (need ${Math.round(floor * 100)}%)`,
        { listed: ids.length, fetched: fetched.length, errors }
      );
    }

    const [deviceRegistryRaw, entityRegistryRaw, statesRaw] = registry;
    const parsedDevices = parseDeviceRegistry(deviceRegistryRaw);
    const parsedEntities = parseEntities(entityRegistryRaw, statesRaw);
    for (const issue of [...parsedDevices.errors, ...parsedEntities.errors]) record("registry", new Error(issue));

    const durationMs = Math.round(performance.now() - started);
    log.info(
      `collected ${fetched.length}/${ids.length} nodes, ${parsedEntities.entities.length} entities, ` +
        `${errors} errors in ${durationMs}ms${timedOut ? " (deadline hit)" : ""}`
    );

    return {
      nodes: buildNodes(fetched),
      entities: parsedEntities.entities,
      devices: parsedDevices.devices,
      listed: ids.length,
      fetched: fetched.length,
      errors,
      errorDetails: details,
      durationMs,
      timedOut,
    };
  } finally {
    clearTimeout(deadline);
    abort.abort();
  }
}
