import http from "node:http";
import { AddressInfo } from "node:net";
import { loadLatestExport, saveExport } from "./archive.js";
import { CollectOptions, SourceFactory } from "./collector.js";
import { describeError, ValidationError } from "./errors.js";
import { createLogger } from "./log.js";
import { runPipeline } from "./pipeline.js";
import { DEFAULT_SPACE, PositionStore } from "./positions.js";
import { SnapshotCache } from "./snapshot-cache.js";
import { summarize } from "./summary.js";
import { isoFromMs, isRecord, normalizeHardwareId, nowMs, safeJsonParse } from "./util.js";

const log = createLogger("server");

const MAX_BODY_BYTES = 1024 * 1024;

export type ServerOptions = {
  port: number;
  host?: string;
  dataDir: string;
  connect: SourceFactory;
  collect: CollectOptions;
  /** 0 disables the timer. */
  autoRefreshMinutes: number;
  /** Kick off a refresh as soon as the server is listening. Defaults to true. */
  refreshOnStart?: boolean;
};

class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
  }
}

export class MeshmapServer {
  readonly cache: SnapshotCache;
  readonly positions: PositionStore;
  private server?: http.Server;
  private refreshTimer?: NodeJS.Timeout;
  private readonly startedAt = nowMs();

  constructor(private options: ServerOptions) {
    this.positions = new PositionStore(options.dataDir);
    this.cache = new SnapshotCache(() => runPipeline(options.connect, options.collect), {
      onSnapshot: (snapshot) => {
        saveExport(options.dataDir, snapshot);
      },
    });
  }

  async start() {
    const restored = loadLatestExport(this.options.dataDir);
    if (restored) {
      this.cache.seed(restored.snapshot);
      log.info(`serving last export ${restored.path} until the first refresh lands`);
    }

    const server = http.createServer(this.handleRequest.bind(this));
    this.server = server;
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    const { port } = this.address();
    log.info(`listening on http://${this.options.host ?? "localhost"}:${port}`);

    if (this.options.autoRefreshMinutes > 0) {
      const everyMs = this.options.autoRefreshMinutes * 60_000;
      this.refreshTimer = setInterval(() => this.backgroundRefresh(), everyMs);
      log.info(`auto-refresh every ${this.options.autoRefreshMinutes} min`);
    }
    if (this.options.refreshOnStart ?? true) this.backgroundRefresh();
  }

  async stop() {
    if (this.refreshTimer) clearInterval(this.refreshTimer);
    this.refreshTimer = undefined;
    const server = this.server;
    this.server = undefined;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  address(): AddressInfo {
    const addr = this.server?.address();
    if (!addr || typeof addr === "string") throw new Error("server is not listening");
    return addr;
  }

  /** Starts or joins a refresh; failures are already recorded by the cache. */
  private backgroundRefresh() {
    void this.cache.refresh().catch((err: unknown) => {
      log.debug(`background refresh ended: ${describeError(err).message}`);
    });
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse) {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method ?? "GET";

    if (method === "OPTIONS") {
      res.writeHead(204, {
        "Access-Control-Allow-Origin": "*",
        "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
        "Access-Control-Allow-Headers": "Content-Type",
      });
      res.end();
      return;
    }
    if (url.pathname === "/health" && method === "GET") {
      return this.respondJson(res, {
        ok: true,
        uptime_ms: nowMs() - this.startedAt,
        has_snapshot: this.cache.get().fetchedAt != null,
      });
    }
    if (url.pathname === "/api/status" && method === "GET") {
      return this.respondJson(res, this.buildStatus());
    }
    if (url.pathname === "/api/topology" && method === "GET") {
      return this.respondJson(res, this.buildTopology());
    }
    if (url.pathname === "/api/summary" && method === "GET") {
      const snapshot = this.cache.get();
      return this.respondJson(res, {
        fetched_at: snapshot.fetchedAt == null ? null : isoFromMs(snapshot.fetchedAt),
        ...summarize(snapshot.graph),
      });
    }
    if (url.pathname === "/api/refresh" && method === "POST") {
      const wait = ["1", "true"].includes(url.searchParams.get("wait") ?? "");
      if (!wait) {
        this.backgroundRefresh();
        return this.respondJson(res, { ok: true, refreshing: true }, 202);
      }
      void this.handleRefreshWait(res);
      return;
    }
    if (url.pathname === "/api/positions" && method === "GET") {
      return this.respondJson(res, { positions: this.positions.all() });
    }
    if (url.pathname === "/api/positions" && method === "POST") {
      void this.withBody(req, res, (body) => this.savePositions(body));
      return;
    }
    if (url.pathname === "/api/positions/reset" && method === "POST") {
      void this.withBody(req, res, (body) => {
        const space = isRecord(body) && typeof body.space === "string" && body.space.trim() ? body.space : DEFAULT_SPACE;
        const removed = this.positions.reset(space);
        return { ok: true, space, removed };
      });
      return;
    }
    this.respondJson(res, { ok: false, error: "not found" }, 404);
  }

  private buildStatus() {
    const status = this.cache.status();
    return {
      ok: status.lastError == null,
      refreshing: status.refreshing,
      fetched_at: status.fetchedAt == null ? null : isoFromMs(status.fetchedAt),
      age_ms: status.ageMs,
      error_count: status.errorCount,
      duration_ms: status.durationMs,
      dropped_entities: status.droppedEntities,
      node_count: status.nodeCount,
      edge_count: status.edgeCount,
      last_error: status.lastError
        ? { message: status.lastError.message, kind: status.lastError.kind, at: isoFromMs(status.lastError.at) }
        : null,
      refreshes: status.refreshes,
      failures: status.failures,
      auto_refresh_minutes: this.options.autoRefreshMinutes,
    };
  }

  private buildTopology() {
    const snapshot = this.cache.get();
    const status = this.buildStatus();
    return {
      ...this.positions.merge(snapshot.graph),
      fetched_at: status.fetched_at,
      age_ms: status.age_ms,
      error_count: status.error_count,
      dropped_entities: status.dropped_entities,
      last_error: status.last_error,
      refreshing: status.refreshing,
    };
  }

  private async handleRefreshWait(res: http.ServerResponse) {
    try {
      await this.cache.refresh();
      this.respondJson(res, this.buildStatus());
    } catch (err) {
      const { message, kind } = describeError(err);
      const status = this.buildStatus();
      this.respondJson(
        res,
        { ok: false, error: message, kind, fetched_at: status.fetched_at, age_ms: status.age_ms },
        502
      );
    }
  }

  private savePositions(body: unknown) {
    if (!isRecord(body)) throw new ValidationError("invalid position payload", ["(root): expected an object"]);
    if (isRecord(body.positions)) {
      const saved = this.positions.setMany(body.positions);
      return { ok: true, saved };
    }
    if (typeof body.id !== "string" || !body.id.trim()) {
      throw new ValidationError("invalid position payload", ["id: required"]);
    }
    const position = this.positions.set(body.id, { x: body.x, y: body.y, space: body.space });
    return { ok: true, id: normalizeHardwareId(body.id), position };
  }

  private async withBody(req: http.IncomingMessage, res: http.ServerResponse, handle: (body: unknown) => unknown) {
    try {
      const body = await readJsonBody(req);
      this.respondJson(res, handle(body));
    } catch (err) {
      if (err instanceof HttpError) {
        this.respondJson(res, { ok: false, error: err.message }, err.status);
        return;
      }
      const { message, kind } = describeError(err);
      if (err instanceof ValidationError) {
        this.respondJson(res, { ok: false, error: message, kind, issues: err.issues }, 400);
        return;
      }
      log.error(`request failed: ${message}`, err);
      this.respondJson(res, { ok: false, error: message, kind }, 500);
    }
  }

  private respondJson(res: http.ServerResponse, payload: unknown, status = 200) {
    const body = JSON.stringify(payload);
    res.writeHead(status, {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": "*",
      "Cache-Control": "no-store",
    });
    res.end(body);
  }
}

function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = "";
    let size = 0;
    let tooLarge = false;
    req.setEncoding("utf8");
    req.on("data", (chunk: string) => {
      if (tooLarge) return;
      size += Buffer.byteLength(chunk);
      if (size > MAX_BODY_BYTES) {
        // Drain the rest so the 413 reaches the client on an intact socket.
        tooLarge = true;
        body = "";
        reject(new HttpError(413, "body too large"));
        return;
      }
      body += chunk;
    });
    req.on("error", reject);
    req.on("end", () => {
      if (tooLarge) return;
      if (!body.trim()) {
        resolve({});
        return;
      }
      const parsed = safeJsonParse(body);
      if (!parsed.ok) {
        reject(new HttpError(400, `invalid JSON: ${parsed.error}`));
        return;
      }
      resolve(parsed.value);
    });
  });
}
