import { WebSocket } from "ws";
import { z } from "zod";
import { CommandError, ConnectionError } from "./errors.js";
import { createLogger } from "./log.js";
import type { MeshSession } from "./collector.js";
import { isRecord, safeJsonParse } from "./util.js";

const log = createLogger("controller");

export type ControllerOptions = {
  url: string;
  token: string;
  commandTimeoutMs?: number;
  handshakeTimeoutMs?: number;
  /** Interval between keep-alive pings; 0 disables them. */
  keepAliveMs?: number;
};

type Pending = {
  type: string;
  resolve: (value: unknown) => void;
  reject: (err: Error) => void;
  cleanup: () => void;
};

const messageSchema = z
  .object({
    id: z.number().optional(),
    type: z.string(),
    success: z.boolean().optional(),
    result: z.unknown().optional(),
    error: z
      .object({ code: z.string().optional(), message: z.string().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

type ControllerMessage = z.infer<typeof messageSchema>;

/**
 * Client for the controller's WebSocket command API: token handshake,
 * id-correlated commands, and keep-alive pings that run independently of
 * whatever command is in flight.
 */
export class ControllerClient implements MeshSession {
  private ws?: WebSocket;
  private nextId = 0;
  private pending = new Map<number, Pending>();
  private keepAliveTimer?: NodeJS.Timeout;
  private closed = false;
  private readonly commandTimeoutMs: number;
  private readonly handshakeTimeoutMs: number;
  private readonly keepAliveMs: number;

  private constructor(private options: ControllerOptions) {
    this.commandTimeoutMs = options.commandTimeoutMs ?? 30_000;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? 10_000;
    this.keepAliveMs = options.keepAliveMs ?? 15_000;
  }

  static async connect(options: ControllerOptions): Promise<ControllerClient> {
    const client = new ControllerClient(options);
    await client.open();
    return client;
  }

  private open(): Promise<void> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const ws = new WebSocket(this.options.url, {
        handshakeTimeout: this.handshakeTimeoutMs,
        headers: { Authorization: `Bearer ${this.options.token}` },
      });
      this.ws = ws;

      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        ws.removeAllListeners("message");
        ws.terminate();
        reject(err);
      };

      const timer = setTimeout(() => {
        fail(new ConnectionError(`authentication timed out after ${this.handshakeTimeoutMs}ms`));
      }, this.handshakeTimeoutMs);

      ws.on("message", (data) => {
        const msg = this.parse(String(data));
        if (!msg) return;
        if (!settled) {
          if (msg.type === "auth_required") {
            ws.send(JSON.stringify({ type: "auth", access_token: this.options.token }));
            return;
          }
          if (msg.type === "auth_ok") {
            settled = true;
            clearTimeout(timer);
            log.debug(`authenticated against ${this.options.url}`);
            this.startKeepAlive();
            resolve();
            return;
          }
          if (msg.type === "auth_invalid") {
            fail(new ConnectionError("authentication rejected by controller", "auth_failed"));
            return;
          }
          log.debug(`ignoring ${msg.type} before authentication`);
          return;
        }
        this.dispatch(msg);
      });

      ws.on("error", (err) => {
        if (!settled) {
          fail(new ConnectionError(`cannot reach controller at ${this.options.url}: ${err.message}`));
          return;
        }
        log.warn(`socket error: ${err.message}`);
      });

      ws.on("close", () => {
        if (!settled) {
          fail(new ConnectionError("controller closed the connection during authentication", "connection_closed"));
          return;
        }
        this.stopKeepAlive();
        this.rejectAll(new ConnectionError("controller connection closed", "connection_closed"));
      });
    });
  }

  private parse(raw: string): ControllerMessage | null {
    const json = safeJsonParse(raw);
    if (!json.ok) {
      log.warn(`dropping unparseable message: ${json.error}`);
      return null;
    }
    const parsed = messageSchema.safeParse(json.value);
    return parsed.success ? parsed.data : null;
  }

  private dispatch(msg: ControllerMessage) {
    if (msg.type === "event" || msg.id == null) return;
    const pending = this.pending.get(msg.id);
    if (!pending) return;
    this.pending.delete(msg.id);
    pending.cleanup();
    if (msg.type === "pong" || msg.success) {
      pending.resolve(msg.result ?? null);
      return;
    }
    const reason = msg.error?.message ?? msg.error?.code ?? "command failed";
    pending.reject(new CommandError(pending.type, reason));
  }

  command(
    type: string,
    payload: Record<string, unknown> = {},
    opts: { timeoutMs?: number; signal?: AbortSignal } = {}
  ): Promise<unknown> {
    const ws = this.ws;
    if (this.closed || !ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ConnectionError("controller connection is not open", "connection_closed"));
    }
    if (opts.signal?.aborted) {
      return Promise.reject(new CommandError(type, "aborted", "timeout"));
    }
    this.nextId += 1;
    const id = this.nextId;
    const timeoutMs = opts.timeoutMs ?? this.commandTimeoutMs;

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this.pending.delete(id);
        clearTimeout(timer);
        reject(new CommandError(type, "aborted", "timeout"));
      };
      const timer = setTimeout(() => {
        this.pending.delete(id);
        opts.signal?.removeEventListener("abort", onAbort);
        reject(new CommandError(type, `no reply within ${timeoutMs}ms`, "timeout"));
      }, timeoutMs);
      opts.signal?.addEventListener("abort", onAbort, { once: true });

      this.pending.set(id, {
        type,
        resolve,
        reject,
        cleanup: () => {
          clearTimeout(timer);
          opts.signal?.removeEventListener("abort", onAbort);
        },
      });
      log.debug(`-> ${type} #${id}`);
      ws.send(JSON.stringify({ ...payload, id, type }));
    });
  }

  async listNodeIds(signal?: AbortSignal): Promise<string[]> {
    const result = await this.command("zha/devices", {}, { signal });
    const ids: string[] = [];
    for (const device of Array.isArray(result) ? result : []) {
      if (isRecord(device) && typeof device.ieee === "string" && device.ieee.trim()) {
        ids.push(device.ieee);
      }
    }
    return ids;
  }

  fetchNode(id: string, signal?: AbortSignal): Promise<unknown> {
    return this.command("zha/device", { ieee: id }, { signal });
  }

  fetchDeviceRegistry(signal?: AbortSignal): Promise<unknown> {
    return this.command("config/device_registry/list", {}, { signal });
  }

  fetchEntityRegistry(signal?: AbortSignal): Promise<unknown> {
    return this.command("config/entity_registry/list", {}, { signal });
  }

  fetchStates(signal?: AbortSignal): Promise<unknown> {
    return this.command("get_states", {}, { signal });
  }

  async requestScan(signal?: AbortSignal): Promise<void> {
    await this.command("zha/topology/update", {}, { signal, timeoutMs: 10_000 });
  }

  private startKeepAlive() {
    if (this.keepAliveMs <= 0) return;
    this.keepAliveTimer = setInterval(() => {
      const ws = this.ws;
      if (!ws || ws.readyState !== WebSocket.OPEN) return;
      ws.ping();
      void this.command("ping", {}, { timeoutMs: this.keepAliveMs }).catch((err: unknown) => {
        log.debug(`keep-alive ping failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    }, this.keepAliveMs);
    this.keepAliveTimer.unref();
  }

  private stopKeepAlive() {
    if (this.keepAliveTimer) clearInterval(this.keepAliveTimer);
    this.keepAliveTimer = undefined;
  }

  private rejectAll(err: Error) {
    for (const pending of this.pending.values()) {
      pending.cleanup();
      pending.reject(err);
    }
    this.pending.clear();
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    this.stopKeepAlive();
    this.rejectAll(new ConnectionError("controller connection closed", "connection_closed"));
    this.ws?.close();
  }
}
