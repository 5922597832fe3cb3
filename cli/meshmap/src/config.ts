import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import { safeJsonParse } from "./util.js";

export const OPTIONS_FILE = "options.json";
export const DEFAULT_DATA_DIR = "/data";
export const DEFAULT_CONTROLLER_URL = "ws://supervisor/core/websocket";
export const DEFAULT_PORT = 8099;

const boolish = z.preprocess((value) => {
  if (typeof value !== "string") return value;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}, z.boolean());

const configSchema = z.object({
  controllerUrl: z.string().regex(/^wss?:\/\//, "must be a ws:// or wss:// URL"),
  token: z.string(),
  dataDir: z.string().min(1),
  port: z.coerce.number().int().min(0).max(65535),
  collectionTimeoutSeconds: z.coerce.number().positive().max(3600),
  autoRefreshMinutes: z.coerce.number().min(0).max(24 * 60),
  topologyScanWait: z.coerce.number().min(0).max(600),
  concurrency: z.coerce.number().int().min(1).max(64),
  debug: boolish,
});

export type MeshmapConfig = z.infer<typeof configSchema>;

/** Supervisor add-on options, snake_case as the add-on UI writes them. */
const optionsSchema = z
  .object({
    collection_timeout_seconds: z.number().optional(),
    auto_refresh_minutes: z.number().optional(),
    topology_scan_wait: z.number().optional(),
    concurrency: z.number().optional(),
    debug: z.boolean().optional(),
  })
  .passthrough();

const DEFAULTS = {
  controllerUrl: DEFAULT_CONTROLLER_URL,
  token: "",
  port: DEFAULT_PORT,
  collectionTimeoutSeconds: 120,
  autoRefreshMinutes: 0,
  topologyScanWait: 0,
  concurrency: 4,
  debug: false,
};

export type ConfigFlags = Partial<Record<keyof MeshmapConfig, string | number | boolean>>;

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

export function readOptionsFile(dataDir: string): Partial<MeshmapConfig> {
  const path = join(dataDir, OPTIONS_FILE);
  if (!existsSync(path)) return {};
  const json = safeJsonParse(readFileSync(path, "utf8"));
  if (!json.ok) throw new ValidationError(`invalid ${path}`, [json.error]);
  const parsed = optionsSchema.safeParse(json.value);
  if (!parsed.success) throw new ValidationError(`invalid ${path}`, issuesOf(parsed.error));
  const o = parsed.data;
  const out: Partial<MeshmapConfig> = {};
  if (o.collection_timeout_seconds != null) out.collectionTimeoutSeconds = o.collection_timeout_seconds;
  if (o.auto_refresh_minutes != null) out.autoRefreshMinutes = o.auto_refresh_minutes;
  if (o.topology_scan_wait != null) out.topologyScanWait = o.topology_scan_wait;
  if (o.concurrency != null) out.concurrency = o.concurrency;
  if (o.debug != null) out.debug = o.debug;
  return out;
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  const pick = (key: keyof MeshmapConfig, name: string) => {
    const value = env[name];
    if (value != null && value.trim() !== "") out[key] = value.trim();
  };
  pick("token", "SUPERVISOR_TOKEN");
  pick("controllerUrl", "MESHMAP_CONTROLLER_URL");
  pick("dataDir", "MESHMAP_DATA_DIR");
  pick("port", "MESHMAP_PORT");
  pick("topologyScanWait", "TOPOLOGY_SCAN_WAIT");
  pick("debug", "DEBUG");
  return out;
}

/**
 * Resolves configuration from, lowest precedence first: built-in defaults,
 * `<dataDir>/options.json`, environment, then command-line flags.
 */
export function loadConfig(options: { env?: NodeJS.ProcessEnv; flags?: ConfigFlags } = {}): MeshmapConfig {
  const env = fromEnv(options.env ?? process.env);
  const flags: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(options.flags ?? {})) {
    if (value !== undefined) flags[key] = value;
  }

  const dataDirRaw = flags.dataDir ?? env.dataDir ?? DEFAULT_DATA_DIR;
  const dataDir = typeof dataDirRaw === "string" ? dataDirRaw : String(dataDirRaw);

  const merged: Record<string, unknown> = {
    ...DEFAULTS,
    ...readOptionsFile(dataDir),
    ...env,
    ...flags,
    dataDir,
  };

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) throw new ValidationError("invalid configuration", issuesOf(parsed.error));
  return parsed.data;
}

/** Config with secrets masked, for status output and logs. */
export function redactConfig(config: MeshmapConfig): MeshmapConfig {
  return { ...config, token: config.token ? "***" : "" };
}
