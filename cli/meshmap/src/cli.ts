#!/usr/bin/env node
import { mkdirSync, renameSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { exportDocument, loadLatestExport, saveExport } from "./archive.js";
import { ConfigFlags, loadConfig, MeshmapConfig } from "./config.js";
import { ControllerClient } from "./controller.js";
import { CollectOptions, SourceFactory } from "./collector.js";
import { describeError } from "./errors.js";
import { setDebug } from "./log.js";
import { runPipeline } from "./pipeline.js";
import { MeshmapServer } from "./server.js";
import { formatSummary, summarize } from "./summary.js";

const args = process.argv.slice(2);
const cmd = args[0] ?? "help";

function getArg(flag: string, fallback?: string) {
  const idx = args.indexOf(flag);
  if (idx === -1) return fallback;
  const val = args[idx + 1];
  if (!val || val.startsWith("--")) return fallback;
  return val;
}

function hasFlag(flag: string) {
  return args.includes(flag);
}

const VALUE_FLAGS = new Set([
  "--port",
  "--data-dir",
  "--controller-url",
  "--token",
  "--auto-refresh",
  "--scan-wait",
  "--timeout",
  "--concurrency",
  "--station",
  "--space",
  "--out",
]);

function positional(index: number): string | undefined {
  const list = args.filter((a, i) => !a.startsWith("--") && !(i > 0 && VALUE_FLAGS.has(args[i - 1])));
  return list[index];
}

function usage(exitCode = 0): never {
  console.log(`meshmap <command> [options]

Commands:
  start [--port <port>] [--data-dir <dir>] [--controller-url <ws-url>] [--token <token>]
        [--auto-refresh <minutes>] [--scan-wait <seconds>] [--timeout <seconds>]
        [--concurrency <n>] [--debug]
  status [--station <url>]
  refresh [--wait] [--station <url>]
  summary [--data-dir <dir>]
  positions [--station <url>]
  positions reset [--space <space>] [--station <url>]
  export [--out <path>] [--data-dir <dir>] [--controller-url <ws-url>] [--token <token>]

Defaults:
  --port 8099
  --data-dir /data
  --controller-url ws://supervisor/core/websocket
  --station http://localhost:8099
`);
  process.exit(exitCode);
}

if (hasFlag("--help") || cmd === "--help" || cmd === "help") {
  usage(0);
}

function stationURL() {
  return (getArg("--station") ?? "http://localhost:8099").replace(/\/+$/, "");
}

function configFlags(): ConfigFlags {
  return {
    port: getArg("--port"),
    dataDir: getArg("--data-dir"),
    controllerUrl: getArg("--controller-url"),
    token: getArg("--token"),
    autoRefreshMinutes: getArg("--auto-refresh"),
    topologyScanWait: getArg("--scan-wait"),
    collectionTimeoutSeconds: getArg("--timeout"),
    concurrency: getArg("--concurrency"),
    debug: hasFlag("--debug") ? true : undefined,
  };
}

function resolveConfig(): MeshmapConfig {
  try {
    const config = loadConfig({ flags: configFlags() });
    setDebug(config.debug);
    return config;
  } catch (err) {
    console.error(describeError(err).message);
    process.exit(1);
  }
}

function controllerSource(config: MeshmapConfig): SourceFactory {
  return () => ControllerClient.connect({ url: config.controllerUrl, token: config.token });
}

function collectOptions(config: MeshmapConfig): CollectOptions {
  return {
    timeoutMs: config.collectionTimeoutSeconds * 1000,
    concurrency: config.concurrency,
    scanWaitMs: config.topologyScanWait * 1000,
  };
}

async function httpJson(path: string, init?: RequestInit): Promise<{ status: number; body: unknown }> {
  const res = await fetch(`${stationURL()}${path}`, init);
  const text = await res.text();
  let body: unknown = text;
  try {
    body = text ? JSON.parse(text) : null;
  } catch {
    body = text;
  }
  if (!res.ok && res.status !== 502) throw new Error(`HTTP ${res.status}: ${text}`);
  return { status: res.status, body };
}

function httpPost(path: string, payload: unknown) {
  return httpJson(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload),
  });
}

async function cmdStart() {
  const config = resolveConfig();
  if (!config.token) console.warn("no controller token configured (SUPERVISOR_TOKEN or --token); refreshes will fail");
  const server = new MeshmapServer({
    port: config.port,
    dataDir: config.dataDir,
    connect: controllerSource(config),
    collect: collectOptions(config),
    autoRefreshMinutes: config.autoRefreshMinutes,
  });
  await server.start();
  console.log(`meshmap running on http://localhost:${server.address().port}`);

  const shutdown = (signal: string) => {
    console.log(`${signal} received, stopping`);
    void server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(describeError(err).message);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

async function cmdStatus() {
  const { body } = await httpJson("/api/status");
  console.log(JSON.stringify(body, null, 2));
}

async function cmdRefresh() {
  const wait = hasFlag("--wait");
  const { status, body } = await httpPost(`/api/refresh${wait ? "?wait=1" : ""}`, {});
  console.log(JSON.stringify(body, null, 2));
  if (status === 502) process.exit(2);
}

async function cmdSummary() {
  const config = resolveConfig();
  const latest = loadLatestExport(config.dataDir);
  if (!latest) {
    console.error(`no export found in ${config.dataDir}; run "meshmap export" or start the server first`);
    process.exit(2);
  }
  console.log(`from ${latest.path}`);
  for (const line of formatSummary(summarize(latest.snapshot.graph))) console.log(line);
}

async function cmdPositions() {
  const { body } = await httpJson("/api/positions");
  console.log(JSON.stringify(body, null, 2));
}

async function cmdPositionsReset() {
  const space = getArg("--space", "free");
  const { body } = await httpPost("/api/positions/reset", { space });
  console.log(JSON.stringify(body, null, 2));
}

async function cmdExport() {
  const config = resolveConfig();
  const snapshot = await runPipeline(controllerSource(config), collectOptions(config));
  const out = getArg("--out");
  let path: string;
  if (out) {
    path = resolve(out);
    mkdirSync(dirname(path), { recursive: true });
    const tempPath = `${path}.tmp.${process.pid}.${Date.now()}`;
    writeFileSync(tempPath, `${JSON.stringify(exportDocument(snapshot), null, 2)}\n`, "utf8");
    renameSync(tempPath, path);
  } else {
    path = saveExport(config.dataDir, snapshot);
  }
  console.log(`saved ${path}`);
  for (const line of formatSummary(summarize(snapshot.graph))) console.log(line);
}

try {
  if (cmd === "start") {
    await cmdStart();
  } else if (cmd === "status") {
    await cmdStatus();
  } else if (cmd === "refresh") {
    await cmdRefresh();
  } else if (cmd === "summary") {
    await cmdSummary();
  } else if (cmd === "positions") {
    if (positional(1) === "reset") {
      await cmdPositionsReset();
    } else {
      await cmdPositions();
    }
  } else if (cmd === "export") {
    await cmdExport();
  } else {
    usage(1);
  }
} catch (err) {
  const { message, kind } = describeError(err);
  console.error(`${kind}: ${message}`);
  process.exit(2);
}
