import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, redactConfig } from "./config.js";
import { ValidationError } from "./errors.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "meshmap-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("applies defaults", () => {
    const config = loadConfig({ env: { MESHMAP_DATA_DIR: dir } });
    expect(config).toEqual({
      controllerUrl: "ws://supervisor/core/websocket",
      token: "",
      dataDir: dir,
      port: 8099,
      collectionTimeoutSeconds: 120,
      autoRefreshMinutes: 0,
      topologyScanWait: 0,
      concurrency: 4,
      debug: false,
    });
  });

  it("layers options file, environment and flags", () => {
    writeFileSync(
      join(dir, "options.json"),
      JSON.stringify({ auto_refresh_minutes: 10, topology_scan_wait: 5, debug: true, concurrency: 6 }),
      "utf8"
    );
    const config = loadConfig({
      env: { MESHMAP_DATA_DIR: dir, SUPERVISOR_TOKEN: "test-secret", TOPOLOGY_SCAN_WAIT: "30", DEBUG: "false" },
      flags: { port: "9000", concurrency: undefined },
    });
    expect(config.autoRefreshMinutes).toBe(10);
    expect(config.topologyScanWait).toBe(30);
    expect(config.debug).toBe(false);
    expect(config.concurrency).toBe(6);
    expect(config.port).toBe(9000);
    expect(config.token).toBe("test-secret");
    expect(redactConfig(config).token).toBe("***");
  });

  it("takes the data directory from flags before the environment", () => {
    const config = loadConfig({ env: { MESHMAP_DATA_DIR: "/elsewhere" }, flags: { dataDir: dir } });
    expect(config.dataDir).toBe(dir);
  });

  it("rejects out-of-range values with the offending path", () => {
    expect(() => loadConfig({ env: { MESHMAP_DATA_DIR: dir }, flags: { concurrency: "0" } })).toThrow(
      /concurrency/
    );
    expect(() => loadConfig({ env: { MESHMAP_DATA_DIR: dir, MESHMAP_CONTROLLER_URL: "http://ha:8123" } })).toThrow(
      ValidationError
    );
  });

  it("rejects an unparseable options file", () => {
    writeFileSync(join(dir, "options.json"), "{ nope", "utf8");
    expect(() => loadConfig({ env: { MESHMAP_DATA_DIR: dir } })).toThrow(ValidationError);
  });
});
