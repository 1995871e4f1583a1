import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  ConfigError,
  loadHostConfig,
  parseHostConfig,
} from "../src/config/config.js";

describe("parseHostConfig", () => {
  it("fills in defaults", () => {
    expect(parseHostConfig("target: client\n")).toEqual({
      target: "client",
      modules: [],
      features: {},
      faults: { action: "evict-system", maxFaults: 1 },
      frameIntervalMs: 16,
      tickIntervalMs: 50,
      logLevel: "info",
    });
  });

  it("reads every key", () => {
    const config = parseHostConfig(
      [
        "target: server",
        "modules: [engine, hello]",
        "features:",
        "  gui: false",
        "faults:",
        "  action: evict-plugin",
        "  maxFaults: 3",
        "frameIntervalMs: 20",
        "tickIntervalMs: 100",
        "logLevel: debug",
      ].join("\n"),
    );

    expect(config).toEqual({
      target: "server",
      modules: ["engine", "hello"],
      features: { gui: false },
      faults: { action: "evict-plugin", maxFaults: 3 },
      frameIntervalMs: 20,
      tickIntervalMs: 100,
      logLevel: "debug",
    });
  });

  it("keeps defaults for the fault keys left out", () => {
    const config = parseHostConfig("target: client\nfaults:\n  action: abort\n");
    expect(config.faults).toEqual({ action: "abort", maxFaults: 1 });
  });

  it("names every invalid path", () => {
    const error = (() => {
      try {
        parseHostConfig(
          "target: client\nfaults:\n  maxFaults: 0\nlogLevel: loud\n",
          "host.yaml",
        );
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) {
      expect(error.issues.map((i) => i.path)).toEqual([
        "faults.maxFaults",
        "logLevel",
      ]);
      expect(error.message).toMatch(/^Invalid host configuration in host\.yaml: /);
    }
  });

  it("requires a target", () => {
    expect(() => parseHostConfig("")).toThrow(ConfigError);
  });

  it("reports YAML syntax errors", () => {
    const error = (() => {
      try {
        parseHostConfig("target: [client");
      } catch (e) {
        return e;
      }
    })();
    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) {
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0].path).toBe("");
    }
  });
});

describe("loadHostConfig", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("reads a file", async () => {
    dir = await mkdtemp(join(tmpdir(), "modhost-"));
    const path = join(dir, "host.yaml");
    await writeFile(path, "target: client\nmodules: [hello]\n");

    const config = await loadHostConfig(path);
    expect(config.modules).toEqual(["hello"]);
  });
});
