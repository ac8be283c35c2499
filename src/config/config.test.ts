import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { resolveSignalSettings } from "../market/signals/settings.js";
import { ConfigError } from "../errors.js";
import { loadConfig, parseConfig } from "./config.js";
import { CONFIG_PATH_ENV, STATE_DIR_ENV, resolveConfigPath, resolveStateDir } from "./paths.js";

describe("config paths", () => {
  const homedir = () => "/home/tester";

  it("defaults under the home directory", () => {
    expect(resolveStateDir({}, homedir)).toBe(path.join("/home/tester", ".marketlore"));
    expect(resolveConfigPath({}, homedir)).toBe(
      path.join("/home/tester", ".marketlore", "marketlore.json"),
    );
  });

  it("expands overrides", () => {
    expect(resolveStateDir({ [STATE_DIR_ENV]: "~/state" }, homedir)).toBe(
      path.join("/home/tester", "state"),
    );
    expect(resolveConfigPath({ [STATE_DIR_ENV]: "/srv/ml" }, homedir)).toBe(
      path.join("/srv/ml", "marketlore.json"),
    );
    expect(resolveConfigPath({ [CONFIG_PATH_ENV]: "/etc/ml.json" }, homedir)).toBe("/etc/ml.json");
  });
});

describe("parseConfig", () => {
  it("accepts a full config and feeds signal settings", () => {
    const cfg = parseConfig({
      logging: { level: "warn" },
      signals: { window: 10, thresholds: { rsiOversold: 25 } },
      embeddings: { model: "hash-256", dimension: 256, provider: { kind: "hashing" } },
      news: { rssFeeds: [{ name: "wire", url: "https://news.example.com/rss" }] },
      market: { symbols: ["BTC", "ETH"] },
    });
    const settings = resolveSignalSettings(cfg.signals);
    expect(settings.window).toBe(10);
    expect(settings.rsiPeriod).toBe(14);
    expect(settings.thresholds).toEqual({ rsiOverbought: 70, rsiOversold: 25, trendBandPct: 5 });
  });

  it("rejects unknown keys", () => {
    expect(() => parseConfig({ signals: { windw: 7 } })).toThrow(ConfigError);
  });

  it("reports where inverted thresholds were found", () => {
    expect(() =>
      parseConfig({ signals: { thresholds: { rsiOversold: 80, rsiOverbought: 70 } } }),
    ).toThrow("invalid config: signals.thresholds: rsiOversold must be below rsiOverbought");
  });

  it("checks a one-sided threshold against the default on the other side", () => {
    expect(() => parseConfig({ signals: { thresholds: { rsiOversold: 80 } } })).toThrow(
      "invalid config: signals.thresholds: rsiOversold must be below rsiOverbought",
    );
    expect(() => parseConfig({ signals: { thresholds: { rsiOverbought: 20 } } })).toThrow(ConfigError);
    expect(parseConfig({ signals: { thresholds: { rsiOverbought: 60 } } }).signals?.thresholds).toEqual({
      rsiOverbought: 60,
    });
  });

  it("refuses to resolve signal settings with crossed thresholds", () => {
    expect(() => resolveSignalSettings({ thresholds: { rsiOversold: 80 } })).toThrow(
      "signals.thresholds: rsiOversold (80) must be below rsiOverbought (70)",
    );
  });

  it("requires a url for the http provider", () => {
    expect(() => parseConfig({ embeddings: { provider: { kind: "http" } } })).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  let tempDir: string | null = null;

  afterEach(async () => {
    if (tempDir) {
      await fs.promises.rm(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it("returns an empty config when no file exists", async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "marketlore-config-"));
    expect(loadConfig({ [STATE_DIR_ENV]: tempDir })).toEqual({});
  });

  it("reads the config file", async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "marketlore-config-"));
    await fs.promises.writeFile(
      path.join(tempDir, "marketlore.json"),
      JSON.stringify({ embeddings: { metric: "dot" } }),
    );
    expect(loadConfig({ [STATE_DIR_ENV]: tempDir })).toEqual({ embeddings: { metric: "dot" } });
  });

  it("rejects malformed JSON", async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "marketlore-config-"));
    const configPath = path.join(tempDir, "custom.json");
    await fs.promises.writeFile(configPath, "{ nope");
    expect(() => loadConfig({ [CONFIG_PATH_ENV]: configPath })).toThrow(ConfigError);
  });
});
