import { describe, it, expect } from "vitest";
import { loadConfig } from "../utils/config.js";
import { ConfigError } from "../utils/errors.js";

describe("loadConfig", () => {
  it("falls back to defaults on an empty environment", () => {
    const config = loadConfig({});
    expect(config.apyThreshold).toBe(5);
    expect(config.source).toEqual({ url: "https://yields.llama.fi/pools", timeoutMs: 15_000 });
    expect(config.targets.symbols).toEqual(["USDC", "DAI", "WBTC", "CBBTC"]);
    expect(config.targets.projects).toEqual(["aave-v3", "aave-v2"]);
    expect(config.targets.chains).toContain("Ethereum");
    expect(config.targets.poolIds).toEqual([]);
    expect(config.targets.symbolMatch).toBe("token");
    expect(config.output.logFile).toBe("data/logs/apy_log_aave-all.csv");
    expect(config.output.snapshotFile).toBe("data/exports/apy_snapshot_aave-all.json");
  });

  it("reads overrides", () => {
    const config = loadConfig({
      APY_THRESHOLD: "4.0",
      TARGET_SYMBOLS: " usdc , dai ,",
      TARGET_CHAINS: "",
      TARGET_POOL_IDS: "abc-1,def-2",
      SYMBOL_MATCH: "EXACT",
      PROJECT_SLUG: "stables",
      LOGS_DIR: "/tmp/logs",
      EXPORTS_DIR: "/tmp/exports",
      FETCH_TIMEOUT_MS: "5000",
    });
    expect(config.apyThreshold).toBe(4);
    expect(config.targets.symbols).toEqual(["usdc", "dai"]);
    expect(config.targets.chains).toEqual([]);
    expect(config.targets.poolIds).toEqual(["abc-1", "def-2"]);
    expect(config.targets.symbolMatch).toBe("exact");
    expect(config.source.timeoutMs).toBe(5000);
    expect(config.output.logFile).toBe("/tmp/logs/apy_log_stables.csv");
    expect(config.output.snapshotFile).toBe("/tmp/exports/apy_snapshot_stables.json");
  });

  it("treats a blank threshold as unset", () => {
    expect(loadConfig({ APY_THRESHOLD: "  " }).apyThreshold).toBe(5);
  });

  it("rejects a non-numeric threshold", () => {
    expect(() => loadConfig({ APY_THRESHOLD: "high" })).toThrow(ConfigError);
    expect(() => loadConfig({ APY_THRESHOLD: "high" })).toThrow('APY_THRESHOLD must be a number, got "high"');
  });

  it("rejects a non-positive timeout", () => {
    expect(() => loadConfig({ FETCH_TIMEOUT_MS: "0" })).toThrow(ConfigError);
  });

  it("rejects an unknown match mode", () => {
    expect(() => loadConfig({ SYMBOL_MATCH: "fuzzy" })).toThrow(ConfigError);
  });

  it("rejects an empty symbol list", () => {
    expect(() => loadConfig({ TARGET_SYMBOLS: " , " })).toThrow("TARGET_SYMBOLS must list at least one symbol");
  });

  it("returns a frozen config", () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.targets)).toBe(true);
    expect(Object.isFrozen(config.targets.symbols)).toBe(true);
  });
});
