import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../core/errors";
import { DEFAULT_CONFIG, loadConfig, toList } from "./loadConfig";

describe("loadConfig", () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "config-"));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const configPath = path.join(workDir, "config.json");
    fs.writeFileSync(configPath, typeof content === "string" ? content : JSON.stringify(content));
    return configPath;
  }

  it("returns the defaults when nothing is set", () => {
    const config = loadConfig(undefined, {});
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.enabledSources).toHaveLength(14);
    expect(config.analysisApiKey).toBeUndefined();
  });

  it("layers the file over the defaults and the environment over the file", () => {
    const configPath = writeConfig({
      sourceDelayMs: 500,
      maxRetries: 5,
      enabledSources: ["coa01", "coa05"],
      outputDirs: { reports: "out/reports" },
    });

    const config = loadConfig(configPath, {
      MAX_RETRIES: "2",
      ANTHROPIC_API_KEY: "test-secret",
      ANALYSIS_ENABLED: "no",
      SINK_TYPE: " LOCAL_JSONL ",
    });

    expect(config.sourceDelayMs).toBe(500);
    expect(config.maxRetries).toBe(2);
    expect(config.enabledSources).toEqual(["coa01", "coa05"]);
    expect(config.outputDirs).toEqual({ opinions: "data/opinions", reports: "out/reports", manifests: "data/manifests" });
    expect(config.analysisApiKey).toBe("test-secret");
    expect(config.analysisEnabled).toBe(false);
    expect(config.sinkType).toBe("local_jsonl");
  });

  it("reads the source list and batch size from the environment", () => {
    const config = loadConfig(undefined, { ENABLED_SOURCES: " COA03, coa14 ,", ANALYSIS_BATCH_SIZE: "25" });
    expect(config.enabledSources).toEqual(["coa03", "coa14"]);
    expect(config.analysisBatchSize).toBe(25);
  });

  it("rejects malformed environment values", () => {
    expect(() => loadConfig(undefined, { MAX_RETRIES: "three" })).toThrow("MAX_RETRIES must be an integer, got 'three'");
    expect(() => loadConfig(undefined, { IGNORE_HTTPS_ERRORS: "maybe" })).toThrow(ConfigError);
    expect(() => loadConfig(undefined, { SINK_TYPE: "kafka" })).toThrow("SINK_TYPE must be one of local_jsonl");
    expect(() => loadConfig(undefined, { SOURCE_DELAY_MS: "-1" })).toThrow("sourceDelayMs must not be negative, got -1");
    expect(() => loadConfig(undefined, { ANALYSIS_BATCH_SIZE: "0" })).toThrow("analysisBatchSize must be at least 1, got 0");
  });

  it("rejects source ids outside the fourteen courts", () => {
    expect(() => loadConfig(undefined, { ENABLED_SOURCES: "coa01,coa15" })).toThrow("Unknown source id(s): coa15");
  });

  it("rejects a missing, unparsable or invalid file", () => {
    expect(() => loadConfig(path.join(workDir, "missing.json"), {})).toThrow(/Config file not found/);
    expect(() => loadConfig(writeConfig("{ not json"), {})).toThrow(/is not valid JSON/);
    expect(() => loadConfig(writeConfig({ maxRetries: 0 }), {})).toThrow(/is invalid: maxRetries:/);
    expect(() => loadConfig(writeConfig({ retries: 3 }), {})).toThrow(ConfigError);
  });
});

describe("toList", () => {
  it("splits, trims and lower-cases entries", () => {
    expect(toList("A, b,,c ", [])).toEqual(["a", "b", "c"]);
  });

  it("falls back on a blank value", () => {
    expect(toList("  ", ["coa01"])).toEqual(["coa01"]);
    expect(toList(undefined, [])).toEqual([]);
  });
});
