import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig } from "./config";
import { ConfigurationError } from "./errors";
import { createLogger } from "./logger";

describe("loadConfig", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "arxiv-digest-config-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(name: string, yaml: string): string {
    const path = join(tmpDir, name);
    writeFileSync(path, yaml);
    return path;
  }

  it("should fill every section with defaults when only topics are given", () => {
    const path = writeConfig(
      "minimal.yaml",
      `
topics:
  - name: LLM
    categories: [cs.CL]
`,
    );

    const config = loadConfig(path);

    expect(config.topics).toEqual([{ name: "LLM", queryTerms: [], categories: ["cs.CL"] }]);
    expect(config.selection).toEqual({
      lookbackHours: 36,
      recentWindowDays: 7,
      maxRecentItemsPerTopic: 5,
      maxEducationalItemsPerTopic: 1,
    });
    expect(config.ledger).toEqual({
      driver: "json",
      path: "state/ledger.json",
      maxDeliveredIds: 20000,
    });
    expect(config.discord.maxContentLength).toBe(2000);
    expect(config.discord.skipEmptyDigest).toBe(false);
    expect(config.arxiv.interQuerySleepSeconds).toBe(3.1);
    expect(config.report.timezone).toBe("Asia/Tokyo");
    expect(config.schedule.cron).toBeUndefined();
  });

  it("should load the example configuration", () => {
    const examplePath = fileURLToPath(new URL("../config.example.yaml", import.meta.url));

    const config = loadConfig(examplePath);

    expect(config.topics.map((t) => t.name)).toEqual(["LLM", "Robotics"]);
    expect(config.schedule.cron).toBe("0 8 * * *");
  });

  it("should require at least one topic", () => {
    const path = writeConfig("no-topics.yaml", "topics: []\n");

    expect(() => loadConfig(path)).toThrow(ConfigurationError);
    expect(() => loadConfig(path)).toThrow(/topics: at least one topic is required/);
  });

  it("should report every invalid field", () => {
    const path = writeConfig(
      "bad.yaml",
      `
selection:
  lookbackHours: 0
ledger:
  driver: postgres
topics:
  - name: LLM
`,
    );

    let message = "";
    try {
      loadConfig(path);
    } catch (err) {
      message = err instanceof Error ? err.message : "";
    }

    expect(message.startsWith(`invalid configuration in ${path}:\n`)).toBe(true);
    expect(message).toContain("  - selection.lookbackHours:");
    expect(message).toContain("  - ledger.driver:");
  });

  it("should reject an invalid cron expression", () => {
    const path = writeConfig(
      "bad-cron.yaml",
      `
schedule:
  cron: "not a cron"
topics:
  - name: LLM
    categories: [cs.CL]
`,
    );

    expect(() => loadConfig(path)).toThrow(/schedule\.cron: invalid cron expression/);
  });

  it("should report a missing file", () => {
    const path = join(tmpDir, "absent.yaml");

    expect(() => loadConfig(path)).toThrow(`failed to read config file at ${path}`);
  });

  it("should report malformed YAML", () => {
    const path = writeConfig("broken.yaml", "topics: [unterminated\n");

    expect(() => loadConfig(path)).toThrow(`failed to parse YAML in ${path}`);
  });
});

describe("createLogger", () => {
  it("should write JSON lines with level labels and ISO timestamps", () => {
    const lines: Array<string> = [];
    const logger = createLogger("info", {
      write(line: string) {
        lines.push(line);
      },
    });

    logger.info({ topic: "LLM" }, "topic selected");
    logger.debug("hidden");

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]!);
    expect(entry).toMatchObject({
      level: "info",
      name: "arxiv-digest",
      topic: "LLM",
      msg: "topic selected",
    });
    expect(entry.time).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it("should take its level from LOG_LEVEL when none is given", () => {
    vi.stubEnv("LOG_LEVEL", "warn");

    expect(createLogger().level).toBe("warn");
  });

  it("should prefer an explicit level", () => {
    vi.stubEnv("LOG_LEVEL", "warn");

    expect(createLogger("debug").level).toBe("debug");
  });
});
