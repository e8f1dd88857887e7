import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { ConfigurationError } from "../src/domain/errors.js";
import { parseMonitorConfig, readMonitorConfig } from "../src/services/monitor-config.js";

describe("monitor config", () => {
  test("applies defaults", () => {
    const config = parseMonitorConfig({ keywords: ["k"], domains: ["d.com"] });

    expect(config).toEqual({
      keywords: ["k"],
      domains: ["d.com"],
      intervalMinutes: 60,
      runImmediately: true,
      probeDelayMs: 1000,
      retentionDays: 90,
      searchParams: {},
    });
  });

  test("trims entries and drops blanks", () => {
    const config = parseMonitorConfig({ keywords: [" k ", ""], domains: ["d.com"] });
    expect(config.keywords).toEqual(["k"]);
  });

  test("rejects an empty domain list", () => {
    expect(() => parseMonitorConfig({ keywords: ["k"], domains: ["  "] })).toThrow(
      "Invalid monitor configuration: domains: At least one domain is required",
    );
  });

  test("rejects a non-positive interval", () => {
    expect(() => parseMonitorConfig({ keywords: ["k"], domains: ["d.com"], intervalMinutes: 0 })).toThrow(
      ConfigurationError,
    );
  });

  test("reads the shipped example file", async () => {
    const config = await readMonitorConfig("config/monitor.json");

    expect(config.keywords).toEqual(["Private Crawler Cloud", "Private Proxy IP", "AI-Get"]);
    expect(config.domains).toEqual(["dataget.ai", "dataget.com"]);
    expect(config.searchParams.location).toBe("United States");
  });

  test("reports a missing file as a configuration error", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "rank-config-"));
    try {
      await expect(readMonitorConfig(path.join(dir, "absent.json"))).rejects.toBeInstanceOf(ConfigurationError);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
