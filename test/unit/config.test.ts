/**
 * Unit tests for environment configuration.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import {
  loadConfig,
  loadEnvFile,
  ConfigError,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MIN_REQUEST_INTERVAL,
} from "../../src/config.js";

describe("loadConfig", () => {
  it("reads the token and applies defaults", () => {
    expect(loadConfig({ NOTION_TOKEN: "test-secret" })).toEqual({
      notionToken: "test-secret",
      minRequestInterval: DEFAULT_MIN_REQUEST_INTERVAL,
      maxRetries: DEFAULT_MAX_RETRIES,
    });
  });

  it("uses the defaults 334ms and 3 retries", () => {
    expect(DEFAULT_MIN_REQUEST_INTERVAL).toBe(334);
    expect(DEFAULT_MAX_RETRIES).toBe(3);
  });

  it("trims the token", () => {
    expect(loadConfig({ NOTION_TOKEN: "  test-secret\n" }).notionToken).toBe("test-secret");
  });

  it("reads numeric overrides", () => {
    const config = loadConfig({
      NOTION_TOKEN: "test-secret",
      NOTION_MIN_REQUEST_INTERVAL: "0",
      NOTION_MAX_RETRIES: "5",
    });
    expect(config.minRequestInterval).toBe(0);
    expect(config.maxRetries).toBe(5);
  });

  it("treats empty numeric values as unset", () => {
    const config = loadConfig({ NOTION_TOKEN: "test-secret", NOTION_MAX_RETRIES: "" });
    expect(config.maxRetries).toBe(3);
  });

  it("throws ConfigError when the token is missing", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ NOTION_TOKEN: "   " })).toThrow(
      "Configuration error:\n  - NOTION_TOKEN environment variable is not set"
    );
  });

  it("lists every problem at once", () => {
    let error: unknown;
    try {
      loadConfig({ NOTION_MIN_REQUEST_INTERVAL: "fast", NOTION_MAX_RETRIES: "-1" });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError ? error.problems : []).toEqual([
      "NOTION_TOKEN environment variable is not set",
      'NOTION_MIN_REQUEST_INTERVAL must be a non-negative integer (got "fast")',
      'NOTION_MAX_RETRIES must be a non-negative integer (got "-1")',
    ]);
  });

  it("rejects invalid numbers even with a token", () => {
    expect(() => loadConfig({ NOTION_TOKEN: "test-secret", NOTION_MAX_RETRIES: "2.5" })).toThrow(
      'NOTION_MAX_RETRIES must be a non-negative integer (got "2.5")'
    );
  });
});

describe("loadEnvFile", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "config-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("fills unset variables from the file and keeps set ones", async () => {
    const envFile = path.join(tempDir, ".env");
    await fs.writeFile(envFile, "# local settings\nNOTION_TOKEN=test-secret\nNOTION_MAX_RETRIES=5\n");
    const env: NodeJS.ProcessEnv = { NOTION_MAX_RETRIES: "1" };

    expect(await loadEnvFile(envFile, env)).toEqual(["NOTION_TOKEN"]);
    expect(env).toEqual({ NOTION_TOKEN: "test-secret", NOTION_MAX_RETRIES: "1" });
    expect(loadConfig(env)).toEqual({
      notionToken: "test-secret",
      minRequestInterval: 334,
      maxRetries: 1,
    });
  });

  it("does nothing when the file is missing", async () => {
    const env: NodeJS.ProcessEnv = {};

    expect(await loadEnvFile(path.join(tempDir, ".env"), env)).toEqual([]);
    expect(env).toEqual({});
  });
});
