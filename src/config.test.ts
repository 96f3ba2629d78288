import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { configExists, createDefaultConfig, loadConfig, parseUserId } from "./config.js";

let dir: string;
let path: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "clickup-dash-config-"));
  path = join(dir, "config.toml");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("loadConfig", () => {
  it("reads token, user id and auto_refresh", () => {
    writeFileSync(path, 'api_token = "test-token"\nuser_id = "42"\nauto_refresh = false\n');
    expect(loadConfig(path)).toEqual({
      api_token: "test-token",
      user_id: "42",
      auto_refresh: false,
    });
  });

  it("accepts a bare integer user id and defaults auto_refresh to true", () => {
    writeFileSync(path, 'api_token = "test-token"\nuser_id = 42\n');
    expect(loadConfig(path)).toEqual({
      api_token: "test-token",
      user_id: "42",
      auto_refresh: true,
    });
  });

  it("writes a template and asks the user to fill it in when missing", () => {
    expect(() => loadConfig(path)).toThrow(`Config file created at ${path}`);
    expect(existsSync(path)).toBe(true);
  });

  it("rejects the untouched template", () => {
    createDefaultConfig("", "", path);
    expect(() => loadConfig(path)).toThrow(`api_token is required in config file: ${path}`);
  });

  it("requires a user id", () => {
    writeFileSync(path, 'api_token = "test-token"\n');
    expect(() => loadConfig(path)).toThrow(`user_id is required in config file: ${path}`);
  });

  it("reports TOML syntax errors with the file path", () => {
    writeFileSync(path, "api_token = \n");
    expect(() => loadConfig(path)).toThrow(`Failed to parse config from ${path}`);
  });
});

describe("createDefaultConfig", () => {
  it("writes a config that loads back", () => {
    expect(configExists(path)).toBe(false);
    expect(createDefaultConfig("test-token", "7", path)).toBe(path);
    expect(configExists(path)).toBe(true);
    expect(loadConfig(path)).toEqual({
      api_token: "test-token",
      user_id: "7",
      auto_refresh: true,
    });
  });

  it("creates missing directories", () => {
    const nested = join(dir, "a", "b", "config.toml");
    createDefaultConfig("test-token", "7", nested);
    expect(existsSync(nested)).toBe(true);
  });
});

describe("parseUserId", () => {
  it("parses numeric ids", () => {
    expect(parseUserId({ api_token: "t", user_id: " 42 ", auto_refresh: true })).toBe(42);
  });

  it("returns undefined for anything else", () => {
    expect(parseUserId({ api_token: "t", user_id: "me", auto_refresh: true })).toBeUndefined();
    expect(parseUserId({ api_token: "t", user_id: "", auto_refresh: true })).toBeUndefined();
  });
});
