/** Load and manage configuration from ~/.config/clickup-dash/config.toml. */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import { parse as parseToml } from "smol-toml";
import type { Config } from "./types.js";

export const CONFIG_DIR = join(homedir(), ".config", "clickup-dash");
export const CONFIG_PATH = join(CONFIG_DIR, "config.toml");

function defaults(): Config {
  return {
    api_token: "",
    user_id: "",
    auto_refresh: true,
  };
}

function readToml(path: string): Record<string, unknown> {
  try {
    return parseToml(readFileSync(path, "utf-8"));
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Failed to parse config from ${path}: ${msg}`);
  }
}

export function loadConfig(path: string = CONFIG_PATH): Config {
  if (!existsSync(path)) {
    createDefaultConfig("", "", path);
    throw new Error(
      `Config file created at ${path}. ` +
        "Edit it to add your ClickUp API token and user ID.",
    );
  }

  const userCfg = readToml(path);
  const cfg = defaults();
  const token = userCfg["api_token"];
  if (typeof token === "string") cfg.api_token = token;

  // user_id may be written bare (user_id = 123) or quoted
  const userId = userCfg["user_id"];
  if (typeof userId === "string") cfg.user_id = userId;
  else if (typeof userId === "number" || typeof userId === "bigint") cfg.user_id = String(userId);

  const autoRefresh = userCfg["auto_refresh"];
  if (typeof autoRefresh === "boolean") cfg.auto_refresh = autoRefresh;

  if (!cfg.api_token) {
    throw new Error(`api_token is required in config file: ${path}`);
  }
  if (!cfg.user_id) {
    throw new Error(`user_id is required in config file: ${path}`);
  }

  return cfg;
}

export function configExists(path: string = CONFIG_PATH): boolean {
  return existsSync(path);
}

export function createDefaultConfig(
  apiToken: string = "",
  userId: string = "",
  path: string = CONFIG_PATH,
): string {
  mkdirSync(dirname(path), { recursive: true });

  const content = `# clickup-dash configuration
#
# Get your API token from: ClickUp Settings > Apps > API Token
# Your user ID is the number in your ClickUp profile URL.

api_token = ${JSON.stringify(apiToken)}
user_id = ${JSON.stringify(userId)}

# Fetch fresh tasks every time a view is shown
auto_refresh = true
`;

  writeFileSync(path, content, "utf-8");
  return path;
}

/** Numeric user id for the assignment filter; undefined disables the filter. */
export function parseUserId(config: Config): number | undefined {
  const trimmed = config.user_id.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  return Number(trimmed);
}
