#!/usr/bin/env node

/** CLI entry point for clickup-dash. */

import { Command } from "commander";
import { createInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";
import { loadConfig, configExists, createDefaultConfig, parseUserId, CONFIG_PATH } from "./config.js";
import { fetchClickUpTasks } from "./clickup-reader.js";
import {
  loadLocalState,
  saveLocalState,
  loadCachedTasks,
  saveCachedTasks,
  markRefreshed,
  togglePin,
  snooze,
  snoozeUntil,
  unsnooze,
  isPinned,
} from "./local-state.js";
import { CATEGORIES, CATEGORY_LABELS, parseCategory } from "./categories.js";
import { buildWorkingSet, countByCategory, toDisplayTask } from "./view.js";
import { searchTasks } from "./search.js";
import {
  formatCategoryTabs,
  formatSearchResults,
  formatTaskDetails,
  formatTaskLines,
} from "./render.js";
import type { Category, Config, LocalState, Task } from "./types.js";

const program = new Command();

program
  .name("clickup-dash")
  .description("Personal ClickUp task dashboard with local pins and snoozes.")
  .version("0.1.0")
  .option("--offline", "Use cached tasks only, never contact ClickUp");

function reportError(e: unknown): void {
  const msg = e instanceof Error ? e.message : String(e);
  console.error(`Error: ${msg}`);
  process.exitCode = 1;
}

/** Wrap a command body so failures print one line and set the exit code. */
function guarded<A extends unknown[]>(
  fn: (...args: A) => void | Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (e: unknown) {
      reportError(e);
    }
  };
}

// ─── refresh helper ────────────────────────────────────────────────
async function refresh(config: Config, state: LocalState): Promise<[Task[], LocalState]> {
  console.log("Fetching tasks from ClickUp...");
  const tasks = await fetchClickUpTasks(config.api_token, config.user_id);
  const next = markRefreshed(state, new Date());
  saveCachedTasks(tasks);
  saveLocalState(next);
  console.log(`  Loaded ${tasks.length} tasks`);
  return [tasks, next];
}

/**
 * Tasks for a view: refreshed from ClickUp when auto_refresh is on or nothing
 * is cached, otherwise the cache. A failed refresh falls back to the cache.
 */
async function loadTasks(config: Config): Promise<[Task[], LocalState]> {
  const { offline } = program.opts<{ offline?: boolean }>();
  const state = loadLocalState();
  const cached = loadCachedTasks();

  if (offline || (!config.auto_refresh && cached.length > 0)) {
    return [cached, state];
  }

  try {
    return await refresh(config, state);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`  Failed to load: ${msg}`);
    console.log(`  Showing ${cached.length} cached tasks`);
    return [cached, state];
  }
}

function requireCategory(input: string): Category {
  const category = parseCategory(input);
  if (!category) {
    const valid = Object.values(CATEGORY_LABELS).join(", ");
    throw new Error(`Unknown category "${input}". Use one of: ${valid} (or 1-6).`);
  }
  return category;
}

function requireTask(tasks: readonly Task[], id: string): Task {
  const task = tasks.find((t) => t.id === id || t.custom_id === id);
  if (!task) {
    throw new Error(`No task with id ${id} in the cached tasks. Try 'clickup-dash refresh'.`);
  }
  return task;
}

// ─── setup ─────────────────────────────────────────────────────────
program
  .command("setup")
  .description("Interactive first-time setup: create the config file")
  .action(
    guarded(async () => {
      console.log("=== clickup-dash setup ===\n");

      if (configExists()) {
        console.log("Config file already exists. Edit it at:");
        console.log(`  ${CONFIG_PATH}`);
        return;
      }

      console.log("To get a ClickUp API token:");
      console.log("  1. Open ClickUp Settings > Apps");
      console.log('  2. Click "Generate" under API Token and copy it\n');

      const rl = createInterface({ input: stdin, output: stdout });
      try {
        const token = await rl.question("Paste your ClickUp API token: ");
        const userId = await rl.question("Your ClickUp user ID: ");
        const path = createDefaultConfig(token.trim(), userId.trim());
        console.log(`\nConfig created at: ${path}`);
      } finally {
        rl.close();
      }

      console.log("\nSetup complete! Try running:");
      console.log("  clickup-dash refresh");
      console.log("  clickup-dash list");
    }),
  );

// ─── refresh ───────────────────────────────────────────────────────
program
  .command("refresh")
  .description("Fetch tasks from ClickUp and update the local cache")
  .action(
    guarded(async () => {
      const config = loadConfig();
      await refresh(config, loadLocalState());
    }),
  );

// ─── list ──────────────────────────────────────────────────────────
program
  .command("list")
  .description("Show the tasks in a category (default: My Action)")
  .argument("[category]", "category key, label or tab number 1-6", "my_action")
  .option("-f, --filter <text>", "only tasks whose name, list, status or description contain this")
  .option("-a, --all-users", "include tasks not assigned to you")
  .action(
    guarded(async (input: string, opts: { filter?: string; allUsers?: boolean }) => {
      const category = requireCategory(input);
      const config = loadConfig();
      const [tasks, state] = await loadTasks(config);
      const now = new Date();

      const userId = opts.allUsers ? undefined : parseUserId(config);
      const view = buildWorkingSet(tasks, state.overlays, now, category, {
        userId,
        text: opts.filter,
      });

      console.log(formatCategoryTabs(countByCategory(tasks, state.overlays, now), category));
      console.log("");
      if (view.length === 0) {
        console.log("  No tasks");
        return;
      }
      for (const line of formatTaskLines(view)) console.log(line);
      console.log(`\n  ${view.length} tasks`);
    }),
  );

// ─── counts ────────────────────────────────────────────────────────
program
  .command("counts")
  .description("Show how many tasks fall into each category")
  .action(
    guarded(async () => {
      const config = loadConfig();
      const [tasks, state] = await loadTasks(config);
      const counts = countByCategory(tasks, state.overlays, new Date());
      for (const category of CATEGORIES) {
        console.log(`  ${CATEGORY_LABELS[category]}: ${counts[category]}`);
      }
    }),
  );

// ─── search ────────────────────────────────────────────────────────
program
  .command("search")
  .description("Fuzzy search across all tasks")
  .argument("<query...>", "search text")
  .action(
    guarded(async (words: string[]) => {
      const config = loadConfig();
      const [tasks, state] = await loadTasks(config);
      const query = words.join(" ");
      const results = searchTasks(tasks, state.overlays, query);

      if (results.length === 0) {
        console.log("  No results");
        return;
      }
      for (const line of formatSearchResults(results)) console.log(line);
      console.log(`\n  ${results.length} results`);
    }),
  );

// ─── show ──────────────────────────────────────────────────────────
program
  .command("show")
  .description("Show the details of one task")
  .argument("<id>", "task id or custom id")
  .action(
    guarded((id: string) => {
      const state = loadLocalState();
      const task = requireTask(loadCachedTasks(), id);
      const lines = formatTaskDetails(toDisplayTask(task, state.overlays), new Date());
      for (const line of lines) console.log(line);
    }),
  );

// ─── pin ───────────────────────────────────────────────────────────
program
  .command("pin")
  .description("Toggle the pin on a task")
  .argument("<id>", "task id or custom id")
  .action(
    guarded((id: string) => {
      const task = requireTask(loadCachedTasks(), id);
      const state = togglePin(loadLocalState(), task.id);
      saveLocalState(state);
      console.log(isPinned(state, task.id) ? "Task pinned" : "Task unpinned");
    }),
  );

// ─── snooze ────────────────────────────────────────────────────────
program
  .command("snooze")
  .description("Hide a task in the Snoozed tab for a number of days")
  .argument("<id>", "task id or custom id")
  .argument("<days>", "number of days")
  .action(
    guarded((id: string, days: string) => {
      if (!/^\d+$/.test(days)) {
        throw new Error(`Invalid number of days: ${days}`);
      }
      const task = requireTask(loadCachedTasks(), id);
      const until = snoozeUntil(new Date(), Number(days));
      saveLocalState(snooze(loadLocalState(), task.id, until));
      console.log(`Task snoozed for ${days} days`);
    }),
  );

// ─── unsnooze ──────────────────────────────────────────────────────
program
  .command("unsnooze")
  .description("Bring a snoozed task back to its status tab")
  .argument("<id>", "task id or custom id")
  .action(
    guarded((id: string) => {
      const task = requireTask(loadCachedTasks(), id);
      saveLocalState(unsnooze(loadLocalState(), task.id));
      console.log("Task unsnoozed");
    }),
  );

await program.parseAsync();
