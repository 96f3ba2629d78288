/**
 * Local overlay state (pins, snoozes) and the cached task list, stored as JSON
 * next to the config file.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { CONFIG_DIR } from "./config.js";
import { isValidTimestamp } from "./clickup-reader.js";
import { overlayFor } from "./view.js";
import type { LocalState, Priority, Task, TaskOverlay } from "./types.js";

const STATE_FILE = "local_state.json";
const CACHE_FILE = "tasks_cache.json";

const DAY_MS = 24 * 60 * 60 * 1000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readOverlay(raw: unknown): TaskOverlay {
  const overlay: TaskOverlay = { pinned: false };
  if (!isRecord(raw)) return overlay;
  if (raw.pinned === true) overlay.pinned = true;
  if (typeof raw.snoozed_until === "string") overlay.snoozed_until = raw.snoozed_until;
  if (typeof raw.sort_order === "number") overlay.sort_order = raw.sort_order;
  return overlay;
}

function readPriority(value: unknown): Priority | undefined {
  return value === 1 || value === 2 || value === 3 || value === 4 ? value : undefined;
}

/** A cached task, or undefined when a required field is missing or mistyped. */
function readTask(raw: unknown): Task | undefined {
  if (!isRecord(raw)) return undefined;
  const { id, name, status, list_name, url } = raw;
  if (
    typeof id !== "string" ||
    typeof name !== "string" ||
    typeof status !== "string" ||
    typeof list_name !== "string" ||
    typeof url !== "string"
  ) {
    return undefined;
  }

  const tags = Array.isArray(raw.tags) ? raw.tags : [];
  const assignees = Array.isArray(raw.assignee_ids) ? raw.assignee_ids : [];
  const task: Task = {
    id,
    name,
    status,
    list_name,
    url,
    tags: tags.filter((t): t is string => typeof t === "string"),
    assignee_ids: assignees.filter((a): a is number => typeof a === "number"),
  };

  if (typeof raw.due_date === "number" && isValidTimestamp(raw.due_date)) {
    task.due_date = raw.due_date;
  }
  const priority = readPriority(raw.priority);
  if (priority !== undefined) task.priority = priority;
  if (typeof raw.description === "string") task.description = raw.description;
  if (typeof raw.custom_item_id === "number") task.custom_item_id = raw.custom_item_id;
  if (typeof raw.custom_id === "string") task.custom_id = raw.custom_id;
  if (typeof raw.parent_id === "string") task.parent_id = raw.parent_id;
  return task;
}

function readJson(path: string): unknown {
  const raw = readFileSync(path, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Failed to parse ${path}: ${msg}`);
  }
}

export function emptyState(): LocalState {
  return { overlays: {} };
}

export function loadLocalState(dir: string = CONFIG_DIR): LocalState {
  const path = join(dir, STATE_FILE);
  if (!existsSync(path)) return emptyState();

  const data = readJson(path);
  const state = emptyState();
  if (!isRecord(data)) return state;

  if (isRecord(data.overlays)) {
    // fromEntries defines own keys, so an id like "__proto__" survives
    state.overlays = Object.fromEntries(
      Object.entries(data.overlays).map(([id, raw]) => [id, readOverlay(raw)]),
    );
  }
  if (typeof data.last_refresh === "string") state.last_refresh = data.last_refresh;
  return state;
}

export function saveLocalState(state: LocalState, dir: string = CONFIG_DIR): void {
  mkdirSync(dir, { recursive: true });
  writeFileSync(join(dir, STATE_FILE), JSON.stringify(state, null, 2), "utf-8");
}

export function loadCachedTasks(dir: string = CONFIG_DIR): Task[] {
  const path = join(dir, CACHE_FILE);
  if (!existsSync(path)) return [];
  const data = readJson(path);
  if (!Array.isArray(data)) {
    throw new Error(`Task cache at ${path} is not a list`);
  }
  // Entries that are not tasks are skipped; the next refresh rewrites the file
  const tasks: Task[] = [];
  for (const raw of data) {
    const task = readTask(raw);
    if (task) tasks.push(task);
  }
  return tasks;
}

export function saveCachedTasks(tasks: readonly Task[], dir: string = CONFIG_DIR): void {
  mkdirSync(dir, { recursive: true });
  writeFileSync(join(dir, CACHE_FILE), JSON.stringify(tasks, null, 2), "utf-8");
}

// ─── overlay updates ───────────────────────────────────────────────
// Each returns a new state and leaves the one passed in unchanged.

function withOverlay(state: LocalState, taskId: string, overlay: TaskOverlay): LocalState {
  return { ...state, overlays: { ...state.overlays, [taskId]: overlay } };
}

export function getOverlay(state: LocalState, taskId: string): TaskOverlay {
  return overlayFor(state.overlays, taskId);
}

export function isPinned(state: LocalState, taskId: string): boolean {
  return getOverlay(state, taskId).pinned;
}

export function togglePin(state: LocalState, taskId: string): LocalState {
  const overlay = getOverlay(state, taskId);
  return withOverlay(state, taskId, { ...overlay, pinned: !overlay.pinned });
}

export function snooze(state: LocalState, taskId: string, until: Date): LocalState {
  return withOverlay(state, taskId, {
    ...getOverlay(state, taskId),
    snoozed_until: until.toISOString(),
  });
}

export function unsnooze(state: LocalState, taskId: string): LocalState {
  if (!Object.hasOwn(state.overlays, taskId)) return state;
  const { snoozed_until: _dropped, ...rest } = state.overlays[taskId];
  return withOverlay(state, taskId, rest);
}

export function markRefreshed(state: LocalState, now: Date): LocalState {
  return { ...state, last_refresh: now.toISOString() };
}

/** `now` plus a whole number of days. */
export function snoozeUntil(now: Date, days: number): Date {
  if (!Number.isInteger(days) || days < 0) {
    throw new Error(`Snooze days must be a whole number of days, got ${days}`);
  }
  return new Date(now.getTime() + days * DAY_MS);
}
