/** Read tasks from the ClickUp v2 REST API. */

import type { Priority, Task } from "./types.js";

export const CLICKUP_API_BASE = "https://api.clickup.com/api/v2";

const REQUEST_TIMEOUT_MS = 30_000;

/** Raw task as the API returns it (only the fields we read). */
export interface ClickUpTask {
  id: string;
  name: string;
  status: { status: string };
  list: { name: string };
  due_date?: string | null;
  priority?: { id: string } | null;
  url: string;
  tags?: Array<{ name: string }>;
  text_content?: string | null;
  custom_item_id?: number | null;
  custom_id?: string | null;
  parent?: string | null;
  assignees?: Array<{ id: number }>;
}

interface TasksResponse {
  tasks?: ClickUpTask[];
  last_page?: boolean;
}

interface TeamsResponse {
  teams?: Array<{ id: string; name?: string }>;
}

export class ClickUpApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`ClickUp API error (${status}): ${body}`);
    this.name = "ClickUpApiError";
    this.status = status;
    this.body = body;
  }
}

async function getJson<T>(
  token: string,
  path: string,
  params: Array<[string, string]> = [],
): Promise<T> {
  const url = new URL(`${CLICKUP_API_BASE}${path}`);
  for (const [key, value] of params) url.searchParams.append(key, value);

  const resp = await fetch(url, {
    headers: { Authorization: token },
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
  });
  if (!resp.ok) {
    throw new ClickUpApiError(resp.status, await resp.text());
  }
  return (await resp.json()) as T;
}

function parsePriority(id: string | undefined): Priority | undefined {
  switch (id) {
    case "1":
      return 1;
    case "2":
      return 2;
    case "3":
      return 3;
    case "4":
      return 4;
    default:
      return undefined;
  }
}

// Largest offset from the epoch a Date can hold
const MAX_DATE_MS = 8.64e15;

/** True for epoch milliseconds that a Date can represent. */
export function isValidTimestamp(ms: number): boolean {
  return Number.isSafeInteger(ms) && Math.abs(ms) <= MAX_DATE_MS;
}

function parseDueDate(value: string | null | undefined): number | undefined {
  if (!value || !/^\d+$/.test(value)) return undefined;
  const ms = Number(value);
  return isValidTimestamp(ms) ? ms : undefined;
}

export function convertTask(t: ClickUpTask): Task {
  const task: Task = {
    id: t.id,
    name: t.name,
    status: t.status.status,
    list_name: t.list.name,
    url: t.url,
    tags: (t.tags ?? []).map((tag) => tag.name),
    assignee_ids: (t.assignees ?? []).map((a) => a.id),
  };

  const due = parseDueDate(t.due_date);
  if (due !== undefined) task.due_date = due;
  const priority = parsePriority(t.priority?.id);
  if (priority !== undefined) task.priority = priority;
  if (t.text_content) task.description = t.text_content;
  if (typeof t.custom_item_id === "number") task.custom_item_id = t.custom_item_id;
  if (t.custom_id) task.custom_id = t.custom_id;
  if (t.parent) task.parent_id = t.parent;

  return task;
}

/** The first team (workspace) the token can see; tasks are queried per team. */
export async function getTeamId(token: string): Promise<string> {
  const response = await getJson<TeamsResponse>(token, "/team");
  const team = (response.teams ?? [])[0];
  if (!team) {
    throw new Error("No teams found in ClickUp workspace.");
  }
  return team.id;
}

export async function fetchTaskById(token: string, taskId: string): Promise<Task> {
  const raw = await getJson<ClickUpTask>(token, `/task/${encodeURIComponent(taskId)}`);
  return convertTask(raw);
}

/**
 * Fetch every task assigned to `userId`, closed ones and subtasks included,
 * then pull in parents that are not assigned to the user so subtasks keep
 * their place in the hierarchy.
 */
export async function fetchTasks(
  token: string,
  teamId: string,
  userId: string,
): Promise<Task[]> {
  const tasks: Task[] = [];

  let page = 0;
  for (;;) {
    const response = await getJson<TasksResponse>(
      token,
      `/team/${encodeURIComponent(teamId)}/task`,
      [
        ["assignees[]", userId],
        ["include_closed", "true"],
        ["subtasks", "true"],
        ["page", String(page)],
      ],
    );
    const batch = response.tasks ?? [];
    tasks.push(...batch.map(convertTask));
    if (batch.length === 0 || response.last_page !== false) break;
    page++;
  }

  const known = new Set(tasks.map((t) => t.id));
  const missingParents = new Set<string>();
  for (const t of tasks) {
    if (t.parent_id && !known.has(t.parent_id)) missingParents.add(t.parent_id);
  }

  for (const parentId of missingParents) {
    try {
      tasks.push(await fetchTaskById(token, parentId));
    } catch (e: unknown) {
      // Non-fatal: the subtask just shows without its parent
      const msg = e instanceof Error ? e.message : String(e);
      console.error(`  Could not fetch parent task ${parentId}: ${msg}`);
    }
  }

  return tasks;
}

/** Resolve the team and fetch the user's tasks in one go. */
export async function fetchClickUpTasks(token: string, userId: string): Promise<Task[]> {
  const teamId = await getTeamId(token);
  return fetchTasks(token, teamId, userId);
}
