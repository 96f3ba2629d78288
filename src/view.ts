/**
 * Per-category views over the fetched tasks: the filtered working set with
 * its ancestor context, and the per-tab totals.
 */

import { CATEGORIES, inCategory } from "./categories.js";
import { sortHierarchy } from "./hierarchy.js";
import type { Category, DisplayTask, OverlayMap, Task, TaskOverlay } from "./types.js";

export const DEFAULT_OVERLAY: Readonly<TaskOverlay> = Object.freeze({ pinned: false });

export function overlayFor(overlays: OverlayMap, taskId: string): TaskOverlay {
  return Object.hasOwn(overlays, taskId) ? overlays[taskId] : DEFAULT_OVERLAY;
}

export function toDisplayTask(task: Task, overlays: OverlayMap): DisplayTask {
  return { task, overlay: overlayFor(overlays, task.id) };
}

export interface ViewFilters {
  /** Only tasks assigned to this user (ancestors are checked too). */
  userId?: number;
  /** Case-insensitive substring over name, list, status and description. */
  text?: string;
}

function isAssigned(task: Task, userId: number | undefined): boolean {
  return userId === undefined || task.assignee_ids.includes(userId);
}

function matchesText(task: Task, needle: string): boolean {
  if (!needle) return true;
  return [task.name, task.list_name, task.status, task.description ?? ""].some(
    (field) => field.toLowerCase().includes(needle),
  );
}

/**
 * Tasks shown under a category: the ones that pass every filter, plus the
 * chain of parents above each so subtasks keep their context. A parent that
 * is not assigned to the user is still shown but ends the walk. Ancestors
 * skip the category and text filters.
 */
export function buildWorkingSet(
  tasks: readonly Task[],
  overlays: OverlayMap,
  now: Date,
  category: Category,
  filters: ViewFilters = {},
): DisplayTask[] {
  const { userId } = filters;
  const needle = (filters.text ?? "").toLowerCase();

  const byId = new Map<string, Task>();
  for (const task of tasks) byId.set(task.id, task);

  const primary = tasks.filter(
    (task) =>
      inCategory(task, overlayFor(overlays, task.id), now, category) &&
      isAssigned(task, userId) &&
      matchesText(task, needle),
  );

  const included = new Map<string, Task>();
  for (const task of primary) {
    included.set(task.id, task);

    const visited = new Set<string>([task.id]);
    let parentId = task.parent_id;
    while (parentId !== undefined && !visited.has(parentId)) {
      const parent = byId.get(parentId);
      if (!parent) break;
      visited.add(parentId);
      included.set(parent.id, parent);
      if (!isAssigned(parent, userId)) break;
      parentId = parent.parent_id;
    }
  }

  return sortHierarchy([...included.values()].map((t) => toDisplayTask(t, overlays)));
}

/** Totals per category. Filters do not apply; every task lands in exactly one. */
export function countByCategory(
  tasks: readonly Task[],
  overlays: OverlayMap,
  now: Date,
): Record<Category, number> {
  const counts: Record<Category, number> = {
    my_action: 0,
    waiting: 0,
    backlog: 0,
    done: 0,
    snoozed: 0,
    person: 0,
  };
  for (const task of tasks) {
    const overlay = overlayFor(overlays, task.id);
    for (const category of CATEGORIES) {
      if (inCategory(task, overlay, now, category)) counts[category]++;
    }
  }
  return counts;
}
