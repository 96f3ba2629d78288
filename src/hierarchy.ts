/** Family-aware ordering of a visible task set. */

import type { DisplayTask } from "./types.js";

interface Placement {
  root: DisplayTask;
  depth: number;
}

/**
 * Walk up the parent chain through the visible set only. The last task
 * reached is the root; depth counts the steps taken. Parent cycles stop at
 * the first revisit.
 */
function place(dt: DisplayTask, visible: Map<string, DisplayTask>): Placement {
  const seen = new Set<string>([dt.task.id]);
  let root = dt;
  let depth = 0;
  let parentId = dt.task.parent_id;

  while (parentId !== undefined && !seen.has(parentId)) {
    const parent = visible.get(parentId);
    if (!parent) break;
    seen.add(parentId);
    root = parent;
    depth++;
    parentId = parent.task.parent_id;
  }

  return { root, depth };
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order tasks so each family stays together with its root first:
 * root priority (unset last), root id, depth, then task id.
 * Returns a new array.
 */
export function sortHierarchy(tasks: readonly DisplayTask[]): DisplayTask[] {
  const visible = new Map<string, DisplayTask>();
  for (const dt of tasks) visible.set(dt.task.id, dt);

  const placements = new Map<string, Placement>();
  for (const dt of tasks) placements.set(dt.task.id, place(dt, visible));

  const placementOf = (dt: DisplayTask): Placement =>
    placements.get(dt.task.id) ?? { root: dt, depth: 0 };

  return [...tasks].sort((a, b) => {
    const pa = placementOf(a);
    const pb = placementOf(b);

    const prioA = pa.root.task.priority;
    const prioB = pb.root.task.priority;
    if (prioA !== prioB) {
      if (prioA === undefined) return 1;
      if (prioB === undefined) return -1;
      return prioA - prioB;
    }

    if (pa.root.task.id !== pb.root.task.id) {
      return compareIds(pa.root.task.id, pb.root.task.id);
    }

    if (pa.depth !== pb.depth) return pa.depth - pb.depth;

    return compareIds(a.task.id, b.task.id);
  });
}

/** Number of visible ancestors above each task, keyed by task id. */
export function visibleDepths(tasks: readonly DisplayTask[]): Map<string, number> {
  const visible = new Map<string, DisplayTask>();
  for (const dt of tasks) visible.set(dt.task.id, dt);

  const depths = new Map<string, number>();
  for (const dt of tasks) depths.set(dt.task.id, place(dt, visible).depth);
  return depths;
}
