/** Plain-text rendering of task views for the terminal. */

import {
  CATEGORIES,
  CATEGORY_LABELS,
  isSnoozed,
  priorityLabel,
  taskTypeLabel,
} from "./categories.js";
import { visibleDepths } from "./hierarchy.js";
import type { Category, DisplayTask, Priority } from "./types.js";

const PIN = "📌 ";

export function priorityIndicator(priority: Priority | undefined): string {
  switch (priority) {
    case 1:
      return "!!";
    case 2:
      return "! ";
    case 3:
      return "- ";
    case 4:
      return "· ";
    default:
      return "  ";
  }
}

export function formatCategoryTabs(
  counts: Record<Category, number>,
  active?: Category,
): string {
  return CATEGORIES.map((c) => {
    const tab = `${CATEGORY_LABELS[c]} (${counts[c]})`;
    return c === active ? `[${tab}]` : tab;
  }).join(" │ ");
}

/**
 * One line per task. Tasks whose parent is also listed are indented under it
 * with a `└` marker.
 */
export function formatTaskLines(tasks: readonly DisplayTask[]): string[] {
  const depths = visibleDepths(tasks);

  return tasks.map(({ task, overlay }) => {
    let line = (overlay.pinned ? PIN : "  ") + priorityIndicator(task.priority) + " ";

    const depth = depths.get(task.id) ?? 0;
    if (depth > 0) {
      line += "  ".repeat(depth - 1) + "└ ";
    }

    line += `[${task.status}] `;
    const type = taskTypeLabel(task.custom_item_id);
    if (type) line += `[${type}] `;
    if (task.custom_id) line += `${task.custom_id} `;
    return line + task.name;
  });
}

export function formatSearchResults(results: readonly DisplayTask[]): string[] {
  return results.map(
    ({ task }) => `${priorityIndicator(task.priority)} ${task.name}  ${task.status}  (${task.id})`,
  );
}

function formatDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function formatTaskDetails(dt: DisplayTask, now: Date): string[] {
  const { task, overlay } = dt;
  const lines: string[] = [];

  if (task.custom_id) lines.push(task.custom_id);
  lines.push(task.name);
  lines.push("");

  const type = taskTypeLabel(task.custom_item_id);
  if (type) lines.push(`Type: ${type}`);
  if (task.parent_id) lines.push(`└ Subtask of ${task.parent_id}`);
  lines.push(`Status: ${task.status}`);
  lines.push(`List: ${task.list_name}`);

  const priority = priorityLabel(task.priority);
  if (priority) lines.push(`Priority: ${priority}`);
  if (task.tags.length > 0) lines.push(`Tags: ${task.tags.join(", ")}`);
  if (task.due_date !== undefined) lines.push(`Due: ${formatDate(task.due_date)}`);
  if (overlay.pinned) lines.push("Pinned");
  if (overlay.snoozed_until && isSnoozed(overlay, now)) {
    lines.push(`Snoozed until: ${overlay.snoozed_until}`);
  }
  lines.push(`URL: ${task.url}`);

  if (task.description) {
    lines.push("");
    lines.push(...task.description.split("\n"));
  }

  return lines;
}
