/** Category classification: status labels, snooze and the Person partition. */

import type { Category, Priority, Task, TaskOverlay } from "./types.js";

/** custom_item_id ClickUp uses for long-standing role ("Person") tasks. */
export const PERSON_ITEM_ID = 1020;

/** Tab order. */
export const CATEGORIES: readonly Category[] = [
  "my_action",
  "waiting",
  "backlog",
  "done",
  "snoozed",
  "person",
];

export const CATEGORY_LABELS: Record<Category, string> = {
  my_action: "My Action",
  waiting: "Waiting",
  backlog: "Backlog",
  done: "Done",
  snoozed: "Snoozed",
  person: "Person",
};

const STATUS_CATEGORIES: Record<string, Category> = {
  // Something for me to do, reviews included
  "in progress": "my_action",
  "to do": "my_action",
  "to-do": "my_action",
  todo: "my_action",
  "in review": "my_action",
  review: "my_action",
  "to review": "my_action",

  // Ball in someone else's court
  blocked: "waiting",
  "in testing": "waiting",
  testing: "waiting",
  "to validate": "waiting",
  validation: "waiting",
  "pending review": "waiting",

  backlog: "backlog",
  open: "backlog",
  new: "backlog",

  done: "done",
  complete: "done",
  completed: "done",
  closed: "done",
  released: "done",
  deployed: "done",
  shipped: "done",
  cancelled: "done",
  canceled: "done",
  "won't do": "done",
  wontdo: "done",
  "for reference": "done",
};

/** Map a ClickUp status label to its category. Unknown statuses land in backlog. */
export function statusToCategory(status: string): Category {
  const key = status.toLowerCase();
  return Object.hasOwn(STATUS_CATEGORIES, key) ? STATUS_CATEGORIES[key] : "backlog";
}

export function isPersonTask(task: Task): boolean {
  return task.custom_item_id === PERSON_ITEM_ID;
}

export function isSnoozed(overlay: TaskOverlay, now: Date): boolean {
  if (!overlay.snoozed_until) return false;
  // NaN compares false, so an unreadable timestamp is treated as not snoozed
  return Date.parse(overlay.snoozed_until) > now.getTime();
}

/**
 * Effective category of a task: Person wins over everything, then an active
 * snooze, then the status mapping.
 */
export function classify(task: Task, overlay: TaskOverlay, now: Date): Category {
  if (isPersonTask(task)) return "person";
  if (isSnoozed(overlay, now)) return "snoozed";
  return statusToCategory(task.status);
}

/** Membership test shared by the working-set builder and the group counter. */
export function inCategory(
  task: Task,
  overlay: TaskOverlay,
  now: Date,
  category: Category,
): boolean {
  if (category === "person") return isPersonTask(task);
  return !isPersonTask(task) && classify(task, overlay, now) === category;
}

/**
 * Resolve a category from user input: the key (`my_action`), the label
 * (`My Action`, any case) or the 1-based tab number.
 */
export function parseCategory(input: string): Category | undefined {
  const value = input.trim().toLowerCase();
  const index = Number(value);
  if (Number.isInteger(index) && index >= 1 && index <= CATEGORIES.length) {
    return CATEGORIES[index - 1];
  }
  return CATEGORIES.find(
    (c) => c === value || CATEGORY_LABELS[c].toLowerCase() === value,
  );
}

export function priorityLabel(priority: Priority | undefined): string | undefined {
  switch (priority) {
    case 1:
      return "Urgent";
    case 2:
      return "High";
    case 3:
      return "Normal";
    case 4:
      return "Low";
    default:
      return undefined;
  }
}

const TASK_TYPE_LABELS: Record<number, string> = {
  0: "Task",
  1004: "Bug",
  1005: "Milestone",
  1006: "Feature",
  1007: "Epic",
  1008: "Story",
  1009: "Spike",
  [PERSON_ITEM_ID]: "Person",
};

export function taskTypeLabel(customItemId: number | undefined): string | undefined {
  if (customItemId === undefined) return undefined;
  return TASK_TYPE_LABELS[customItemId] ?? "Custom";
}
