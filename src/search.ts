/** Global fuzzy search across every fetched task, regardless of category. */

import { toDisplayTask } from "./view.js";
import type { DisplayTask, OverlayMap, Task } from "./types.js";

const WORD_BOUNDARY_BONUS = 10;
const CONSECUTIVE_BONUS = 5;

const ALPHANUMERIC = /[\p{L}\p{N}]/u;

/**
 * Score `text` against an already-lowercased query. Returns undefined unless
 * every query character appears in the text in order.
 */
export function fuzzyScore(text: string, query: readonly string[]): number | undefined {
  if (query.length === 0) return 0;

  const chars = Array.from(text.toLowerCase());
  let q = 0;
  let score = 0;
  let lastMatch = -1;

  for (let i = 0; i < chars.length && q < query.length; i++) {
    if (chars[i] !== query[q]) continue;

    if (lastMatch >= 0 && i === lastMatch + 1) score += CONSECUTIVE_BONUS;
    if (i === 0 || !ALPHANUMERIC.test(chars[i - 1])) score += WORD_BOUNDARY_BONUS;
    score += 1;

    lastMatch = i;
    q++;
  }

  return q === query.length ? score : undefined;
}

/** Fields tried in order; the first one that matches decides the score. */
function searchableFields(task: Task): string[] {
  const fields = [task.name, task.list_name, task.status];
  if (task.description !== undefined) fields.push(task.description);
  return [...fields, ...task.tags];
}

function scoreTask(task: Task, query: readonly string[]): number | undefined {
  for (const field of searchableFields(task)) {
    const score = fuzzyScore(field, query);
    if (score !== undefined) return score;
  }
  return undefined;
}

/**
 * Rank tasks by fuzzy match against `query`, best first. Ties keep the order
 * of `tasks`. An empty query yields nothing.
 */
export function searchTasks(
  tasks: readonly Task[],
  overlays: OverlayMap,
  query: string,
): DisplayTask[] {
  if (!query) return [];
  const chars = Array.from(query.toLowerCase());

  const scored: Array<{ dt: DisplayTask; score: number }> = [];
  for (const task of tasks) {
    const score = scoreTask(task, chars);
    if (score !== undefined) scored.push({ dt: toDisplayTask(task, overlays), score });
  }

  // Array.prototype.sort is stable, so equal scores stay in input order
  scored.sort((a, b) => b.score - a.score);
  return scored.map((s) => s.dt);
}
