import { describe, it, expect } from "vitest";
import { fuzzyScore, searchTasks } from "./search.js";
import type { Task } from "./types.js";

function makeTask(id: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    name: `Task ${id}`,
    status: "to do",
    list_name: "Sprint",
    url: `https://app.clickup.com/t/${id}`,
    tags: [],
    assignee_ids: [],
    ...overrides,
  };
}

function chars(query: string): string[] {
  return Array.from(query);
}

// ─── fuzzyScore ──────────────────────────────────────────────────────────────

describe("fuzzyScore", () => {
  it("matches a subsequence and rewards word starts", () => {
    // t at 0 (start): 1 + 10, c after a space: 1 + 10
    expect(fuzzyScore("Task Create", chars("tc"))).toBe(22);
  });

  it("scores mid-word matches without bonus", () => {
    expect(fuzzyScore("xtycx", chars("tc"))).toBe(2);
  });

  it("adds a bonus for consecutive matches", () => {
    // a at 0: 11, b right after: 1 + 5
    expect(fuzzyScore("abc", chars("ab"))).toBe(17);
  });

  it("returns undefined when characters are out of order", () => {
    expect(fuzzyScore("Card", chars("tc"))).toBeUndefined();
  });

  it("is case insensitive on the text", () => {
    expect(fuzzyScore("DEPLOY", chars("dep"))).toBe(23);
  });

  it("treats punctuation as a word boundary", () => {
    // f after "-" gets the boundary bonus
    expect(fuzzyScore("api-fix", chars("f"))).toBe(11);
  });

  it("scores an empty query as zero", () => {
    expect(fuzzyScore("anything", [])).toBe(0);
  });
});

// ─── searchTasks ─────────────────────────────────────────────────────────────

describe("searchTasks", () => {
  it("returns nothing for an empty query", () => {
    expect(searchTasks([makeTask("a"), makeTask("b")], {}, "")).toEqual([]);
  });

  it("ranks word-start matches above scattered ones", () => {
    const tasks = [makeTask("weak", { name: "xtycx" }), makeTask("strong", { name: "Task Create" })];
    const results = searchTasks(tasks, {}, "tc");
    expect(results.map((r) => r.task.id)).toEqual(["strong", "weak"]);
  });

  it("lowercases the query", () => {
    const results = searchTasks([makeTask("a", { name: "Task Create" })], {}, "TC");
    expect(results.map((r) => r.task.id)).toEqual(["a"]);
  });

  it("excludes tasks where no field matches", () => {
    const results = searchTasks([makeTask("card", { name: "Card" })], {}, "tc");
    expect(results).toEqual([]);
  });

  it("falls through to description and tags", () => {
    const tasks = [
      makeTask("d", { name: "Alpha", description: "zebra crossing" }),
      makeTask("t", { name: "Alpha", tags: ["ops", "urgent"] }),
    ];
    expect(searchTasks(tasks, {}, "zc").map((r) => r.task.id)).toEqual(["d"]);
    expect(searchTasks(tasks, {}, "urg").map((r) => r.task.id)).toEqual(["t"]);
  });

  it("scores a task by its first matching field only", () => {
    // "ab" scores 2 in the name "xaxb", though the list name would score 17
    const tasks = [
      makeTask("first", { name: "xaxb", list_name: "ab" }),
      makeTask("second", { name: "ab" }),
    ];
    const results = searchTasks(tasks, {}, "ab");
    expect(results.map((r) => r.task.id)).toEqual(["second", "first"]);
  });

  it("keeps input order for equal scores", () => {
    const one = makeTask("one", { name: "Deploy" });
    const two = makeTask("two", { name: "Deploy" });
    expect(searchTasks([one, two], {}, "dep").map((r) => r.task.id)).toEqual(["one", "two"]);
    expect(searchTasks([two, one], {}, "dep").map((r) => r.task.id)).toEqual(["two", "one"]);
  });

  it("pairs each result with its overlay", () => {
    const results = searchTasks([makeTask("a", { name: "Deploy" })], { a: { pinned: true } }, "dep");
    expect(results[0].overlay).toEqual({ pinned: true });
  });
});
