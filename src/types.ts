/** Shared types for clickup-dash. */

export type Priority = 1 | 2 | 3 | 4;

export interface Task {
  id: string;
  name: string;
  status: string;
  list_name: string;
  due_date?: number; // epoch milliseconds
  priority?: Priority;
  url: string;
  tags: string[];
  description?: string;
  custom_item_id?: number;
  custom_id?: string;
  parent_id?: string;
  assignee_ids: number[];
}

/** Local annotations kept beside the remote data, keyed by task id. */
export interface TaskOverlay {
  pinned: boolean;
  snoozed_until?: string; // ISO-8601
  /** Persisted for later use; nothing sorts on it yet. */
  sort_order?: number;
}

export type OverlayMap = Readonly<Record<string, TaskOverlay>>;

export interface DisplayTask {
  task: Task;
  overlay: TaskOverlay;
}

export type Category =
  | "my_action"
  | "waiting"
  | "backlog"
  | "done"
  | "snoozed"
  | "person";

export interface LocalState {
  overlays: Record<string, TaskOverlay>;
  last_refresh?: string;
}

export interface Config {
  api_token: string;
  user_id: string;
  auto_refresh: boolean;
}
