/** Opaque identity key; unique within one task file by convention only */
export type TaskId = string;

export interface Task {
  readonly id: TaskId;
  readonly description: string;
  readonly created: string; // ISO-8601 UTC
  readonly completed: boolean;
  readonly tags: readonly string[];
}

/** Plain JSON shape of a task inside the task file */
export interface TaskRecord {
  id: TaskId;
  description: string;
  created: string;
  completed: boolean;
  tags: string[];
}

/** Source of "now" for timestamps */
export interface Clock {
  now(): Date;
}

export type IdGenerator = () => TaskId;
