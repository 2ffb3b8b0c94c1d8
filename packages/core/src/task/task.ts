/**
 * Task construction and (de)serialization.
 *
 * createTask is strict: it guards user input. taskFromRecord is tolerant: it
 * decodes whatever is on disk and fills defaults instead of failing.
 */

import { ValidationError } from '../errors.js';
import { persistedTaskSchema } from '../schema/task-file.js';
import { randomTaskId, systemClock } from './sources.js';
import type { Clock, IdGenerator, Task, TaskId, TaskRecord } from './types.js';

export interface CreateTaskOptions {
  tags?: readonly string[];
  id?: TaskId;
  created?: string;
  clock?: Clock;
  generateId?: IdGenerator;
}

/** Create a new, not yet completed task. Throws ValidationError on a blank description. */
export function createTask(description: string, options: CreateTaskOptions = {}): Task {
  const trimmed = description.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('description must be non-empty');
  }

  const clock = options.clock ?? systemClock;
  const generateId = options.generateId ?? randomTaskId;

  return {
    id: options.id ?? generateId(),
    description: trimmed,
    created: options.created ?? clock.now().toISOString(),
    completed: false,
    tags: [...(options.tags ?? [])],
  };
}

export function taskToRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    description: task.description,
    created: task.created,
    completed: task.completed,
    tags: [...task.tags],
  };
}

/** Decode a persisted record. Never throws; anything that is not an object decodes as `{}`. */
export function taskFromRecord(input: unknown, clock: Clock = systemClock): Task {
  const source = typeof input === 'object' && input !== null && !Array.isArray(input) ? input : {};
  const record = persistedTaskSchema.parse(source);

  return {
    id: record.id ?? '',
    description: record.description ?? '',
    created: record.created ?? clock.now().toISOString(),
    completed: record.completed ?? false,
    tags: record.tags ?? [],
  };
}
