/**
 * JSON file storage for tasks.
 *
 * Writes go through a sibling `<path>.tmp` file which is fsynced and then
 * renamed over the real path, so readers only ever see the old file or the
 * new one. No locking: concurrent writers from several processes are not
 * serialized and the last save wins.
 */

import * as nodeFs from 'node:fs';
import { dirname } from 'node:path';
import {
  CorruptDataError, SchemaError, StorageIOError, hasErrorCode,
} from '../errors.js';
import { TASK_FILE_VERSION, taskFileSchema } from '../schema/task-file.js';
import { systemClock } from '../task/sources.js';
import { taskFromRecord, taskToRecord } from '../task/task.js';
import type { Clock, Task, TaskId, TaskRecord } from '../task/types.js';

/** The subset of node:fs the storage engine touches */
export type StorageFileSystem = Pick<
  typeof nodeFs,
  'readFileSync' | 'mkdirSync' | 'openSync' | 'writeFileSync' | 'fsyncSync' | 'closeSync' | 'renameSync' | 'rmSync'
>;

export interface TaskStorageOptions {
  clock?: Clock;
  fs?: StorageFileSystem;
}

export interface TaskFile {
  version: string;
  updated: string;
  tasks: TaskRecord[];
}

export class TaskStorage {
  readonly path: string;
  private clock: Clock;
  private fs: StorageFileSystem;

  constructor(path: string, options: TaskStorageOptions = {}) {
    this.path = path;
    this.clock = options.clock ?? systemClock;
    this.fs = options.fs ?? nodeFs;
  }

  /** All tasks in file order. A missing file is an empty collection. */
  load(): Task[] {
    let text: string;
    try {
      text = this.fs.readFileSync(this.path, 'utf8');
    } catch (err: unknown) {
      // A missing file, or a path through a regular file, is the first-run state
      if (hasErrorCode(err, 'ENOENT') || hasErrorCode(err, 'ENOTDIR')) return [];
      throw new StorageIOError(this.path, `could not read ${this.path}: ${describe(err)}`, { cause: err });
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err: unknown) {
      throw new CorruptDataError(this.path, `invalid JSON in ${this.path}: ${describe(err)}`, { cause: err });
    }

    const parsed = taskFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new SchemaError(this.path, `unexpected file format in ${this.path}`, { cause: parsed.error });
    }

    return parsed.data.tasks.map(record => taskFromRecord(record, this.clock));
  }

  /** Replace the whole file with `tasks`. Either fully succeeds or leaves the file untouched. */
  save(tasks: readonly Task[]): void {
    const document: TaskFile = {
      version: TASK_FILE_VERSION,
      updated: this.clock.now().toISOString(),
      tasks: tasks.map(taskToRecord),
    };
    const content = JSON.stringify(document, null, 2) + '\n';
    const tempPath = `${this.path}.tmp`;

    try {
      this.fs.mkdirSync(dirname(this.path), { recursive: true });
    } catch (err: unknown) {
      throw new StorageIOError(this.path, `could not create directory for ${this.path}: ${describe(err)}`, { cause: err });
    }

    try {
      this.writeDurably(tempPath, content);
      this.fs.renameSync(tempPath, this.path);
    } catch (err: unknown) {
      this.discardTemp(tempPath, err);
      throw new StorageIOError(this.path, `could not write ${this.path}: ${describe(err)}`, { cause: err });
    }
  }

  /** Load, append, save. Not atomic against other processes writing the same file. */
  addTask(task: Task): void {
    const tasks = this.load();
    tasks.push(task);
    this.save(tasks);
  }

  /** First task with this id, or null */
  getTaskById(id: TaskId): Task | null {
    return this.load().find(t => t.id === id) ?? null;
  }

  private writeDurably(path: string, content: string): void {
    const fd = this.fs.openSync(path, 'w');
    try {
      this.fs.writeFileSync(fd, content, 'utf8');
      this.fs.fsyncSync(fd);
    } finally {
      this.fs.closeSync(fd);
    }
  }

  private discardTemp(tempPath: string, writeError: unknown): void {
    try {
      this.fs.rmSync(tempPath, { force: true });
    } catch (cleanupError: unknown) {
      throw new StorageIOError(
        this.path,
        `could not write ${this.path} and could not remove ${tempPath}: ${describe(cleanupError)}`,
        { cause: new AggregateError([writeError, cleanupError]) },
      );
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
