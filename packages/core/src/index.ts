// Task entity
export type { TaskId, Task, TaskRecord, Clock, IdGenerator } from './task/types.js';
export { createTask, taskToRecord, taskFromRecord } from './task/task.js';
export type { CreateTaskOptions } from './task/task.js';
export { systemClock, randomTaskId, fixedClock, sequentialIds } from './task/sources.js';

// Schema
export { TASK_FILE_VERSION, persistedTaskSchema, taskFileSchema } from './schema/task-file.js';

// Storage
export { TaskStorage } from './storage/task-storage.js';
export type { TaskStorageOptions, StorageFileSystem, TaskFile } from './storage/task-storage.js';

// Queries
export { filterTasks, searchTasks, isSearchField } from './queries/task-queries.js';
export type { TaskFilter, SearchField, SearchOptions } from './queries/task-queries.js';

// Errors
export {
  TaskliteError, ValidationError, StorageError,
  CorruptDataError, SchemaError, StorageIOError, hasErrorCode,
} from './errors.js';

// Config
export { DATA_FILE_ENV, getDefaultDataPath, resolveDataFile } from './config.js';
