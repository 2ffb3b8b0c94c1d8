/**
 * In-memory filters over a loaded task collection.
 */

import type { Task } from '../task/types.js';

export interface TaskFilter {
  /** Keep tasks carrying exactly this tag */
  tag?: string;
  /** true: completed only, false: incomplete only */
  completed?: boolean;
}

export type SearchField = 'description' | 'tags';

export interface SearchOptions {
  field?: SearchField;
  ignoreCase?: boolean;
}

export function filterTasks(tasks: readonly Task[], filter: TaskFilter = {}): Task[] {
  return tasks.filter(t => {
    if (filter.tag && !t.tags.includes(filter.tag)) return false;
    if (filter.completed !== undefined && t.completed !== filter.completed) return false;
    return true;
  });
}

/**
 * Description search is a substring match; tag search matches whole tags.
 */
export function searchTasks(tasks: readonly Task[], query: string, options: SearchOptions = {}): Task[] {
  const field = options.field ?? 'description';
  const fold = (s: string) => (options.ignoreCase ? s.toLowerCase() : s);
  const needle = fold(query);

  return tasks.filter(t => {
    switch (field) {
      case 'description': return fold(t.description).includes(needle);
      case 'tags': return t.tags.some(tag => fold(tag) === needle);
    }
  });
}

export function isSearchField(value: string): value is SearchField {
  return value === 'description' || value === 'tags';
}
