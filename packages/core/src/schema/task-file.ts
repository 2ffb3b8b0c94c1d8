/**
 * zod schemas for the persisted task file.
 *
 * Task records decode tolerantly: every field is optional and coerced to its
 * expected type, so a half-broken record never fails the whole file. The file
 * envelope is strict about its shape: it must be an object with a `tasks` array.
 */

import { z } from 'zod';

export const TASK_FILE_VERSION = '1.0';

/**
 * Text form of a persisted value. Objects and arrays become JSON, since
 * `String()` throws on objects whose toString/valueOf are not callable.
 * Values JSON cannot represent (cycles) give undefined.
 */
function toText(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null) return String(value);
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}

// null and undefined both mean "missing"
const looseString = z.unknown().transform(value => (value == null ? undefined : toText(value)));

const looseBoolean = z.unknown().transform(value => (value == null ? undefined : Boolean(value)));

const looseStringList = z.unknown().transform((value): string[] | undefined => {
  if (value == null) return undefined;
  if (Array.isArray(value)) return value.flatMap((item: unknown) => toText(item) ?? []);
  const text = toText(value);
  return text === undefined ? undefined : [text];
});

export const persistedTaskSchema = z.object({
  id: looseString,
  description: looseString,
  created: looseString,
  completed: looseBoolean,
  tags: looseStringList,
});

export const taskFileSchema = z.object({
  version: z.string().optional(),
  updated: z.string().optional(),
  tasks: z.array(z.unknown()),
});
