import { randomBytes } from 'node:crypto';
import type { Clock, IdGenerator } from './types.js';

export const systemClock: Clock = {
  now: () => new Date(),
};

/** 128 random bits as 32 lowercase hex characters */
export const randomTaskId: IdGenerator = () => randomBytes(16).toString('hex');

/** A clock pinned to one instant */
export function fixedClock(instant: Date | string): Clock {
  const date = typeof instant === 'string' ? new Date(instant) : instant;
  return { now: () => new Date(date.getTime()) };
}

/** Ids `${prefix}1`, `${prefix}2`, ... */
export function sequentialIds(prefix = 'task-'): IdGenerator {
  let next = 1;
  return () => `${prefix}${next++}`;
}
