/**
 * chalk-based output helpers. Everything user-facing goes through here.
 */

import chalk from 'chalk';
import type { Task } from '@tasklite/core';

// --- Tag colors (deterministic from tag name) ---

const TAG_COLORS = [
  chalk.cyan, chalk.magenta, chalk.blue, chalk.yellow,
  chalk.green, chalk.red, chalk.white, chalk.gray,
];

function tagColor(tag: string): (s: string) => string {
  let hash = 0;
  for (let i = 0; i < tag.length; i++) {
    hash = ((hash << 5) - hash + tag.charCodeAt(i)) | 0;
  }
  return TAG_COLORS[Math.abs(hash) % TAG_COLORS.length] ?? chalk.white;
}

// --- Formatting functions ---

const SHORT_ID_LENGTH = 8;

export function shortId(id: string): string {
  return id.slice(0, SHORT_ID_LENGTH);
}

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatTags(tags: readonly string[]): string {
  if (tags.length === 0) return '';
  const formatted = tags.map(t => tagColor(t)(`#${t}`));
  return '  ' + formatted.join(' ');
}

/** yyyy-MM-dd part of an ISO timestamp */
export function formatCreated(created: string): string {
  return created.split('T')[0] ?? created;
}

export function formatTaskRow(task: Task): string {
  const taskId = chalk.dim(`(${shortId(task.id)})`);
  const created = chalk.dim(formatCreated(task.created));
  return `${taskId} ${formatCheckbox(task.completed)} ${chalk.bold(task.description)}  ${created}${formatTags(task.tags)}`;
}

export function formatSearchHit(task: Task): string {
  return `${chalk.dim(`(${shortId(task.id)})`)} ${task.description}`;
}

export function json(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function info(message: string): void {
  console.log(message);
}

// --- Debug output (stderr, only with --debug) ---

let debugEnabled = false;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function debug(message: string): void {
  if (!debugEnabled) return;
  console.error(chalk.dim(`[debug] ${message}`));
}

/** Stack trace plus the `cause` chain */
export function debugError(err: unknown): void {
  let current: unknown = err;
  while (current !== undefined && current !== null) {
    debug(current instanceof Error ? current.stack ?? current.message : String(current));
    current = current instanceof Error ? current.cause : undefined;
  }
}
