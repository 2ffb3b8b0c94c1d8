/**
 * CLI helpers: storage resolution, tag parsing, error handling.
 */

import type { Command } from 'commander';
import { TaskStorage, ValidationError, StorageError, resolveDataFile } from '@tasklite/core';
import * as out from './output.js';

export type GlobalOptions = {
  dataFile?: string;
  debug?: boolean;
};

export const ExitCode = {
  Ok: 0,
  Failure: 1,
  InvalidInput: 2,
  StorageFailure: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Open the task file chosen by --data-file, TASKLITE_DATA_FILE or the platform default */
export function openStorage(cmd: Command): TaskStorage {
  const g = cmd.optsWithGlobals<GlobalOptions>();
  const path = resolveDataFile(g.dataFile);
  out.debug(`task file: ${path}`);
  return new TaskStorage(path);
}

/**
 * Split a comma-separated tag string. Entries are trimmed, empty ones dropped.
 */
export function parseTags(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(',').map(t => t.trim()).filter(t => t.length > 0);
}

export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof ValidationError) return ExitCode.InvalidInput;
  if (err instanceof StorageError) return ExitCode.StorageFailure;
  return ExitCode.Failure;
}

/**
 * Run a command action, printing any error and setting the exit code.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    out.error(err instanceof ValidationError ? `Invalid input: ${message}` : `Error: ${message}`);
    out.debugError(err);
    process.exitCode = exitCodeFor(err);
  }
}
