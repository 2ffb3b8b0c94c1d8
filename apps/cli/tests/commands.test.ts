import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import chalk from 'chalk';
import { TaskStorage, createTask } from '@tasklite/core';
import { createProgram } from '../src/program.js';
import { setDebug } from '../src/output.js';

// Drives the commander program end to end against a temporary task file.

let tmpDir: string;
let dataFile: string;
let stdout: string[];
let stderr: string[];
let level: typeof chalk.level;

function run(...args: string[]): void {
  const program = createProgram().exitOverride();
  program.parse(['--data-file', dataFile, ...args], { from: 'user' });
}

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'tasklite-cli-test-'));
  dataFile = join(tmpDir, 'tasks.json');
  stdout = [];
  stderr = [];
  level = chalk.level;
  chalk.level = 0;
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    stdout.push(args.join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    stderr.push(args.join(' '));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  chalk.level = level;
  setDebug(false);
  process.exitCode = undefined;
  rmSync(tmpDir, { recursive: true, force: true });
});

function seed(): void {
  new TaskStorage(dataFile).save([
    createTask('Buy milk', { id: 'aaaaaaaa1111', tags: ['shopping'], created: '2026-01-02T03:04:05.000Z' }),
    { ...createTask('Write report', { id: 'bbbbbbbb2222', tags: ['work'], created: '2026-01-03T00:00:00.000Z' }), completed: true },
    createTask('Buy stamps', { id: 'cccccccc3333', created: '2026-01-04T00:00:00.000Z' }),
  ]);
}

describe('add', () => {
  it('persists a task with parsed tags', () => {
    run('add', '  Pay rent ', '--tags', 'home, money', '--id', 'rent1');

    expect(stdout).toEqual(['Added task rent1: Pay rent']);
    const tasks = new TaskStorage(dataFile).load();
    expect(tasks).toHaveLength(1);
    expect(tasks[0]).toMatchObject({ id: 'rent1', description: 'Pay rent', completed: false, tags: ['home', 'money'] });
  });

  it('appends to existing tasks', () => {
    seed();
    run('add', 'Call mum', '--id', 'mum');
    expect(new TaskStorage(dataFile).load().map(t => t.id))
      .toEqual(['aaaaaaaa1111', 'bbbbbbbb2222', 'cccccccc3333', 'mum']);
  });

  it('rejects a blank description with exit code 2', () => {
    run('add', '   ');
    expect(stdout).toEqual(['Invalid input: description must be non-empty']);
    expect(process.exitCode).toBe(2);
    expect(existsSync(dataFile)).toBe(false);
  });

  it('prints the record without saving on --dry-run', () => {
    run('add', 'Maybe later', '--id', 'dry', '--tags', 'x', '--dry-run');

    expect(stdout[0]).toBe('Dry run, task would be:');
    const record: unknown = JSON.parse(stdout[1] ?? '');
    expect(record).toMatchObject({ id: 'dry', description: 'Maybe later', completed: false, tags: ['x'] });
    expect(existsSync(dataFile)).toBe(false);
  });

  it('reports storage failures with exit code 3', () => {
    writeFileSync(dataFile, 'not a json');
    run('add', 'Anything');
    expect(process.exitCode).toBe(3);
    expect(stdout[0]).toMatch(/^Error: invalid JSON in /);
    expect(readFileSync(dataFile, 'utf8')).toBe('not a json');
  });
});

describe('list', () => {
  it('says so when there are no tasks', () => {
    run('list');
    expect(stdout).toEqual(['No tasks found']);
  });

  it('prints one row per task in file order', () => {
    seed();
    run('list');
    expect(stdout).toEqual([
      '(aaaaaaaa) [ ] Buy milk  2026-01-02  #shopping',
      '(bbbbbbbb) [x] Write report  2026-01-03  #work',
      '(cccccccc) [ ] Buy stamps  2026-01-04',
    ]);
  });

  it('filters by tag and completion', () => {
    seed();
    run('list', '--tag', 'work');
    run('list', '--incomplete');
    run('list', '--completed');
    expect(stdout).toEqual([
      '(bbbbbbbb) [x] Write report  2026-01-03  #work',
      '(aaaaaaaa) [ ] Buy milk  2026-01-02  #shopping',
      '(cccccccc) [ ] Buy stamps  2026-01-04',
      '(bbbbbbbb) [x] Write report  2026-01-03  #work',
    ]);
  });

  it('refuses --completed together with --incomplete', () => {
    run('list', '--completed', '--incomplete');
    expect(stdout).toEqual(['Cannot use both --completed and --incomplete at the same time']);
    expect(process.exitCode).toBe(2);
  });

  it('prints JSON records', () => {
    seed();
    run('list', '--json', '--tag', 'shopping');
    expect(JSON.parse(stdout.join('\n'))).toEqual([
      { id: 'aaaaaaaa1111', description: 'Buy milk', created: '2026-01-02T03:04:05.000Z', completed: false, tags: ['shopping'] },
    ]);
  });

  it('reports a corrupt file with exit code 3', () => {
    writeFileSync(dataFile, 'not a json');
    run('list');
    expect(process.exitCode).toBe(3);
  });

  it('prints debug details to stderr with --debug', () => {
    run('--debug', 'list');
    expect(stderr).toEqual([`[debug] task file: ${dataFile}`, '[debug] 0 task(s) after filtering']);
  });
});

describe('search', () => {
  it('matches descriptions', () => {
    seed();
    run('search', 'Buy');
    expect(stdout).toEqual(['(aaaaaaaa) Buy milk', '(cccccccc) Buy stamps']);
  });

  it('supports case-insensitive search', () => {
    seed();
    run('search', 'REPORT', '--ignore-case');
    expect(stdout).toEqual(['(bbbbbbbb) Write report']);
  });

  it('searches tags', () => {
    seed();
    run('search', 'work', '--field', 'tags');
    expect(stdout).toEqual(['(bbbbbbbb) Write report']);
  });

  it('says so when nothing matches', () => {
    seed();
    run('search', 'nothing here');
    expect(stdout).toEqual(['No matching tasks']);
  });

  it('prints JSON matches', () => {
    seed();
    run('search', 'stamps', '--json');
    expect(JSON.parse(stdout.join('\n'))).toEqual([
      { id: 'cccccccc3333', description: 'Buy stamps', created: '2026-01-04T00:00:00.000Z', completed: false, tags: [] },
    ]);
  });
});
