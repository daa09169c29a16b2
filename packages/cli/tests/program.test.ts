import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { collect, createProgram, parsePositiveInt } from '../src/program.js';
import type { Prompter } from '../src/services/Prompter.js';

const neverAsked: Prompter = {
  askSettings: async () => {
    throw new Error('unexpected settings prompt');
  },
  confirm: async () => {
    throw new Error('unexpected confirmation');
  },
  askExclusions: async () => [],
};

let root: string;
let logs: string[];
let exitCodes: number[];

function program() {
  return createProgram(
    {
      cwd: root,
      env: {},
      output: { log: (line) => logs.push(line), error: (line) => logs.push(line) },
      prompter: neverAsked,
      stdout: { isTTY: false },
    },
    (code) => exitCodes.push(code)
  )
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} });
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'facefix-program-'));
  logs = [];
  exitCodes = [];
  writeFileSync(join(root, 'face.ini'), 'ps-t0 = ResourceFaceDiffuse\n');
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

test('parses flags into a run', async () => {
  await program().parseAsync(['--yes', '--no-backup', '--no-color', '-w', '2'], { from: 'user' });

  expect(exitCodes).toEqual([0]);
  expect(readFileSync(join(root, 'face.ini'), 'utf8')).toBe('this = ResourceFaceDiffuse\n');
  expect(logs).not.toContain("Backup saved as 'face_backup.bak'");
});

test('takes the folder as an argument', async () => {
  await program().parseAsync([join(root, 'missing'), '--dry-run'], { from: 'user' });
  expect(exitCodes).toEqual([1]);
});

test('a folder after an exclusion is still the folder', async () => {
  mkdirSync(join(root, 'mods'));
  writeFileSync(join(root, 'mods', 'm.ini'), 'ps-t0 = ResourceFaceDiffuse\n');

  await program().parseAsync(
    ['-y', '--no-backup', '--no-color', '-e', 'archive', join(root, 'mods')],
    { from: 'user' }
  );

  expect(exitCodes).toEqual([0]);
  expect(logs).toContain(`Working directory: ${join(root, 'mods')}`);
  expect(readFileSync(join(root, 'mods', 'm.ini'), 'utf8')).toBe('this = ResourceFaceDiffuse\n');
  expect(readFileSync(join(root, 'face.ini'), 'utf8')).toBe('ps-t0 = ResourceFaceDiffuse\n');
});

test('--exclude can be repeated', async () => {
  writeFileSync(join(root, 'old.ini'), 'ps-t0 = ResourceFaceDiffuse\n');

  await program().parseAsync(['-y', '--no-color', '--dry-run', '-e', 'face', '-e', 'old'], {
    from: 'user',
  });

  expect(logs).toContain('Skipping excluded file: face.ini');
  expect(logs).toContain('Skipping excluded file: old.ini');
  expect(logs[logs.length - 1]).toBe('No eligible .ini files found.');
});

test('rejects an unknown policy', async () => {
  await expect(
    program().parseAsync(['--policy', 'fuzzy'], { from: 'user' })
  ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  expect(exitCodes).toEqual([]);
});

test('rejects a non-positive worker count', async () => {
  await expect(
    program().parseAsync(['--workers', '0'], { from: 'user' })
  ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
});

test('collect appends each value', () => {
  expect(collect('archive')).toEqual(['archive']);
  expect(collect('old', ['archive'])).toEqual(['archive', 'old']);
});

test('parsePositiveInt', () => {
  expect(parsePositiveInt('12')).toBe(12);
  expect(() => parsePositiveInt('1.5')).toThrow(InvalidArgumentError);
  expect(() => parsePositiveInt('abc')).toThrow('Must be a positive integer.');
});
