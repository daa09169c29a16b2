import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger, fileSink, guardSink } from '../src/utils/logger.js';

const clock = () => new Date('2026-03-01T12:30:00.000Z');

test('writes a timestamped line per level', () => {
  const lines: string[] = [];
  const logger = createLogger((line) => lines.push(line), clock);

  logger.info('started');
  logger.warn('slow disk');

  expect(lines).toEqual([
    '[2026-03-01T12:30:00.000Z] INFO: started',
    '[2026-03-01T12:30:00.000Z] WARN: slow disk',
  ]);
});

test('errors are followed by their stack', () => {
  const lines: string[] = [];
  const logger = createLogger((line) => lines.push(line), clock);
  const error = new Error('disk full');

  logger.error('write failed', error);
  logger.error('no detail');

  expect(lines).toEqual([
    '[2026-03-01T12:30:00.000Z] ERROR: write failed',
    error.stack,
    '[2026-03-01T12:30:00.000Z] ERROR: no detail',
  ]);
});

test('file sink creates the folder and appends', () => {
  const dir = mkdtempSync(join(tmpdir(), 'facefix-log-'));
  try {
    const path = join(dir, 'nested', 'run.log');
    const logger = createLogger(fileSink(path), clock);
    logger.info('one');
    logger.info('two');

    expect(readFileSync(path, 'utf8')).toBe(
      '[2026-03-01T12:30:00.000Z] INFO: one\n[2026-03-01T12:30:00.000Z] INFO: two\n'
    );
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test('a failing sink is reported once and then silenced', () => {
  const failures: string[] = [];
  let calls = 0;
  const sink = guardSink(
    () => {
      calls += 1;
      throw new Error('read-only file system');
    },
    (error) => failures.push(error.message)
  );

  sink('one');
  sink('two');

  expect(calls).toBe(1);
  expect(failures).toEqual(['read-only file system']);
});
