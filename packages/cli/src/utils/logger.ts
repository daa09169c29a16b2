import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { toError } from '@facefix/core';

export type LogSink = (line: string) => void;

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: Error): void;
}

/**
 * Logger writing timestamped lines to a sink
 */
export function createLogger(sink: LogSink, now: () => Date = () => new Date()): Logger {
  const write = (level: string, message: string): void => {
    sink(`[${now().toISOString()}] ${level}: ${message}`);
  };

  return {
    info(message: string): void {
      write('INFO', message);
    },

    warn(message: string): void {
      write('WARN', message);
    },

    error(message: string, error?: Error): void {
      write('ERROR', message);
      if (error?.stack) {
        sink(error.stack);
      }
    },
  };
}

/**
 * Sink appending to a log file. The directory is created on first use.
 */
export function fileSink(path: string): LogSink {
  let ready = false;
  return (line) => {
    if (!ready) {
      mkdirSync(dirname(path), { recursive: true });
      ready = true;
    }
    appendFileSync(path, `${line}\n`, 'utf8');
  };
}

export const nullSink: LogSink = () => {};

/**
 * Forward lines to `sink` until it throws. The first failure goes to
 * `onFailure` and later lines are dropped.
 */
export function guardSink(sink: LogSink, onFailure: (error: Error) => void): LogSink {
  let active = sink;
  return (line) => {
    try {
      active(line);
    } catch (error) {
      active = nullSink;
      onFailure(toError(error));
    }
  };
}
