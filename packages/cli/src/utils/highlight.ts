import chalk from 'chalk';
import { plainHighlighter } from '@facefix/core';
import type { ColorMode, Highlighter } from '@facefix/core';

export interface ColorStream {
  isTTY?: boolean;
}

/**
 * Decide once at start-up whether output is coloured.
 */
export function isColorEnabled(mode: ColorMode, stream: ColorStream = process.stdout): boolean {
  if (mode === 'always') return true;
  if (mode === 'never') return false;
  return Boolean(stream.isTTY) && chalk.supportsColor !== false;
}

export function createColors(enabled: boolean): chalk.Chalk {
  return new chalk.Instance({ level: enabled ? 1 : 0 });
}

/**
 * Red slot names and green `this`, or nothing when colour is off
 */
export function createHighlighter(enabled: boolean): Highlighter {
  if (!enabled) return plainHighlighter;
  const colors = createColors(true);
  return {
    slot: (text) => colors.redBright(text),
    keyword: (text) => colors.greenBright(text),
  };
}
