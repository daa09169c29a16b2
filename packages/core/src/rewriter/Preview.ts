import type { LineMatch } from '../types/Match.js';

/**
 * Decorates the parts of a preview line that changed
 */
export interface Highlighter {
  /** The `ps-tN` slot name in the original line */
  slot(text: string): string;
  /** The `this` keyword in the rewritten line */
  keyword(text: string): string;
}

export const plainHighlighter: Highlighter = {
  slot: (text) => text,
  keyword: (text) => text,
};

/**
 * Called by the engine with the matches of a file in preview mode
 */
export type PreviewReporter = (file: string, matches: LineMatch[]) => void;

export function formatPreview(
  displayPath: string,
  matches: LineMatch[],
  highlighter: Highlighter = plainHighlighter
): string[] {
  const lines = [`Preview changes for '${displayPath}':`];
  for (const match of matches) {
    const before = highlightSlot(match.original, highlighter);
    const after = highlightKeyword(match.rewritten, highlighter);
    lines.push(`  Line ${match.lineNumber}: '${before}' → '${after}'`);
  }
  return lines;
}

function highlightSlot(line: string, highlighter: Highlighter): string {
  return line.replace(/ps-t\d+/gi, (slot) => highlighter.slot(slot));
}

function highlightKeyword(line: string, highlighter: Highlighter): string {
  return line.replace(/^(\s*)this\b/, (_, indent: string) => `${indent}${highlighter.keyword('this')}`);
}
