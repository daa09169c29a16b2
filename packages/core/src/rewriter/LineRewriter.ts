import type { LineMatch } from '../types/Match.js';

export interface RewriteOutcome {
  /** Full content after the rewrite */
  content: string;
  /** Changed lines in file order */
  matches: LineMatch[];
}

const TERMINATOR = /(?:\r\n|\r|\n)$/;

/**
 * Split text into lines, each keeping its terminator.
 */
export function splitLines(content: string): string[] {
  return content.match(/[^\r\n]*(?:\r\n|\r|\n)|[^\r\n]+$/g) ?? [];
}

export function stripTerminator(line: string): string {
  return line.replace(TERMINATOR, '');
}

/**
 * Rewrite one line (without terminator). Returns null when it is not a slot line.
 */
export function rewriteLine(line: string, pattern: RegExp): string | null {
  const match = pattern.exec(line);
  const resource = match?.[1];
  if (resource === undefined) return null;
  const indent = /^\s*/.exec(line)?.[0] ?? '';
  return `${indent}this = ${resource}`;
}

/**
 * Rewrite every slot line in `content`. Rewritten lines end in `\n`; all
 * other lines are kept as they are.
 */
export function rewriteContent(content: string, pattern: RegExp): RewriteOutcome {
  const out: string[] = [];
  const matches: LineMatch[] = [];

  for (const [index, line] of splitLines(content).entries()) {
    const original = stripTerminator(line);
    const rewritten = rewriteLine(original, pattern);
    if (rewritten === null) {
      out.push(line);
      continue;
    }
    out.push(`${rewritten}\n`);
    matches.push({ lineNumber: index + 1, original, rewritten });
  }

  return { content: out.join(''), matches };
}
