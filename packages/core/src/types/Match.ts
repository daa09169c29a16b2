/**
 * A slot line that the rewrite engine changed
 */
export interface LineMatch {
  /** Line number (1-indexed) */
  lineNumber: number;
  /** Original line without its terminator */
  original: string;
  /** Rewritten line without its terminator */
  rewritten: string;
}
