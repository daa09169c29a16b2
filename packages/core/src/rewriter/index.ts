export { RewriteEngine, backupPathFor, BACKUP_SUFFIX } from './RewriteEngine.js';
export type { RewriteOptions, RewriteEngineOptions } from './RewriteEngine.js';
export {
  buildSlotPattern,
  compileCustomPattern,
  isMatchPolicy,
  MATCH_POLICIES,
  DEFAULT_MATCH_POLICY,
} from './SlotPattern.js';
export type { MatchPolicy } from './SlotPattern.js';
export { rewriteContent, rewriteLine, splitLines } from './LineRewriter.js';
export type { RewriteOutcome } from './LineRewriter.js';
export { formatPreview, plainHighlighter } from './Preview.js';
export type { Highlighter, PreviewReporter } from './Preview.js';
