/**
 * @facefix/core
 *
 * Slot line rewrite engine and file selection for FaceFix
 */

// Types
export type {
  LineMatch,
  FileStatus,
  FileResult,
  SkipReason,
  SkippedFile,
  Selection,
  RunPlan,
  RunSummary,
  RunPhase,
  RunProgress,
} from './types/index.js';
export {
  FaceFixError,
  FileReadError,
  FileWriteError,
  EnumerationError,
  ConfigError,
  toError,
} from './types/index.js';

// File selection
export type { SelectionFilters, ExclusionMatcher } from './selector/index.js';
export {
  selectFiles,
  relativePath,
  createExclusionMatchers,
  isDisabledFile,
  isExcluded,
  hasDisabledMarker,
  BACKUP_EXCLUSION,
  DISABLED_MARKER,
} from './selector/index.js';

// Rewriting
export type {
  RewriteOptions,
  RewriteEngineOptions,
  MatchPolicy,
  RewriteOutcome,
  Highlighter,
  PreviewReporter,
} from './rewriter/index.js';
export {
  RewriteEngine,
  backupPathFor,
  BACKUP_SUFFIX,
  buildSlotPattern,
  compileCustomPattern,
  isMatchPolicy,
  MATCH_POLICIES,
  DEFAULT_MATCH_POLICY,
  rewriteContent,
  rewriteLine,
  splitLines,
  formatPreview,
  plainHighlighter,
} from './rewriter/index.js';

// Runner and configuration
export type {
  RunParams,
  RunnerOptions,
  FixerConfig,
  ResolvedFixerConfig,
  ColorMode,
} from './runner/index.js';
export {
  FaceFixRunner,
  summarize,
  FixerConfigDefaults,
  loadFixerConfig,
  parseFixerConfig,
  resolveFixerConfig,
  defaultWorkers,
  isColorMode,
  mapWithConcurrency,
} from './runner/index.js';
