import type { LineMatch } from './Match.js';
import type { FileReadError, FileWriteError } from './Errors.js';

/**
 * Outcome of processing one file
 */
export type FileStatus = 'matched' | 'unchanged' | 'disabled' | 'failed';

/**
 * Result of running the rewrite engine on one file
 */
export interface FileResult {
  /** Absolute path of the file */
  file: string;
  /** Outcome */
  status: FileStatus;
  /** Slot lines found in the file; empty unless status is 'matched' */
  matches: LineMatch[];
  /** Whether the file was overwritten */
  written: boolean;
  /** Backup written before the overwrite, if any */
  backupPath: string | null;
  /** One-line message for a failed file */
  diagnostic: string | null;
  /** Underlying error for a failed file */
  error?: FileReadError | FileWriteError;
}

/**
 * Why the selector left a file out
 */
export type SkipReason = 'disabled' | 'excluded';

export interface SkippedFile {
  file: string;
  reason: SkipReason;
}

/**
 * Candidate files produced by the selector
 */
export interface Selection {
  /** Root directory that was walked */
  root: string;
  /** Candidate files in traversal order */
  files: string[];
  /** Files left out, in traversal order */
  skipped: SkippedFile[];
  /** Disabled files kept because disabled processing is on */
  includedDisabled: string[];
  /** Problems met while walking sub-directories */
  diagnostics: string[];
}

/**
 * Files with pending changes after the preview phase
 */
export interface RunPlan {
  selection: Selection;
  /** Per-file results of the preview phase */
  previewResults: FileResult[];
  /** Files with at least one slot line, in selection order */
  filesToModify: string[];
}

/**
 * Summary of a run
 */
export interface RunSummary {
  /** Number of candidate files scanned */
  filesScanned: number;
  /** Number of files with slot lines */
  filesMatched: number;
  /** Number of files overwritten */
  filesModified: number;
  /** Number of backups written */
  backupsWritten: number;
  /** Files that failed in either phase */
  failures: FileResult[];
  /** Files the selector left out */
  skipped: SkippedFile[];
  /** Selection problems and failed-file messages, in the order they arose */
  diagnostics: string[];
  /** Per-file results of the apply phase */
  results: FileResult[];
  /** Whether the apply phase ran */
  applied: boolean;
  /** Human-readable summary */
  summary: string;
  /** Timestamp of completion (ISO 8601 UTC) */
  finishedAtUtc: string;
}

/**
 * Run phase
 */
export type RunPhase = 'selecting' | 'previewing' | 'applying' | 'completing';

/**
 * Progress update during a run
 */
export interface RunProgress {
  phase: RunPhase;
  /** File being processed, null outside a file */
  currentFile: string | null;
  processedFiles: number;
  totalFiles: number;
}
