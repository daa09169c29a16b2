import { copyFile, readFile, writeFile } from 'node:fs/promises';
import { join, parse } from 'node:path';
import { FileReadError, FileWriteError, toError } from '../types/Errors.js';
import type { FileResult } from '../types/RunResult.js';
import { hasDisabledMarker } from '../selector/SelectorUtils.js';
import { rewriteContent } from './LineRewriter.js';
import type { RewriteOutcome } from './LineRewriter.js';
import { buildSlotPattern, DEFAULT_MATCH_POLICY } from './SlotPattern.js';
import type { PreviewReporter } from './Preview.js';

export const BACKUP_SUFFIX = '_backup.bak';

/**
 * Per-call switches. Preview and apply are independent; with both off the
 * call is a dry scan.
 */
export interface RewriteOptions {
  makeBackup: boolean;
  preview: boolean;
  applyChanges: boolean;
  processDisabled: boolean;
}

export interface RewriteEngineOptions {
  /** Slot line pattern; group 1 is the resource. Defaults to the generic policy. */
  pattern?: RegExp;
  /** Receives the matches of every file processed with `preview` */
  onPreview?: PreviewReporter;
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export class RewriteEngine {
  private readonly pattern: RegExp;
  private readonly onPreview?: PreviewReporter;

  constructor(options: RewriteEngineOptions = {}) {
    this.pattern = options.pattern ?? buildSlotPattern(DEFAULT_MATCH_POLICY);
    this.onPreview = options.onPreview;
  }

  /**
   * Scan one file and, when asked, back it up and write the rewritten lines.
   * Failures come back as a 'failed' result; nothing is thrown.
   */
  async processFile(file: string, options: RewriteOptions): Promise<FileResult> {
    let content: string;
    try {
      content = utf8.decode(await readFile(file));
    } catch (error) {
      return failed(file, new FileReadError(file, toError(error)));
    }

    if (!options.processDisabled && hasDisabledMarker(content)) {
      return result(file, 'disabled');
    }

    const outcome = this.rewrite(content);
    if (outcome.matches.length === 0) {
      return result(file, 'unchanged');
    }

    if (options.preview) {
      this.onPreview?.(file, outcome.matches);
    }

    if (!options.applyChanges) {
      return { ...result(file, 'matched'), matches: outcome.matches };
    }

    let backupPath: string | null = null;
    if (options.makeBackup) {
      backupPath = backupPathFor(file);
      try {
        await copyFile(file, backupPath);
      } catch (error) {
        return failed(file, new FileWriteError(file, 'backup', toError(error)));
      }
    }

    try {
      await writeFile(file, outcome.content, 'utf8');
    } catch (error) {
      return {
        ...failed(file, new FileWriteError(file, 'file', toError(error))),
        backupPath,
      };
    }

    return {
      ...result(file, 'matched'),
      matches: outcome.matches,
      written: true,
      backupPath,
    };
  }

  rewrite(content: string): RewriteOutcome {
    return rewriteContent(content, this.pattern);
  }
}

/**
 * `<dir>/<stem>_backup.bak` for `<dir>/<stem>.<ext>`
 */
export function backupPathFor(file: string): string {
  const parsed = parse(file);
  return join(parsed.dir, `${parsed.name}${BACKUP_SUFFIX}`);
}

function result(file: string, status: FileResult['status']): FileResult {
  return {
    file,
    status,
    matches: [],
    written: false,
    backupPath: null,
    diagnostic: null,
  };
}

function failed(file: string, error: FileReadError | FileWriteError): FileResult {
  return { ...result(file, 'failed'), diagnostic: error.message, error };
}
