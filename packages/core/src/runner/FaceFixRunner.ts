import type {
  FileResult,
  RunPlan,
  RunProgress,
  RunSummary,
  Selection,
} from '../types/RunResult.js';
import type { RewriteEngine } from '../rewriter/RewriteEngine.js';
import { selectFiles } from '../selector/FileSelector.js';
import type { SelectionFilters } from '../selector/Scope.js';
import { mapWithConcurrency } from './Concurrency.js';
import { defaultWorkers } from './FixerConfig.js';

export interface RunnerOptions {
  progress?: (progress: RunProgress) => void;
  /** Asked after the preview; changes are applied only when it resolves true */
  confirm?: (plan: RunPlan) => Promise<boolean>;
}

export interface RunParams extends SelectionFilters, RunnerOptions {
  rootDir: string;
  makeBackup: boolean;
  /** Files written in parallel during apply */
  workers?: number;
}

/**
 * Selects candidate files, previews their slot lines and applies the rewrite.
 */
export class FaceFixRunner {
  constructor(private readonly engine: RewriteEngine) {}

  select(params: RunParams): Selection {
    params.progress?.({
      phase: 'selecting',
      currentFile: null,
      processedFiles: 0,
      totalFiles: 0,
    });
    return selectFiles(params.rootDir, params);
  }

  /**
   * Scan every candidate with preview on and apply off. A selection made
   * earlier with `select` can be passed in.
   */
  async preview(params: RunParams, selection: Selection = this.select(params)): Promise<RunPlan> {
    const totalFiles = selection.files.length;
    const previewResults: FileResult[] = [];

    for (const [index, file] of selection.files.entries()) {
      params.progress?.({
        phase: 'previewing',
        currentFile: file,
        processedFiles: index,
        totalFiles,
      });
      previewResults.push(
        await this.engine.processFile(file, {
          makeBackup: params.makeBackup,
          preview: true,
          applyChanges: false,
          processDisabled: params.processDisabled,
        })
      );
    }

    return {
      selection,
      previewResults,
      filesToModify: previewResults
        .filter((result) => result.status === 'matched')
        .map((result) => result.file),
    };
  }

  /**
   * Rewrite the plan's files, each one independently.
   */
  async apply(plan: RunPlan, params: RunParams): Promise<RunSummary> {
    const totalFiles = plan.filesToModify.length;
    let processedFiles = 0;

    const results = await mapWithConcurrency(
      plan.filesToModify,
      params.workers ?? defaultWorkers(),
      async (file) => {
        const result = await this.engine.processFile(file, {
          makeBackup: params.makeBackup,
          preview: false,
          applyChanges: true,
          processDisabled: params.processDisabled,
        });
        processedFiles += 1;
        params.progress?.({
          phase: 'applying',
          currentFile: file,
          processedFiles,
          totalFiles,
        });
        return result;
      }
    );

    return this.complete(plan, results, true, params);
  }

  async run(params: RunParams): Promise<RunSummary> {
    const plan = await this.preview(params);
    if (plan.filesToModify.length === 0) {
      return this.complete(plan, [], false, params);
    }
    if (params.confirm && !(await params.confirm(plan))) {
      return this.complete(plan, [], false, params);
    }
    return this.apply(plan, params);
  }

  private complete(
    plan: RunPlan,
    results: FileResult[],
    applied: boolean,
    params: RunParams
  ): RunSummary {
    params.progress?.({
      phase: 'completing',
      currentFile: null,
      processedFiles: results.length,
      totalFiles: results.length,
    });
    return summarize(plan, results, applied);
  }
}

export function summarize(plan: RunPlan, results: FileResult[], applied: boolean): RunSummary {
  const failures = [
    ...plan.previewResults.filter((result) => result.status === 'failed'),
    ...results.filter((result) => result.status === 'failed'),
  ];
  const filesScanned = plan.selection.files.length;
  const filesModified = results.filter((result) => result.written).length;
  const backupsWritten = results.filter((result) => result.backupPath !== null).length;

  const lines = [`Files processed: ${filesScanned}`, `Files modified: ${filesModified}`];
  if (failures.length > 0) {
    lines.push(`Files failed: ${failures.length}`);
  }

  return {
    filesScanned,
    filesMatched: plan.filesToModify.length,
    filesModified,
    backupsWritten,
    failures,
    skipped: plan.selection.skipped,
    diagnostics: [
      ...plan.selection.diagnostics,
      ...failures.flatMap((result) => (result.diagnostic ? [result.diagnostic] : [])),
    ],
    results,
    applied,
    summary: lines.join('\n'),
    finishedAtUtc: new Date().toISOString(),
  };
}
