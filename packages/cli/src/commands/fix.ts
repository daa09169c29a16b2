import { relative, resolve } from 'node:path';
import {
  buildSlotPattern,
  EnumerationError,
  FaceFixRunner,
  formatPreview,
  loadFixerConfig,
  relativePath,
  resolveFixerConfig,
  RewriteEngine,
  toError,
} from '@facefix/core';
import type {
  FileResult,
  MatchPolicy,
  ResolvedFixerConfig,
  RunParams,
  RunSummary,
  Selection,
} from '@facefix/core';
import type { Prompter, SessionSettings } from '../services/Prompter.js';
import { createColors, createHighlighter, isColorEnabled } from '../utils/highlight.js';
import type { ColorStream } from '../utils/highlight.js';
import { createLogger, fileSink, guardSink, nullSink } from '../utils/logger.js';
import type { Logger, LogSink } from '../utils/logger.js';
import { PRODUCT_NAME, VERSION } from '../version.js';

/**
 * Options as parsed from the command line; unset flags fall back to the
 * configuration file and environment.
 */
export interface FixCommandOptions {
  folder?: string;
  recursive?: boolean;
  processDisabled?: boolean;
  backup?: boolean;
  exclude?: string[];
  policy?: MatchPolicy;
  pattern?: string;
  workers?: number;
  config?: string;
  yes?: boolean;
  dryRun?: boolean;
  interactive?: boolean;
  color?: boolean;
  logFile?: string;
}

export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export interface FixDependencies {
  cwd: string;
  env: NodeJS.ProcessEnv;
  output: Output;
  prompter: Prompter;
  stdout?: ColorStream;
  /** Overrides the log file sink, mainly for tests */
  logSink?: LogSink;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

/**
 * Select, preview, confirm and apply. Resolves to the process exit code.
 */
export async function runFix(
  options: FixCommandOptions,
  deps: FixDependencies
): Promise<number> {
  const { output } = deps;

  let config: ResolvedFixerConfig;
  try {
    config = mergeOptions(
      loadFixerConfig(options.config ? resolve(deps.cwd, options.config) : undefined, deps.env),
      options
    );
  } catch (error) {
    output.error(`Configuration error: ${toError(error).message}`);
    return EXIT_FAILURE;
  }

  const colorEnabled = isColorEnabled(config.color, deps.stdout);
  const colors = createColors(colorEnabled);
  const highlighter = createHighlighter(colorEnabled);
  const logger = createLogger(
    guardSink(
      deps.logSink ?? (config.logFile ? fileSink(resolve(deps.cwd, config.logFile)) : nullSink),
      (error) => output.error(colors.red(`Cannot write log file: ${error.message}`))
    )
  );
  const display = (file: string): string => relative(deps.cwd, file) || file;

  output.log(colors.bold(`${PRODUCT_NAME} v${VERSION}`));
  logger.info(`${PRODUCT_NAME} v${VERSION} started`);

  const rootDir = resolve(deps.cwd, options.folder ?? '.');
  output.log(`Working directory: ${rootDir}`);

  let settings: SessionSettings = {
    processDisabled: config.processDisabled,
    recursive: config.recursive,
    makeBackup: config.makeBackup,
  };
  let excludePatterns = config.excludePatterns;

  if (options.interactive) {
    settings = await deps.prompter.askSettings(settings);
    output.log('');
    output.log('Your choices:');
    output.log(`• Process disabled: ${yesNo(settings.processDisabled)}`);
    output.log(`• Scan subfolders: ${yesNo(settings.recursive)}`);
    output.log(`• Create backups: ${yesNo(settings.makeBackup)}`);
    if (!(await deps.prompter.confirm('Confirm?', true))) {
      output.log('Operation cancelled.');
      logger.info('Cancelled at settings confirmation');
      return EXIT_OK;
    }
    excludePatterns = [...excludePatterns, ...(await deps.prompter.askExclusions())];
  }

  const engine = new RewriteEngine({
    pattern: buildSlotPattern(config.matchPolicy, config.customPattern),
    onPreview: (file, matches) => {
      output.log('');
      for (const line of formatPreview(display(file), matches, highlighter)) {
        output.log(line);
      }
    },
  });
  const runner = new FaceFixRunner(engine);
  const params: RunParams = {
    rootDir,
    recursive: settings.recursive,
    processDisabled: settings.processDisabled,
    makeBackup: settings.makeBackup,
    excludePatterns,
    workers: config.workers,
  };

  logger.info(
    `Settings: recursive=${params.recursive} processDisabled=${params.processDisabled} ` +
      `backup=${params.makeBackup} policy=${config.matchPolicy} exclude=[${excludePatterns.join(', ')}]`
  );

  let selection: Selection;
  try {
    selection = runner.select(params);
  } catch (error) {
    if (error instanceof EnumerationError) {
      output.error(colors.red(`Error scanning folders: ${error.message}`));
      logger.error('Enumeration failed', error);
      return EXIT_FAILURE;
    }
    throw error;
  }

  for (const diagnostic of selection.diagnostics) {
    output.error(colors.red(diagnostic));
    logger.warn(diagnostic);
  }
  for (const skipped of selection.skipped) {
    const rel = relativePath(rootDir, skipped.file);
    const message =
      skipped.reason === 'disabled'
        ? `Skipping disabled file: ${rel}`
        : `Skipping excluded file: ${rel}`;
    output.log(colors.yellow(message));
    logger.info(message);
  }
  for (const file of selection.includedDisabled) {
    const message = `Including disabled file: ${relativePath(rootDir, file)}`;
    output.log(colors.yellow(message));
    logger.info(message);
  }

  if (selection.files.length === 0) {
    output.log(colors.yellow('No eligible .ini files found.'));
    logger.info('No eligible files');
    return EXIT_OK;
  }

  output.log('');
  output.log(`Found ${selection.files.length} eligible .ini file(s). Previewing changes...`);
  const plan = await runner.preview(params, selection);
  reportFailures(plan.previewResults, output, logger, colors.red);

  if (plan.filesToModify.length === 0) {
    output.log('');
    output.log('No changes needed.');
    logger.info(`Scanned ${selection.files.length} file(s), no changes needed`);
    return EXIT_OK;
  }

  if (options.dryRun) {
    output.log('');
    output.log(`Dry run: ${plan.filesToModify.length} file(s) would be modified.`);
    logger.info(`Dry run, ${plan.filesToModify.length} file(s) would change`);
    return EXIT_OK;
  }

  if (!options.yes) {
    const apply = await deps.prompter.confirm(
      `Apply changes to ${plan.filesToModify.length} file(s)?`,
      false
    );
    if (!apply) {
      output.log('Operation cancelled.');
      logger.info('Cancelled at apply confirmation');
      return EXIT_OK;
    }
  }

  const summary = await runner.apply(plan, params);
  reportApply(summary, display, output, logger, colors);

  output.log('');
  for (const line of summary.summary.split('\n')) {
    output.log(line);
  }
  logger.info(summary.summary.replace(/\n/g, '; '));
  return EXIT_OK;
}

/**
 * Command line flags take precedence over the loaded configuration.
 */
export function mergeOptions(
  config: ResolvedFixerConfig,
  options: FixCommandOptions
): ResolvedFixerConfig {
  const matchPolicy = options.pattern ? 'custom' : options.policy ?? config.matchPolicy;
  const customPattern = options.pattern ?? config.customPattern;

  return resolveFixerConfig({
    recursive: options.recursive ?? config.recursive,
    processDisabled: options.processDisabled ?? config.processDisabled,
    makeBackup: options.backup ?? config.makeBackup,
    excludePatterns: [...config.excludePatterns, ...(options.exclude ?? [])],
    matchPolicy,
    customPattern: matchPolicy === 'custom' ? customPattern : undefined,
    workers: options.workers ?? config.workers,
    color: options.color === undefined ? config.color : options.color ? 'always' : 'never',
    logFile: options.logFile ?? config.logFile,
  });
}

function reportFailures(
  results: FileResult[],
  output: Output,
  logger: Logger,
  paint: (text: string) => string
): void {
  for (const result of results) {
    if (result.status !== 'failed' || !result.diagnostic) continue;
    output.error(paint(result.diagnostic));
    logger.error(result.diagnostic, result.error);
  }
}

function reportApply(
  summary: RunSummary,
  display: (file: string) => string,
  output: Output,
  logger: Logger,
  colors: { red: (text: string) => string; green: (text: string) => string }
): void {
  for (const result of summary.results) {
    if (result.backupPath) {
      output.log(`Backup saved as '${display(result.backupPath)}'`);
    }
    if (result.written) {
      logger.info(`Modified ${result.file} (${result.matches.length} line(s))`);
    }
  }
  reportFailures(summary.results, output, logger, colors.red);
  if (summary.filesModified > 0) {
    output.log(colors.green(`Applied changes to ${summary.filesModified} file(s).`));
  }
}

function yesNo(value: boolean): string {
  return value ? 'Yes' : 'No';
}
