import { readFileSync, existsSync } from 'node:fs';
import { availableParallelism } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, toError } from '../types/Errors.js';
import { buildSlotPattern, DEFAULT_MATCH_POLICY, isMatchPolicy } from '../rewriter/SlotPattern.js';
import type { MatchPolicy } from '../rewriter/SlotPattern.js';

export type ColorMode = 'auto' | 'always' | 'never';

const COLOR_MODES: readonly ColorMode[] = ['auto', 'always', 'never'];

const FixerConfigSchema = z
  .object({
    recursive: z.boolean().optional(),
    processDisabled: z.boolean().optional(),
    makeBackup: z.boolean().optional(),
    excludePatterns: z.array(z.string()).optional(),
    matchPolicy: z.enum(['named', 'generic', 'custom']).optional(),
    customPattern: z.string().min(1).optional(),
    workers: z.number().int().positive().optional(),
    color: z.enum(['auto', 'always', 'never']).optional(),
    logFile: z.string().min(1).optional(),
  })
  .strict();

/**
 * FaceFix configuration options, as written in a config file
 */
export type FixerConfig = z.infer<typeof FixerConfigSchema>;

/**
 * Configuration with every default applied
 */
export interface ResolvedFixerConfig {
  /** Walk sub-folders */
  recursive: boolean;
  /** Include files named or marked as disabled */
  processDisabled: boolean;
  /** Copy each file to <stem>_backup.bak before writing */
  makeBackup: boolean;
  /** Folder names or globs to leave out */
  excludePatterns: string[];
  /** Which resource names are rewritten */
  matchPolicy: MatchPolicy;
  /** Slot pattern for the 'custom' policy */
  customPattern?: string;
  /** Files written in parallel during apply */
  workers: number;
  /** Whether previews are highlighted */
  color: ColorMode;
  /** Append a log to this file */
  logFile?: string;
}

export const FixerConfigDefaults = {
  MAX_WORKERS: 32,
  RECURSIVE: false,
  PROCESS_DISABLED: false,
  MAKE_BACKUP: true,
  COLOR: 'auto',
} as const;

export function defaultWorkers(): number {
  return Math.min(FixerConfigDefaults.MAX_WORKERS, availableParallelism() + 4);
}

/**
 * Load configuration from an optional YAML or JSON file, then apply
 * FACEFIX_* environment overrides and defaults.
 */
export function loadFixerConfig(
  path?: string,
  env: NodeJS.ProcessEnv = process.env
): ResolvedFixerConfig {
  let base: FixerConfig = {};

  if (path) {
    if (!existsSync(path)) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    base = parseFixerConfig(readFileSync(path, 'utf-8'), path);
  }

  return resolveFixerConfig(applyEnvOverrides(base, env));
}

export function parseFixerConfig(content: string, source: string): FixerConfig {
  let raw: unknown;
  try {
    raw = source.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Cannot parse ${source}`, toError(error));
  }

  const parsed = FixerConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config in ${source}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Fill defaults. A custom pattern selects the 'custom' policy; the slot
 * pattern is compiled here so a bad one fails before any file is read.
 */
export function resolveFixerConfig(config: FixerConfig): ResolvedFixerConfig {
  const matchPolicy: MatchPolicy = config.customPattern
    ? 'custom'
    : config.matchPolicy ?? DEFAULT_MATCH_POLICY;

  buildSlotPattern(matchPolicy, config.customPattern);

  return {
    recursive: config.recursive ?? FixerConfigDefaults.RECURSIVE,
    processDisabled: config.processDisabled ?? FixerConfigDefaults.PROCESS_DISABLED,
    makeBackup: config.makeBackup ?? FixerConfigDefaults.MAKE_BACKUP,
    excludePatterns: config.excludePatterns ?? [],
    matchPolicy,
    customPattern: config.customPattern,
    workers: config.workers ?? defaultWorkers(),
    color: config.color ?? FixerConfigDefaults.COLOR,
    logFile: config.logFile,
  };
}

function applyEnvOverrides(config: FixerConfig, env: NodeJS.ProcessEnv): FixerConfig {
  const cfg = { ...config };

  if ('FACEFIX_RECURSIVE' in env) {
    cfg.recursive = envBool(env, 'FACEFIX_RECURSIVE', cfg.recursive ?? false);
  }

  if ('FACEFIX_PROCESS_DISABLED' in env) {
    cfg.processDisabled = envBool(env, 'FACEFIX_PROCESS_DISABLED', cfg.processDisabled ?? false);
  }

  if ('FACEFIX_MAKE_BACKUP' in env) {
    cfg.makeBackup = envBool(env, 'FACEFIX_MAKE_BACKUP', cfg.makeBackup ?? true);
  }

  const excludePatterns = envList(env, 'FACEFIX_EXCLUDE_PATTERNS');
  if (excludePatterns) cfg.excludePatterns = excludePatterns;

  const matchPolicy = envString(env, 'FACEFIX_MATCH_POLICY');
  if (matchPolicy) {
    if (!isMatchPolicy(matchPolicy)) {
      throw new ConfigError(`FACEFIX_MATCH_POLICY must be named, generic or custom, got '${matchPolicy}'`);
    }
    cfg.matchPolicy = matchPolicy;
  }

  const customPattern = envString(env, 'FACEFIX_CUSTOM_PATTERN');
  if (customPattern) cfg.customPattern = customPattern;

  const workers = envInt(env, 'FACEFIX_WORKERS');
  if (workers !== undefined && workers > 0) cfg.workers = workers;

  const color = envString(env, 'FACEFIX_COLOR');
  if (color) {
    if (!isColorMode(color)) {
      throw new ConfigError(`FACEFIX_COLOR must be auto, always or never, got '${color}'`);
    }
    cfg.color = color;
  }

  const logFile = envString(env, 'FACEFIX_LOG_FILE');
  if (logFile) cfg.logFile = logFile;

  return cfg;
}

export function isColorMode(value: string): value is ColorMode {
  return (COLOR_MODES as readonly string[]).includes(value);
}

function envString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value && value.trim() ? value.trim() : undefined;
}

function envList(env: NodeJS.ProcessEnv, key: string): string[] | undefined {
  const raw = envString(env, key);
  if (!raw) return undefined;
  const list = raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s);
  return list.length > 0 ? list : undefined;
}

function envBool(env: NodeJS.ProcessEnv, key: string, defaultValue: boolean): boolean {
  const value = env[key]?.trim().toLowerCase();
  if (value === '1' || value === 'true' || value === 'yes' || value === 'y') return true;
  if (value === '0' || value === 'false' || value === 'no' || value === 'n') return false;
  return defaultValue;
}

function envInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = env[key];
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}
