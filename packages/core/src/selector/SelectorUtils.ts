import { readdirSync, readFileSync, statSync } from 'node:fs';
import type { Dirent } from 'node:fs';
import { join } from 'node:path';
import { FileReadError, toError } from '../types/Errors.js';
import { BACKUP_EXCLUSION, DISABLED_MARKER, INI_EXTENSION } from './Scope.js';

export interface ExclusionMatcher {
  /** Pattern as given */
  source: string;
  test(relativePath: string): boolean;
}

export interface DirectoryListing {
  files: string[];
  directories: string[];
  /** Links whose target could not be inspected */
  diagnostics: string[];
}

/**
 * List a directory, files and sub-directories each sorted by name.
 * Links to files count as files; links to directories are not followed.
 * Throws whatever the file system throws for `dir` itself.
 */
export function listDirectory(dir: string): DirectoryListing {
  const entries: Dirent[] = readdirSync(dir, { withFileTypes: true });
  const files: string[] = [];
  const directories: string[] = [];
  const diagnostics: string[] = [];
  for (const entry of entries) {
    if (entry.isDirectory()) {
      directories.push(entry.name);
    } else if (entry.isFile()) {
      files.push(entry.name);
    } else if (entry.isSymbolicLink()) {
      try {
        if (statSync(join(dir, entry.name)).isFile()) files.push(entry.name);
      } catch (error) {
        diagnostics.push(new FileReadError(join(dir, entry.name), toError(error)).message);
      }
    }
  }
  files.sort(compareNames);
  directories.sort(compareNames);
  return {
    files: files.map((name) => join(dir, name)),
    directories: directories.map((name) => join(dir, name)),
    diagnostics,
  };
}

export function createExclusionMatchers(patterns: string[]): ExclusionMatcher[] {
  const matchers: ExclusionMatcher[] = [];
  for (const source of [BACKUP_EXCLUSION, ...patterns]) {
    const matcher = createExclusionMatcher(source);
    if (matcher) matchers.push(matcher);
  }
  return matchers;
}

/**
 * Outer wildcards are dropped and the rest is matched case-insensitively
 * anywhere in the path. Inner wildcards make it a glob.
 */
export function createExclusionMatcher(source: string): ExclusionMatcher | null {
  const needle = normalizePath(source.trim())
    .replace(/^\*+|\*+$/g, '')
    .toLowerCase();
  if (!needle) return null;

  if (/[*?]/.test(needle)) {
    const regex = globToRegex(needle);
    return { source, test: (path) => regex.test(normalizePath(path).toLowerCase()) };
  }
  return {
    source,
    test: (path) => normalizePath(path).toLowerCase().includes(needle),
  };
}

export function isExcluded(relativePath: string, matchers: ExclusionMatcher[]): boolean {
  return matchers.some((matcher) => matcher.test(relativePath));
}

export function isIniFile(fileName: string): boolean {
  return extension(fileName).toLowerCase() === INI_EXTENSION;
}

/**
 * A file is disabled when its name says so or its content carries the marker.
 * Unreadable content does not count as disabled.
 */
export function isDisabledFile(path: string): boolean {
  if (hasDisabledName(path)) return true;
  try {
    return hasDisabledMarker(readFileSync(path, 'utf8'));
  } catch {
    return false;
  }
}

export function hasDisabledName(path: string): boolean {
  return basename(path).toLowerCase().includes('disabled');
}

export function hasDisabledMarker(content: string): boolean {
  return content.includes(DISABLED_MARKER);
}

export function normalizePath(path: string): string {
  return path.replace(/\\/g, '/');
}

export function basename(path: string): string {
  const normalized = normalizePath(path);
  const idx = normalized.lastIndexOf('/');
  return idx >= 0 ? normalized.slice(idx + 1) : normalized;
}

function extension(fileName: string): string {
  const idx = fileName.lastIndexOf('.');
  return idx >= 0 ? fileName.slice(idx + 1) : '';
}

function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function globToRegex(glob: string): RegExp {
  let out = '';
  for (let i = 0; i < glob.length; i += 1) {
    const ch = glob[i];
    if (ch === '*') {
      if (glob[i + 1] === '*') {
        out += '.*';
        i += 1;
      } else {
        out += '[^/]*';
      }
      continue;
    }
    if (ch === '?') {
      out += '.';
      continue;
    }
    if ('\\^$+.()|{}[]'.includes(ch)) {
      out += `\\${ch}`;
      continue;
    }
    out += ch;
  }
  return new RegExp(out);
}
