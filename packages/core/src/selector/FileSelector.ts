import { relative, resolve } from 'node:path';
import { EnumerationError, toError } from '../types/Errors.js';
import type { Selection, SkippedFile } from '../types/RunResult.js';
import type { SelectionFilters } from './Scope.js';
import {
  createExclusionMatchers,
  isDisabledFile,
  isExcluded,
  isIniFile,
  listDirectory,
  normalizePath,
} from './SelectorUtils.js';
import type { DirectoryListing, ExclusionMatcher } from './SelectorUtils.js';

/**
 * Collect candidate .ini files under `root`, depth-first and top-down.
 *
 * Throws EnumerationError when the root itself cannot be listed. Failures on
 * sub-directories are recorded in `diagnostics` and the walk goes on.
 */
export function selectFiles(rootDir: string, filters: SelectionFilters): Selection {
  const root = resolve(rootDir);
  const matchers = createExclusionMatchers(filters.excludePatterns);
  const selection: Selection = {
    root,
    files: [],
    skipped: [],
    includedDisabled: [],
    diagnostics: [],
  };

  let listing: DirectoryListing;
  try {
    listing = listDirectory(root);
  } catch (error) {
    throw new EnumerationError(root, toError(error));
  }

  visit(root, listing, filters, matchers, selection);
  return selection;
}

function visit(
  root: string,
  listing: DirectoryListing,
  filters: SelectionFilters,
  matchers: ExclusionMatcher[],
  selection: Selection
): void {
  selection.diagnostics.push(...listing.diagnostics);
  for (const file of listing.files) {
    const outcome = classify(root, file, filters, matchers);
    if (outcome === 'candidate') {
      selection.files.push(file);
    } else if (outcome === 'disabledCandidate') {
      selection.files.push(file);
      selection.includedDisabled.push(file);
    } else if (outcome) {
      selection.skipped.push(outcome);
    }
  }

  if (!filters.recursive) return;

  for (const child of listing.directories) {
    if (isExcluded(relativePath(root, child), matchers)) continue;
    let childListing: DirectoryListing;
    try {
      childListing = listDirectory(child);
    } catch (error) {
      selection.diagnostics.push(new EnumerationError(child, toError(error)).message);
      continue;
    }
    visit(root, childListing, filters, matchers, selection);
  }
}

function classify(
  root: string,
  file: string,
  filters: SelectionFilters,
  matchers: ExclusionMatcher[]
): SkippedFile | 'candidate' | 'disabledCandidate' | null {
  if (!isIniFile(file)) return null;
  if (isExcluded(relativePath(root, file), matchers)) {
    return { file, reason: 'excluded' };
  }
  if (isDisabledFile(file)) {
    return filters.processDisabled ? 'disabledCandidate' : { file, reason: 'disabled' };
  }
  return 'candidate';
}

export function relativePath(root: string, path: string): string {
  return normalizePath(relative(root, path));
}
