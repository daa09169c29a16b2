export type { SelectionFilters } from './Scope.js';
export { BACKUP_EXCLUSION, DISABLED_MARKER } from './Scope.js';
export { selectFiles, relativePath } from './FileSelector.js';
export {
  createExclusionMatchers,
  isDisabledFile,
  isExcluded,
  hasDisabledMarker,
} from './SelectorUtils.js';
export type { ExclusionMatcher } from './SelectorUtils.js';
