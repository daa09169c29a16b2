export interface SelectionFilters {
  /** Walk sub-directories as well as the root */
  recursive: boolean;
  /** Keep files that are marked as disabled */
  processDisabled: boolean;
  /** Folder names or globs to leave out, matched against relative paths */
  excludePatterns: string[];
}

/** Always-active pattern that keeps earlier backups out of a run */
export const BACKUP_EXCLUSION = '*_backup.bak';

/** Content marker of a disabled mod file */
export const DISABLED_MARKER = 'DISABLED';

export const INI_EXTENSION = 'ini';
