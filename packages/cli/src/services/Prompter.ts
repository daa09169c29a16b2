import inquirer from 'inquirer';

export interface SessionSettings {
  processDisabled: boolean;
  recursive: boolean;
  makeBackup: boolean;
}

/**
 * Questions the CLI asks the user
 */
export interface Prompter {
  askSettings(defaults: SessionSettings): Promise<SessionSettings>;
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
  /** Folder names to exclude; an empty answer ends the list */
  askExclusions(): Promise<string[]>;
}

export class InquirerPrompter implements Prompter {
  async askSettings(defaults: SessionSettings): Promise<SessionSettings> {
    return inquirer.prompt<SessionSettings>([
      {
        type: 'confirm',
        name: 'processDisabled',
        message: 'Process disabled files?',
        default: defaults.processDisabled,
      },
      {
        type: 'confirm',
        name: 'recursive',
        message: 'Scan subfolders?',
        default: defaults.recursive,
      },
      {
        type: 'confirm',
        name: 'makeBackup',
        message: 'Create backups before modifying?',
        default: defaults.makeBackup,
      },
    ]);
  }

  async confirm(message: string, defaultValue = false): Promise<boolean> {
    const { ok } = await inquirer.prompt<{ ok: boolean }>([
      { type: 'confirm', name: 'ok', message, default: defaultValue },
    ]);
    return ok;
  }

  async askExclusions(): Promise<string[]> {
    const folders: string[] = [];
    for (;;) {
      const { folder } = await inquirer.prompt<{ folder: string }>([
        { type: 'input', name: 'folder', message: 'Folder to exclude (ENTER to continue):' },
      ]);
      const trimmed = folder.trim();
      if (!trimmed) return folders;
      folders.push(trimmed);
    }
  }
}
