export type { LineMatch } from './Match.js';

export {
  FaceFixError,
  FileReadError,
  FileWriteError,
  EnumerationError,
  ConfigError,
  toError,
} from './Errors.js';

export type {
  FileStatus,
  FileResult,
  SkipReason,
  SkippedFile,
  Selection,
  RunPlan,
  RunSummary,
  RunPhase,
  RunProgress,
} from './RunResult.js';
