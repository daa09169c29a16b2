export { FaceFixRunner, summarize } from './FaceFixRunner.js';
export type { RunParams, RunnerOptions } from './FaceFixRunner.js';
export type { FixerConfig, ResolvedFixerConfig, ColorMode } from './FixerConfig.js';
export {
  FixerConfigDefaults,
  loadFixerConfig,
  parseFixerConfig,
  resolveFixerConfig,
  defaultWorkers,
  isColorMode,
} from './FixerConfig.js';
export { mapWithConcurrency } from './Concurrency.js';
