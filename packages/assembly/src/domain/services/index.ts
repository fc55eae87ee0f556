export {
  compilePartRules,
  resolvePartOutput,
  resolveStageDefault,
  type ResolvedPartOutput,
  type UnmatchedRule,
} from './part-output-resolver.js';
export {
  mergePartOutputs,
  type ConflictPolicy,
  type ConflictRecord,
  type FileProvenance,
  type MergeOptions,
  type MergeResult,
} from './tree-merger.js';
export { linkApps, type LinkedApp, type LinkOptions } from './app-linker.js';
export {
  DEFAULT_SAVE_SUFFIXES,
  parseEnvironmentReferences,
  validateAppEnvironment,
  validateDaemonPolicy,
  type EnvironmentContractOptions,
  type LinkedEnvironmentEntry,
} from './environment-contract.js';
export { ancestorPaths, normaliseRelativePath } from './relative-path.js';
