export {
  createOutputTree,
  type ContentHandle,
  type OutputTree,
  type StagedFile,
} from './output-tree.js';
export { comparePaths, MergedTree, type MergedEntry } from './merged-tree.js';
