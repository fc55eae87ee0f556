export {
  escapeMarkdown,
  formatCount,
  formatDurationMs,
  formatUnknownError,
  serialiseError,
  writeJson,
  writeLine,
} from './formatting.js';

export type { WritableTarget } from './formatting.js';
