export { detectParallelism } from './detect.js';
export {
  normaliseConcurrency,
  runTaskQueue,
  type TaskDefinition,
  type TaskQueueMetrics,
  type TaskQueueOptions,
  type TaskQueueOutcome,
  type TaskResult,
} from './queue.js';
