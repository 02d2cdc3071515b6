/**
 * @eac-fisheye/batch
 *
 * Directory-level orchestration: input discovery, bounded worker pool,
 * retry policy, cancellation and the aggregate report.
 */

export { WorkerPool } from './workerPool.js';

export {
  BatchScheduler,
  DEFAULT_INPUT_EXTENSIONS,
  discoverInputFiles,
  deriveDestinationPath,
  runBatch,
  type BatchOptions,
  type BatchDependencies,
  type JobRunner,
  type JobStartEvent,
  type JobCompleteEvent,
  type RetryPolicy,
} from './scheduler.js';

export {
  buildBatchReport,
  summarizeReport,
  type BatchReport,
  type BatchReportInput,
  type BatchStatus,
  type BatchSummary,
  type FailedJobSummary,
} from './report.js';
