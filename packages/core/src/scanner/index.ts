/**
 * Scanner module exports
 */

export { ScanOrchestrator, summarize } from './scan-orchestrator.js';
export type {
  BatchReport,
  BatchSummary,
  PipelineStage,
  RunOptions,
  ScanOrchestratorOptions,
  SkipReason,
  TargetOutcome,
  TargetState,
} from './scan-orchestrator.js';
export { WorkerPool } from './worker-pool.js';
export type { WorkerPoolOptions, WorkerPoolStats, WorkerPoolEvents, TaskResult, TaskStatus, TaskProcessor, BatchOptions } from './worker-pool.js';
export { withRetry, computeRetryDelayMs, sleep } from './retry.js';
export type { RetryOptions } from './retry.js';
export { planTrackTargets } from './track-planner.js';
export type { TrackPlan, TrackPlanOptions } from './track-planner.js';
