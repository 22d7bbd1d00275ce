/**
 * Pipeline module exports
 */

export { PipelineController, type PipelineContext, type ControllerOptions } from './controller.js';
export { JobWorker, type JobOutcome, type WorkerDependencies } from './worker.js';
export { withRetry, backoffDelay, retryBudget, type RetryPolicy, type RetryHooks } from './retry.js';
