export { ResearchWorker, runWorker, WORKER_NAME, WORKER_VERSION } from "./worker.js";
export type { WorkerDependencies, WorkerOptions, WorkerSettings } from "./worker.js";
export { dispatch } from "./dispatcher.js";
export type { DispatchOptions, LaunchWorker, WorkUnit } from "./dispatcher.js";
export { withRetry, backoffDelay } from "./retry.js";
export type { RetryPolicy, RetryOutcome } from "./retry.js";
export {
  EvidenceLedger,
  assess,
  collectItems,
  collectSources,
  composeFinding,
  decideNext,
  deepeningQueries,
} from "./evidence.js";
export type { Assessment, CollectedResult, NextStep, PendingQuery } from "./evidence.js";
