/**
 * Dispatcher
 * Fans a plan out to one worker per thread and joins them at the barrier
 *
 * Every worker gets its own abort controller and deadline. A worker that
 * throws or runs out of time only changes its own status; a StorageError is
 * the one failure that stops the whole dispatch.
 */

import { ValidationError, errorMessage, isStorageError } from "@fanout/core";
import type { IObservability } from "../../../shared/observability/types.js";
import type { TerminalStatus, ThreadSpec, WorkerOutcome } from "../types.js";

// ============================================
// TYPES
// ============================================

export interface WorkUnit {
  thread: ThreadSpec;
  signal: AbortSignal;
}

/**
 * Starts one worker; the dispatcher owns its signal
 */
export type LaunchWorker = (unit: WorkUnit) => Promise<WorkerOutcome>;

export interface DispatchOptions {
  runId: string;
  launch: LaunchWorker;
  workerTimeoutMs: number;
  observability: IObservability;
}

// ============================================
// DISPATCH
// ============================================

export async function dispatch(
  threads: readonly ThreadSpec[],
  options: DispatchOptions
): Promise<Map<string, TerminalStatus>> {
  const { runId, observability } = options;

  const ids = new Set(threads.map((t) => t.id));
  if (ids.size !== threads.length) {
    throw new ValidationError("Thread ids must be unique before dispatch", {
      field: "threads",
      context: { runId, threads: threads.map((t) => t.id) },
    });
  }

  observability.log("info", `[Dispatcher] Launching ${threads.length} workers`, { runId });

  const controllers = threads.map(() => new AbortController());
  const abortAll = (reason: string) => {
    for (const controller of controllers) {
      if (!controller.signal.aborted) controller.abort(new Error(reason));
    }
  };

  const settled = await Promise.all(
    threads.map((thread, i) => superviseWorker(thread, controllers[i], options)),
  ).catch((error: unknown) => {
    abortAll(`dispatch halted: ${errorMessage(error)}`);
    throw error;
  });

  const statuses = new Map<string, TerminalStatus>();
  threads.forEach((thread, i) => statuses.set(thread.id, settled[i]));
  return statuses;
}

/**
 * Resolve to the worker's terminal status; reject only with a StorageError
 */
function superviseWorker(
  thread: ThreadSpec,
  controller: AbortController,
  options: DispatchOptions
): Promise<TerminalStatus> {
  const { runId, observability, workerTimeoutMs } = options;
  const startTime = Date.now();
  const elapsed = () => Date.now() - startTime;

  return new Promise<TerminalStatus>((resolve, reject) => {
    let settled = false;

    const finish = async (status: TerminalStatus) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      await report(thread, status, options);
      resolve(status);
    };

    const timer = setTimeout(() => {
      controller.abort(new Error(`deadline of ${workerTimeoutMs}ms passed`));
      void finish({ state: "timed_out", durationMs: elapsed(), afterMs: workerTimeoutMs }).catch(reject);
    }, workerTimeoutMs);

    void observability
      .recordEvent({
        type: "worker.started",
        correlationId: runId,
        threadId: thread.id,
        data: { focus: thread.focus, capability: thread.primaryCapability },
      })
      .then(() => options.launch({ thread, signal: controller.signal }))
      .then(
        (outcome) =>
          outcome.status === "written"
            ? finish({ state: "done", durationMs: elapsed(), partial: outcome.finding.partial })
            : finish({ state: "failed", durationMs: elapsed(), reason: "aborted before writing a finding" }),
        (error: unknown) => {
          if (settled) {
            // The barrier already moved on (deadline); only note it
            observability.log("warn", `[Dispatcher] Late failure ignored`, {
              runId,
              threadId: thread.id,
              error: errorMessage(error),
            });
            return;
          }
          if (isStorageError(error)) {
            settled = true;
            clearTimeout(timer);
            reject(error);
            return;
          }
          return finish({ state: "failed", durationMs: elapsed(), reason: errorMessage(error) });
        }
      )
      .catch(reject);
  });
}

async function report(
  thread: ThreadSpec,
  status: TerminalStatus,
  options: DispatchOptions
): Promise<void> {
  const { runId, observability } = options;

  observability.metric("worker.duration_ms", status.durationMs, {
    threadId: thread.id,
    state: status.state,
  });

  switch (status.state) {
    case "done":
      await observability.recordEvent({
        type: "worker.completed",
        correlationId: runId,
        threadId: thread.id,
        level: "info",
        data: { durationMs: status.durationMs, partial: status.partial },
      });
      break;
    case "failed":
      await observability.recordEvent({
        type: "worker.failed",
        correlationId: runId,
        threadId: thread.id,
        level: "warn",
        data: { durationMs: status.durationMs, reason: status.reason },
      });
      break;
    case "timed_out":
      await observability.recordEvent({
        type: "worker.timed_out",
        correlationId: runId,
        threadId: thread.id,
        level: "warn",
        data: { afterMs: status.afterMs },
      });
      break;
  }
}
