/**
 * Synthesizer
 * Barrier-gated aggregation of a run's findings into one final output
 */

import { ValidationError } from "@fanout/core";
import type { FindingRead } from "../store.js";
import type { FinalOutput, Plan, TerminalStatus } from "../types.js";
import { analyze, type ConflictAnalysis, type MissingThread } from "./analysis.js";
import { decideFormat } from "./format.js";
import { renderBrief, renderGapsOnly, renderReport } from "./render.js";

export interface SynthesisResult {
  output: FinalOutput;
  conflicts: ConflictAnalysis[];
  missing: MissingThread[];
}

/**
 * @param statuses one terminal status per plan thread; synthesis refuses to
 *   start while any thread is unaccounted for
 * @param findings what the store returned per thread
 */
export function synthesize(
  plan: Plan,
  statuses: ReadonlyMap<string, TerminalStatus>,
  findings: ReadonlyMap<string, FindingRead>
): SynthesisResult {
  const pending = plan.threads.filter((t) => !statuses.has(t.id)).map((t) => t.id);
  if (pending.length > 0) {
    throw new ValidationError(`Barrier not reached: no terminal status for ${pending.join(", ")}`, {
      field: "statuses",
      context: { runId: plan.runId, pending },
    });
  }

  const model = analyze(plan, statuses, findings);
  const missingThreads = model.missing.map((m) => m.thread.id);

  if (model.present.length === 0) {
    return {
      output: {
        format: "report",
        body: renderGapsOnly(model),
        lowConfidence: true,
        conflicts: 0,
        missingThreads,
      },
      conflicts: [],
      missing: model.missing,
    };
  }

  const format = decideFormat(
    plan.classification.complexity,
    model.conflicts.length > 0,
    model.missing.length === 0
  );

  return {
    output: {
      format,
      body: format === "brief" ? renderBrief(model) : renderReport(model),
      // Half the threads or more missing
      lowConfidence: model.missing.length * 2 >= plan.threads.length,
      conflicts: model.conflicts.length,
      missingThreads,
    },
    conflicts: model.conflicts,
    missing: model.missing,
  };
}
