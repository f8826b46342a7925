/**
 * Research Orchestrator
 * Public surface of @fanout/research
 */

export {
  ResearchSystem,
  createResearchSystem,
  DEFAULT_RESEARCH_SETTINGS,
  SYSTEM_NAME,
  SYSTEM_VERSION,
  type ResearchDependencies,
  type ResearchSystemOptions,
} from "./system.js";

export * from "./types.js";
export {
  PlanSchema,
  FindingSchema,
  FinalOutputSchema,
  ClassificationSchema,
  ThreadSpecSchema,
  MIN_WORKERS,
  MAX_WORKERS,
} from "./schema.js";

export { classifyQuery, loadLexicon, type Lexicon } from "./classifier/index.js";
export { buildPlan, extractSubjects, loadAngleCatalog, type AngleCatalog } from "./planner/index.js";
export { dispatch, runWorker, ResearchWorker } from "./harness/index.js";
export { synthesize, decideFormat, AUTHORITY_RANK, type SynthesisResult } from "./synthesizer/index.js";
export { RunStore, runKeys, listRuns, loadRun, type FindingRead, type RunSnapshot } from "./store.js";

export * from "../../tools/index.js";
export * from "../../shared/index.js";
