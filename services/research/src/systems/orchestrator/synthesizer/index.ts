export { synthesize, type SynthesisResult } from "./synthesizer.js";
export { decideFormat } from "./format.js";
export { AUTHORITY_RANK, authorityOf } from "./authority.js";
export {
  analyze,
  decideVerdict,
  describeStatus,
  type ConflictAnalysis,
  type Corroboration,
  type MissingThread,
  type Perspective,
  type PresentThread,
  type SynthesisModel,
  type Verdict,
} from "./analysis.js";
export { renderBrief, renderReport, renderGapsOnly, missingThreadLine } from "./render.js";
