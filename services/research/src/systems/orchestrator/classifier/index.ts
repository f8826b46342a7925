export {
  classifyQuery,
  complexityForScore,
  workerCountFor,
  loadLexicon,
  LexiconSchema,
  WORKER_TIERS,
  type Lexicon,
} from "./classifier.js";
