/**
 * Query Classifier
 * Pure mapping from a raw query to a frozen Classification
 *
 * Score contributions:
 *   comparison marker present      +2
 *   each multi-facet marker        +3 (at most +6)
 *   hybrid query type              +2
 *   ≥3 / ≥5 distinct concept hits  +1 / +2
 *   several questions or clauses   +1
 *   >25 / >40 words                +1 / +2
 *
 * Tiers: score < 2 simple, < 6 moderate, otherwise complex.
 */

import { z } from "zod";
import { ClassificationError } from "@fanout/core";
import { readJsonFile } from "../../../shared/json.js";
import { matchTerms, normalizeText, tokenize } from "../../../shared/text.js";
import type { Classification, Complexity, QueryType } from "../types.js";

export const LexiconSchema = z.object({
  technical: z.array(z.string().min(1)).min(1),
  domain: z.array(z.string().min(1)).min(1),
  comparison: z.array(z.string().min(1)),
  multiFacet: z.array(z.string().min(1)),
});

export type Lexicon = z.infer<typeof LexiconSchema>;

const DEFAULT_LEXICON_URL = new URL("./lexicon.json", import.meta.url);

export function loadLexicon(path?: string): Lexicon {
  return readJsonFile(path ?? DEFAULT_LEXICON_URL, LexiconSchema);
}

let defaultLexicon: Lexicon | null = null;

function getDefaultLexicon(): Lexicon {
  if (!defaultLexicon) {
    defaultLexicon = loadLexicon();
  }
  return defaultLexicon;
}

/**
 * Worker range per tier and the score at which the upper bound is taken
 */
export const WORKER_TIERS: Record<Complexity, { min: number; max: number; upperAt: number }> = {
  simple: { min: 2, max: 3, upperAt: 1 },
  moderate: { min: 3, max: 4, upperAt: 4 },
  complex: { min: 5, max: 6, upperAt: 9 },
};

export function complexityForScore(score: number): Complexity {
  if (score >= 6) return "complex";
  if (score >= 2) return "moderate";
  return "simple";
}

/**
 * Lower bound unless the score clears the tier's upper threshold
 */
export function workerCountFor(complexity: Complexity, score: number): number {
  const tier = WORKER_TIERS[complexity];
  return score >= tier.upperAt ? tier.max : tier.min;
}

function detectQueryType(technical: string[], domain: string[]): QueryType {
  if (technical.length > 0 && domain.length > 0) return "hybrid";
  if (technical.length > 0) return "technical";
  // Neither signal: treat as general domain research
  return "domain";
}

function countClauses(query: string): number {
  const questions = (query.match(/\?/g) ?? []).length;
  const separators = (query.match(/;/g) ?? []).length;
  return Math.max(questions, 1) + separators;
}

export function classifyQuery(query: string, lexicon: Lexicon = getDefaultLexicon()): Readonly<Classification> {
  if (query.trim().length === 0) {
    throw new ClassificationError("Query is empty", query);
  }

  const words = tokenize(query);
  if (words.length === 0) {
    throw new ClassificationError("Query contains no words to classify", query);
  }

  const normalized = normalizeText(query);
  const technical = matchTerms(normalized, lexicon.technical);
  const domain = matchTerms(normalized, lexicon.domain);
  const comparison = matchTerms(normalized, lexicon.comparison);
  const multiFacet = matchTerms(normalized, lexicon.multiFacet);

  const queryType = detectQueryType(technical, domain);

  const scope: string[] = [];
  let score = 0;

  if (comparison.length > 0) {
    score += 2;
    scope.push(`comparison:${comparison.join(",")}`);
  }

  if (multiFacet.length > 0) {
    score += Math.min(multiFacet.length * 3, 6);
    scope.push(`multi-facet:${multiFacet.join(",")}`);
  }

  if (queryType === "hybrid") {
    score += 2;
    scope.push("hybrid");
  }

  const concepts = new Set([...technical, ...domain]).size;
  if (concepts >= 5) {
    score += 2;
    scope.push(`concepts:${concepts}`);
  } else if (concepts >= 3) {
    score += 1;
    scope.push(`concepts:${concepts}`);
  }

  if (countClauses(query) > 1) {
    score += 1;
    scope.push("clauses");
  }

  if (words.length > 40) {
    score += 2;
    scope.push(`length:${words.length}`);
  } else if (words.length > 25) {
    score += 1;
    scope.push(`length:${words.length}`);
  }

  const complexity = complexityForScore(score);

  return Object.freeze({
    queryType,
    complexity,
    workerCount: workerCountFor(complexity, score),
    formatHint: complexity === "simple" ? "brief" : "report",
    signals: Object.freeze({
      technical,
      domain,
      scope,
      score,
    }),
  });
}
