/**
 * Plan Builder
 * Decomposes a classified query into exactly workerCount independent threads
 *
 * Threads come from two pools, in this order:
 * 1. Required facets: subjects the query names explicitly ("A vs B",
 *    "A or B", "between A and B", "A, B and C")
 * 2. Fill facets: research angles for the query type
 *
 * Required facets that do not fit are folded into kept threads rather than
 * dropped; the plan records the overflow.
 */

import { z } from "zod";
import { ValidationError } from "@fanout/core";
import { readJsonFile } from "../../../shared/json.js";
import { fillTemplate, listPhrase, slugify, unique } from "../../../shared/text.js";
import { selectCapability, type RoutingTable } from "../../../tools/routing.js";
import { PlanSchema } from "../schema.js";
import type { Classification, Plan, PlanOverflow, QueryType, ThreadSpec } from "../types.js";

// ============================================
// ANGLE CATALOG
// ============================================

const AngleSchema = z.object({
  focus: z.string().min(1),
  questions: z.array(z.string().min(1)).min(1),
});

export const AngleCatalogSchema = z.object({
  /** Question templates for an explicit subject: {subject}, {others}, {context} */
  subject: z.array(z.string().min(1)).min(1),
  /** Six angles each, so any worker count can be filled */
  technical: z.array(AngleSchema).min(6),
  domain: z.array(AngleSchema).min(6),
});

export type AngleCatalog = z.infer<typeof AngleCatalogSchema>;
export type Angle = z.infer<typeof AngleSchema>;

const DEFAULT_ANGLES_URL = new URL("./angles.json", import.meta.url);

export function loadAngleCatalog(path?: string): AngleCatalog {
  return readJsonFile(path ?? DEFAULT_ANGLES_URL, AngleCatalogSchema);
}

let defaultCatalog: AngleCatalog | null = null;

function getDefaultCatalog(): AngleCatalog {
  if (!defaultCatalog) {
    defaultCatalog = loadAngleCatalog();
  }
  return defaultCatalog;
}

// ============================================
// FACET EXTRACTION
// ============================================

export interface QuerySubjects {
  /** Explicitly named subjects; empty unless at least two were found */
  subjects: string[];
  /** Trailing qualifier ("for large teams" → "large teams") */
  context: string;
}

const LEAD_IN =
  /^(?:(?:what|which|who|how|why|should|would|could|can|is|are|does|do|i|we|you|use|using|choose|pick|the|a|an|better|best|one|between|compare|comparing|tell|me|about)\s+)+/i;

const LEADING_CLAUSE = /^.*\b(?:of|about|between|among)\s+|^.*:\s*/i;

const CONTEXT_SPLIT = /\s+(?:for|when|in terms of|regarding)\s+(.+)$/i;

const MAX_SUBJECT_WORDS = 6;
const MAX_LIST_ITEM_WORDS = 4;

function cleanSubject(raw: string): string {
  return raw
    .trim()
    .replace(LEAD_IN, "")
    .replace(/^["'“]+|["'”]+$/g, "")
    .replace(/[?.!,;:]+$/, "")
    .trim();
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Split the query into its candidate subject parts, or null when it names none
 */
function splitSubjectParts(text: string): { parts: string[]; maxWords: number } | null {
  if (/\s(?:vs\.?|versus)\s/i.test(text)) {
    return { parts: text.split(/\s+(?:vs\.?|versus)\s+/i), maxWords: MAX_SUBJECT_WORDS };
  }

  const span = /\bbetween\s+(.+)$/i.exec(text) ?? /\bcompar(?:e|ing)\s+(.+)$/i.exec(text);
  if (span) {
    return {
      parts: span[1].split(/\s*,\s*(?:and\s+|or\s+)?|\s+(?:and|or|with|to)\s+/i),
      maxWords: MAX_SUBJECT_WORDS,
    };
  }

  if (text.includes(",") && /\s(?:and|or)\s[^,]+$/i.test(text)) {
    const parts = text.split(/\s*,\s*(?:and\s+|or\s+)?|\s+(?:and|or)\s+(?=[^,]*$)/i);
    return parts.length >= 3 ? { parts, maxWords: MAX_LIST_ITEM_WORDS } : null;
  }

  const pair = /^(.+?)\s+or\s+(.+)$/i.exec(text);
  if (pair) {
    return { parts: [pair[1], pair[2]], maxWords: MAX_LIST_ITEM_WORDS };
  }

  return null;
}

export function extractSubjects(query: string): QuerySubjects {
  const text = query.trim().replace(/\s+/g, " ").replace(/[?.!]+$/, "");
  const split = splitSubjectParts(text);
  if (!split) {
    return { subjects: [], context: "" };
  }

  const parts = [...split.parts];
  parts[0] = parts[0].replace(LEADING_CLAUSE, "");

  let context = "";
  const last = parts.length - 1;
  const qualifier = CONTEXT_SPLIT.exec(parts[last]);
  if (qualifier) {
    context = qualifier[1].trim();
    parts[last] = parts[last].slice(0, qualifier.index);
  }

  const seen = new Set<string>();
  const subjects: string[] = [];
  for (const part of parts) {
    const subject = cleanSubject(part);
    const key = subject.toLowerCase();
    if (!subject || seen.has(key)) continue;
    if (wordCount(subject) > split.maxWords) {
      // A long part is a clause, not a subject
      return { subjects: [], context: "" };
    }
    seen.add(key);
    subjects.push(subject);
  }

  return subjects.length >= 2 ? { subjects, context } : { subjects: [], context: "" };
}

// ============================================
// PLAN BUILDING
// ============================================

export interface BuildPlanOptions {
  runId: string;
  /** Defaults to now */
  createdAt?: string;
  angles?: AngleCatalog;
}

interface Facet {
  focus: string;
  questions: string[];
}

/**
 * Angles for a query type; hybrid interleaves technical and domain
 */
export function anglesFor(queryType: QueryType, catalog: AngleCatalog): Angle[] {
  if (queryType === "technical") return catalog.technical;
  if (queryType === "domain") return catalog.domain;

  const interleaved: Angle[] = [];
  const length = Math.max(catalog.technical.length, catalog.domain.length);
  for (let i = 0; i < length; i++) {
    if (i < catalog.technical.length) interleaved.push(catalog.technical[i]);
    if (i < catalog.domain.length) interleaved.push(catalog.domain[i]);
  }
  return interleaved;
}

function subjectFacets(found: QuerySubjects, catalog: AngleCatalog): Facet[] {
  return found.subjects.map((subject) => {
    const others = listPhrase(found.subjects.filter((s) => s !== subject));
    const values = {
      subject,
      others,
      context: found.context ? ` for ${found.context}` : "",
    };
    return {
      focus: subject,
      questions: catalog.subject.map((template) => fillTemplate(template, values)),
    };
  });
}

function angleFacets(topic: string, queryType: QueryType, catalog: AngleCatalog): Facet[] {
  return anglesFor(queryType, catalog).map((angle) => ({
    focus: angle.focus,
    questions: angle.questions.map((template) => fillTemplate(template, { topic })),
  }));
}

export function buildPlan(
  query: string,
  classification: Classification,
  routing: RoutingTable,
  options: BuildPlanOptions
): Plan {
  const catalog = options.angles ?? getDefaultCatalog();
  const count = classification.workerCount;
  const topic = query.trim().replace(/\s+/g, " ").replace(/[?.!]+$/, "");

  const found = extractSubjects(query);
  const required = subjectFacets(found, catalog);
  const kept = required.slice(0, count).map((f) => ({ ...f, questions: [...f.questions] }));
  const overflowing = required.slice(count);

  const fill = angleFacets(topic, classification.queryType, catalog);
  for (const facet of fill) {
    if (kept.length >= count) break;
    kept.push(facet);
  }

  // Round-robin so no kept thread absorbs more than its share
  overflowing.forEach((facet, i) => {
    kept[i % count].questions.push(...facet.questions);
  });

  const overflow: PlanOverflow | undefined =
    overflowing.length > 0
      ? {
          requested: required.length,
          kept: count,
          merged: overflowing.map((f) => f.focus),
        }
      : undefined;

  const threads: ThreadSpec[] = kept.map((facet, i) => ({
    id: `t${i + 1}-${slugify(facet.focus) || "thread"}`,
    focus: facet.focus,
    primaryCapability: selectCapability(routing, [facet.focus, ...facet.questions].join(" "))
      .capability,
    questions: unique(facet.questions),
  }));

  const parsed = PlanSchema.safeParse({
    runId: options.runId,
    query,
    createdAt: options.createdAt ?? new Date().toISOString(),
    classification,
    threads,
    overflow,
  });

  if (!parsed.success) {
    throw new ValidationError(`Plan failed validation: ${parsed.error.issues[0]?.message}`, {
      field: "threads",
      context: { runId: options.runId, issues: parsed.error.issues.map((i) => i.message) },
    });
  }

  return freezePlan(parsed.data);
}

/**
 * Plans are shared read-only by every worker and the synthesizer
 */
export function freezePlan(plan: Plan): Plan {
  for (const thread of plan.threads) {
    Object.freeze(thread.questions);
    Object.freeze(thread);
  }
  Object.freeze(plan.threads);
  Object.freeze(plan.classification.signals);
  Object.freeze(plan.classification);
  if (plan.overflow) Object.freeze(plan.overflow);
  return Object.freeze(plan);
}
