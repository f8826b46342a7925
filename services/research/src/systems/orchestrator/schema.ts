/**
 * Run Artifact Schemas
 * Zod schemas for everything a run persists: plan, findings, final output
 */

import { z } from "zod";
import { SourceTypeSchema } from "../../tools/types.js";

export const MIN_WORKERS = 2;
export const MAX_WORKERS = 6;

// ============================================
// CLASSIFICATION
// ============================================

export const QueryTypeSchema = z.enum(["technical", "domain", "hybrid"]);
export const ComplexitySchema = z.enum(["simple", "moderate", "complex"]);
export const OutputFormatSchema = z.enum(["brief", "report"]);

export const ClassificationSchema = z.object({
  queryType: QueryTypeSchema,
  complexity: ComplexitySchema,
  workerCount: z.number().int().min(MIN_WORKERS).max(MAX_WORKERS),
  formatHint: OutputFormatSchema,
  signals: z.object({
    technical: z.array(z.string()),
    domain: z.array(z.string()),
    scope: z.array(z.string()),
    score: z.number().int().min(0),
  }),
});

// ============================================
// PLAN
// ============================================

/**
 * Strict: a thread has no field through which it could depend on another
 */
export const ThreadSpecSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, "id must be a lowercase slug"),
    focus: z.string().min(1),
    primaryCapability: z.string().min(1),
    questions: z.array(z.string().min(1)).min(1),
  })
  .strict();

export const PlanOverflowSchema = z.object({
  /** Facets the query asked for */
  requested: z.number().int(),
  /** Threads actually created */
  kept: z.number().int(),
  /** Facets whose questions were folded into kept threads */
  merged: z.array(z.string()),
});

export const PlanSchema = z
  .object({
    runId: z.string().min(1),
    query: z.string().min(1),
    createdAt: z.string(),
    classification: ClassificationSchema,
    threads: z.array(ThreadSpecSchema).min(MIN_WORKERS).max(MAX_WORKERS),
    overflow: PlanOverflowSchema.optional(),
  })
  .superRefine((plan, ctx) => {
    if (plan.threads.length !== plan.classification.workerCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["threads"],
        message: `Plan has ${plan.threads.length} threads but workerCount is ${plan.classification.workerCount}`,
      });
    }
    const ids = new Set(plan.threads.map((t) => t.id));
    if (ids.size !== plan.threads.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["threads"],
        message: "Thread ids must be unique",
      });
    }
  });

// ============================================
// FINDING
// ============================================

export const FindingItemSchema = z.object({
  /** Sub-question the statement addresses */
  topic: z.string().min(1),
  statement: z.string().min(1),
  /** Normalized answer; only positioned items take part in conflict detection */
  position: z.string().optional(),
  /** URLs backing the statement */
  sources: z.array(z.string()),
});

export const SourceRefSchema = z.object({
  url: z.string(),
  title: z.string(),
  sourceType: SourceTypeSchema,
  capability: z.string(),
});

export const FindingSchema = z.object({
  threadId: z.string().min(1),
  summary: z.string(),
  findingsList: z.array(FindingItemSchema),
  sourcesConsulted: z.array(SourceRefSchema),
  gaps: z.array(z.string()),
  suggestedFollowUps: z.array(z.string()),
  /** True when the worker stopped early after a capability failure */
  partial: z.boolean(),
  /** Deepening rounds spent */
  iterations: z.number().int().min(0),
  capabilitiesUsed: z.array(z.string()),
  completedAt: z.string(),
});

// ============================================
// FINAL OUTPUT
// ============================================

export const FinalOutputSchema = z.object({
  format: OutputFormatSchema,
  body: z.string(),
  lowConfidence: z.boolean(),
  conflicts: z.number().int().min(0),
  missingThreads: z.array(z.string()),
});

export type QueryType = z.infer<typeof QueryTypeSchema>;
export type Complexity = z.infer<typeof ComplexitySchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type Classification = z.infer<typeof ClassificationSchema>;
export type ThreadSpec = z.infer<typeof ThreadSpecSchema>;
export type PlanOverflow = z.infer<typeof PlanOverflowSchema>;
export type Plan = z.infer<typeof PlanSchema>;
export type FindingItem = z.infer<typeof FindingItemSchema>;
export type SourceRef = z.infer<typeof SourceRefSchema>;
export type Finding = z.infer<typeof FindingSchema>;
export type FinalOutput = z.infer<typeof FinalOutputSchema>;
