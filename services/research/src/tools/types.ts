/**
 * Source Tool Types
 * The collaborator boundary: every retrieval backend is a capability
 * exposing one search call
 */

import { z } from "zod";

// ============================================
// RESULT SCHEMAS
// ============================================

export const SourceTypeSchema = z.enum([
  "official",
  "academic",
  "data",
  "code",
  "news",
  "analysis",
  "video",
  "forum",
  "social",
  "other",
]);

export type SourceType = z.infer<typeof SourceTypeSchema>;

/**
 * A structured assertion a backend extracted from a result. Two claims on
 * the same topic with different positions are mutually exclusive.
 */
export const ResultClaimSchema = z.object({
  topic: z.string().min(1),
  assertion: z.string().min(1),
  position: z.string().min(1).optional(),
});

export const SearchResultSchema = z.object({
  title: z.string(),
  url: z.string().min(1),
  snippet: z.string(),
  sourceType: SourceTypeSchema.catch("other"),
  publishedAt: z.string().nullable().optional(),
  claims: z.array(ResultClaimSchema).optional(),
});

export const ResultSetSchema = z.object({
  query: z.string(),
  capability: z.string(),
  results: z.array(SearchResultSchema),
  /** Related queries the backend thinks are worth running */
  suggestions: z.array(z.string()).optional(),
});

export type ResultClaim = z.infer<typeof ResultClaimSchema>;
export type SearchResult = z.infer<typeof SearchResultSchema>;
export type ResultSet = z.infer<typeof ResultSetSchema>;

// ============================================
// TOOL INTERFACE
// ============================================

export interface SearchOptions {
  /** Aborted when the calling worker's deadline fires */
  signal?: AbortSignal;
}

/**
 * A retrieval backend. Retry and backoff of the backend's own transport are
 * the tool's concern; callers only call and await.
 */
export interface SourceTool {
  readonly capability: string;
  search(query: string, options?: SearchOptions): Promise<ResultSet>;
}
