/**
 * Claude Search Tool
 * A source capability served by a Claude session with web tools
 */

import { CapabilityError, errorMessage, logger } from "@fanout/core";
import type { ExecutorProfile, IExecutor } from "../shared/executor/types.js";
import { WEB_RESEARCH_PROFILE } from "../shared/executor/claude.js";
import { ResultSetSchema, type ResultSet, type SearchOptions, type SourceTool } from "./types.js";

/**
 * How each capability steers the session's searching
 */
const CAPABILITY_INSTRUCTIONS: Record<string, string> = {
  "semantic-search":
    "Search the web broadly for explanations, analyses and opinions that answer the query.",
  "code-context":
    "Prefer official documentation, API references, source repositories and issue trackers.",
  transcript:
    "Look for conference talks, video tutorials, podcasts and their transcripts; cite the recording's page.",
  "live-search":
    "Focus on the most recent reporting and announcements; include publication dates.",
  fetch:
    "Fetch the URL(s) named in the query with WebFetch and report what they state.",
};

const SYSTEM_PROMPT = `You are a retrieval backend for a research orchestrator.
You never write prose answers. You search, read, and report results as JSON only.`;

function buildPrompt(capability: string, query: string): string {
  const instruction =
    CAPABILITY_INSTRUCTIONS[capability] ?? CAPABILITY_INSTRUCTIONS["semantic-search"];

  return `## Query

${query}

## How to search

${instruction}

## Output

Reply with a single JSON object and nothing else:

{
  "results": [
    {
      "title": "page title",
      "url": "https://…",
      "snippet": "one or two sentences the page actually says",
      "sourceType": "official | academic | data | code | news | analysis | video | forum | social | other",
      "publishedAt": "YYYY-MM-DD or null",
      "claims": [
        { "topic": "the sub-question this answers", "assertion": "what the source asserts", "position": "short answer, e.g. yes / no / a version / a number" }
      ]
    }
  ],
  "suggestions": ["related query worth running next"]
}

Return at most 6 results. Use the same topic wording for claims about the same sub-question.`;
}

/**
 * Pull the outermost JSON object out of model text
 */
export function extractJsonObject(raw: string): unknown {
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start < 0 || end <= start) {
    throw new Error("No JSON object in output");
  }
  return JSON.parse(raw.slice(start, end + 1));
}

export class ClaudeSearchTool implements SourceTool {
  private readonly profile: ExecutorProfile;

  constructor(
    readonly capability: string,
    private readonly executor: IExecutor,
    profile?: Partial<ExecutorProfile>
  ) {
    this.profile = { ...WEB_RESEARCH_PROFILE, ...profile };
  }

  async search(query: string, options: SearchOptions = {}): Promise<ResultSet> {
    const response = await this.executor.execute({
      prompt: buildPrompt(this.capability, query),
      systemPrompt: SYSTEM_PROMPT,
      profile: this.profile,
      signal: options.signal,
    });

    logger.metric("capability.cost_usd", response.costUsd, {
      capability: this.capability,
      turns: response.turns,
      durationMs: response.durationMs,
    });

    if (!response.success) {
      throw new CapabilityError(
        response.error?.message ?? "Execution failed",
        this.capability,
        { retryable: response.error?.retryable ?? false, context: { query } }
      );
    }

    let parsed: unknown;
    try {
      parsed = extractJsonObject(response.output);
    } catch (error) {
      // Malformed output is usually a one-off; let the worker try again
      throw new CapabilityError(`Unparseable backend output: ${errorMessage(error)}`, this.capability, {
        retryable: true,
        context: { query, output: response.output.slice(0, 200) },
      });
    }

    const result = ResultSetSchema.safeParse({
      ...(typeof parsed === "object" && parsed !== null ? parsed : {}),
      query,
      capability: this.capability,
    });

    if (!result.success) {
      throw new CapabilityError(
        `Backend output does not match the result schema: ${result.error.issues[0]?.message ?? "invalid"}`,
        this.capability,
        { retryable: true, context: { query } }
      );
    }

    return result.data;
  }
}

export function createClaudeSearchTools(
  capabilities: readonly string[],
  executor: IExecutor,
  profile?: Partial<ExecutorProfile>
): SourceTool[] {
  return capabilities.map((capability) => new ClaudeSearchTool(capability, executor, profile));
}
