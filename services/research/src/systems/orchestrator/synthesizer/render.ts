/**
 * Final Output Rendering
 * Markdown bodies for the brief, the report, and the gaps-only fallback.
 * Output depends on nothing but the model, so equal inputs render equally.
 */

import { normalizeTopic, truncate, unique } from "../../../shared/text.js";
import type { FindingItem, SourceRef } from "../types.js";
import { AUTHORITY_RANK } from "./authority.js";
import type { ConflictAnalysis, MissingThread, SynthesisModel } from "./analysis.js";

const BRIEF_KEY_POINTS = 8;
const BRIEF_POINTS_PER_THREAD = 2;
const BRIEF_KEY_SOURCES = 5;
const MAX_FOLLOW_UPS = 3;

// ============================================
// SHARED PIECES
// ============================================

function section(title: string, lines: string[]): string {
  return [`## ${title}`, "", ...lines].join("\n");
}

function bullets(lines: readonly string[], empty: string): string[] {
  return lines.length > 0 ? lines.map((line) => `- ${line}`) : [`- ${empty}`];
}

function citations(item: FindingItem, model: SynthesisModel): string {
  const refs = unique(
    item.sources
      .map((url) => model.sourceIndex.get(url))
      .filter((n): n is number => n !== undefined)
  ).sort((a, b) => a - b);
  return refs.length > 0 ? ` ${refs.map((n) => `[${n}]`).join("")}` : "";
}

function sourceLine(source: SourceRef, n: number): string {
  const title = source.title.trim() || source.url;
  return `${n}. [${title}](${source.url}) (${source.sourceType}, via ${source.capability})`;
}

export function missingThreadLine(missing: MissingThread): string {
  return `Missing findings for thread \`${missing.thread.id}\` (${missing.thread.focus}): ${missing.description}`;
}

function limitationLines(model: SynthesisModel): string[] {
  const lines: string[] = model.missing.map(missingThreadLine);

  for (const { thread, finding } of model.present) {
    if (finding.partial) {
      lines.push(`Thread \`${thread.id}\` stopped early; its finding is partial.`);
    }
    for (const gap of finding.gaps) {
      lines.push(`\`${thread.id}\`: ${gap}`);
    }
  }

  return lines;
}

function recommendationLines(model: SynthesisModel): string[] {
  const lines: string[] = [];

  for (const conflict of model.conflicts) {
    lines.push(`Verify "${conflict.topic}" against primary sources before relying on either position.`);
  }
  for (const missing of model.missing) {
    lines.push(`Re-run research for ${missing.thread.focus} (thread \`${missing.thread.id}\`).`);
  }

  const followUps = unique(model.present.flatMap(({ finding }) => finding.suggestedFollowUps));
  for (const followUp of followUps.slice(0, MAX_FOLLOW_UPS)) {
    lines.push(`Follow up: ${followUp}`);
  }

  return lines;
}

function verdictLine(conflict: ConflictAnalysis): string {
  const { verdict } = conflict;
  if (verdict.kind === "leans") {
    return `Leans toward "${verdict.position}" (source authority ${verdict.authority} vs ${verdict.runnerUp}); all perspectives are kept.`;
  }
  return `Undecided: the strongest sources share authority ${verdict.authority}; all perspectives are kept.`;
}

function conflictBlock(conflict: ConflictAnalysis, model: SynthesisModel): string[] {
  const lines = [`**Conflict on "${conflict.topic}"**`, ""];
  for (const perspective of conflict.perspectives) {
    for (const { threadId, item } of perspective.claims) {
      lines.push(
        `- Position "${perspective.position}" (thread \`${threadId}\`, authority ${perspective.authority}): ${item.statement}${citations(item, model)}`
      );
    }
  }
  lines.push("", verdictLine(conflict));
  return lines;
}

function itemLine(item: FindingItem, model: SynthesisModel): string {
  const flag = model.conflictKeys.has(normalizeTopic(item.topic)) ? " (conflicting)" : "";
  return `${item.statement}${citations(item, model)}${flag}`;
}

// ============================================
// GAPS ONLY
// ============================================

export function renderGapsOnly(model: SynthesisModel): string {
  const lines = [
    `No findings were available when the barrier closed; nothing can be reported for "${model.plan.query}".`,
    ...model.missing.map(missingThreadLine),
  ];
  return section("Gaps", bullets(lines, "")) + "\n";
}

// ============================================
// BRIEF
// ============================================

export function renderBrief(model: SynthesisModel): string {
  const totalItems = model.present.reduce((n, p) => n + p.finding.findingsList.length, 0);
  const lead = model.present.find((p) => p.finding.findingsList.length > 0)?.finding.findingsList[0];

  const bottomLine = [
    `${model.present.length} of ${model.plan.threads.length} thread(s) reported ${totalItems} finding(s) from ${model.sources.length} source(s).`,
    lead ? truncate(lead.statement, 200) : "",
  ]
    .filter(Boolean)
    .join(" ");

  const keyPoints: string[] = [];
  for (const { thread, finding } of model.present) {
    for (const item of finding.findingsList.slice(0, BRIEF_POINTS_PER_THREAD)) {
      keyPoints.push(`${itemLine(item, model)} (${thread.focus})`);
    }
  }

  const keySources = model.sources
    .map((source, i) => ({ source, n: i + 1 }))
    .sort((a, b) => AUTHORITY_RANK[b.source.sourceType] - AUTHORITY_RANK[a.source.sourceType] || a.n - b.n)
    .slice(0, BRIEF_KEY_SOURCES)
    .map(({ source, n }) => sourceLine(source, n));

  return (
    [
      section("Bottom Line", [bottomLine]),
      section("Key Points", bullets(keyPoints.slice(0, BRIEF_KEY_POINTS), "No findings were recorded.")),
      section("Recommendations", bullets(recommendationLines(model), "No further research is needed for the questions asked.")),
      section("Limitations", bullets(limitationLines(model), "None recorded.")),
      section("Key Sources", keySources.length > 0 ? keySources : ["No sources were consulted."]),
    ].join("\n\n") + "\n"
  );
}

// ============================================
// REPORT
// ============================================

export function renderReport(model: SynthesisModel): string {
  const { plan } = model;
  const classification = plan.classification;
  const totalItems = model.present.reduce((n, p) => n + p.finding.findingsList.length, 0);

  const summary = [
    `${model.present.length} of ${plan.threads.length} research thread(s) reported ${totalItems} finding(s) from ${model.sources.length} source(s).`,
    model.conflicts.length > 0
      ? `${model.conflicts.length} conflicting topic(s) are flagged in the analysis.`
      : "No conflicting claims were detected.",
    model.missing.length > 0
      ? `${model.missing.length} thread(s) produced no finding; see Limitations and Gaps.`
      : "",
  ]
    .filter(Boolean)
    .join(" ");

  const leadPoints = model.present
    .filter(({ finding }) => finding.findingsList.length > 0)
    .map(({ thread, finding }) => `${thread.focus}: ${truncate(finding.findingsList[0].statement, 200)}`);

  const background = [
    `Query type: ${classification.queryType}; complexity: ${classification.complexity}; ${plan.threads.length} research thread(s).`,
    "",
    ...plan.threads.map(
      (thread) => `- \`${thread.id}\`: ${thread.focus} (primary capability: ${thread.primaryCapability})`
    ),
  ];

  const findingBlocks: string[] = [];
  for (const thread of plan.threads) {
    const present = model.present.find((p) => p.thread.id === thread.id);
    const missing = model.missing.find((m) => m.thread.id === thread.id);
    const lines = [`### ${thread.focus}`, ""];

    if (present) {
      lines.push(present.finding.summary, "");
      lines.push(
        ...bullets(
          present.finding.findingsList.map((item) => itemLine(item, model)),
          "No findings were recorded."
        )
      );
    } else if (missing) {
      lines.push(`No finding available (${missing.description}). See Limitations and Gaps.`);
    }
    findingBlocks.push(lines.join("\n"));
  }

  const conflictLines =
    model.conflicts.length > 0
      ? model.conflicts.flatMap((conflict, i) => [...(i > 0 ? [""] : []), ...conflictBlock(conflict, model)])
      : ["No conflicting claims were detected."];

  const corroborationLines = bullets(
    model.corroborations.map(
      (c) => `"${c.topic}" is supported by ${c.threadIds.length} threads (${c.threadIds.map((id) => `\`${id}\``).join(", ")}).`
    ),
    "No topic was covered by more than one thread."
  );

  const analysis = ["### Conflicts", "", ...conflictLines, "", "### Corroboration", "", ...corroborationLines];

  return (
    [
      `# Research Report: ${plan.query}`,
      section("Executive Summary", [summary, ...(leadPoints.length > 0 ? ["", ...bullets(leadPoints, "")] : [])]),
      section("Background", background),
      section("Findings", [findingBlocks.join("\n\n")]),
      section("Analysis", analysis),
      section("Recommendations", bullets(recommendationLines(model), "No further research is needed for the questions asked.")),
      section("Limitations and Gaps", bullets(limitationLines(model), "None recorded.")),
      section(
        "Sources",
        model.sources.length > 0
          ? model.sources.map((source, i) => sourceLine(source, i + 1))
          : ["No sources were consulted."]
      ),
    ].join("\n\n") + "\n"
  );
}
