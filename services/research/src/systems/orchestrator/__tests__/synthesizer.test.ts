import { describe, expect, it } from "vitest";
import { ValidationError } from "@fanout/core";
import { decideFormat, synthesize } from "../synthesizer/index.js";
import type { FindingRead } from "../store.js";
import type { Finding, Plan, TerminalStatus } from "../types.js";
import {
  makeFinding,
  makeItem,
  makePlan,
  makeSource,
  makeThread,
} from "../../../__tests__/helpers.js";

const DONE: TerminalStatus = { state: "done", durationMs: 1, partial: false };
const FAILED: TerminalStatus = { state: "failed", durationMs: 1, reason: "boom" };

function doneAll(plan: Plan): Map<string, TerminalStatus> {
  return new Map(plan.threads.map((t): [string, TerminalStatus] => [t.id, DONE]));
}

function reads(findings: Finding[]): Map<string, FindingRead> {
  return new Map(findings.map((f): [string, FindingRead] => [f.threadId, { status: "present", finding: f }]));
}

const alpha = makeThread("a", "Alpha");
const beta = makeThread("b", "Beta");
const gamma = makeThread("c", "Gamma");

const findingA = makeFinding("a", {
  findingsList: [makeItem("Alpha: what matters?", "Alpha is fast", ["https://a.example"])],
  sourcesConsulted: [makeSource("https://a.example", { sourceType: "official" })],
});
const findingB = makeFinding("b", {
  findingsList: [makeItem("Beta: what matters?", "Beta is small", ["https://b.example"])],
  sourcesConsulted: [makeSource("https://b.example")],
});

describe("synthesize", () => {
  it("renders a brief for a simple query whose threads all agree", () => {
    const plan = makePlan([alpha, beta]);

    const { output } = synthesize(plan, doneAll(plan), reads([findingA, findingB]));

    expect(output.format).toBe("brief");
    expect(output.lowConfidence).toBe(false);
    expect(output.conflicts).toBe(0);
    expect(output.missingThreads).toEqual([]);
    expect(output.body).toBe(
      [
        "## Bottom Line",
        "",
        "2 of 2 thread(s) reported 2 finding(s) from 2 source(s). Alpha is fast",
        "",
        "## Key Points",
        "",
        "- Alpha is fast [1] (Alpha)",
        "- Beta is small [2] (Beta)",
        "",
        "## Recommendations",
        "",
        "- No further research is needed for the questions asked.",
        "",
        "## Limitations",
        "",
        "- None recorded.",
        "",
        "## Key Sources",
        "",
        "1. [Page https://a.example](https://a.example) (official, via semantic-search)",
        "2. [Page https://b.example](https://b.example) (analysis, via semantic-search)",
        "",
      ].join("\n")
    );
  });

  it("keeps both sides of a conflict and flags them", () => {
    const threads = ["a", "b", "c", "d", "e", "f"].map((id) => makeThread(id, `Facet ${id}`));
    const plan = makePlan(threads, { queryType: "hybrid", complexity: "complex", formatHint: "report" });
    const findings = [
      makeFinding("a", {
        findingsList: [makeItem("Is it stable?", "It is stable", ["https://a.example"], "yes")],
        sourcesConsulted: [makeSource("https://a.example", { sourceType: "official" })],
      }),
      makeFinding("b", {
        findingsList: [makeItem("Is it stable?", "It is not stable", ["https://b.example"], "no")],
        sourcesConsulted: [makeSource("https://b.example", { sourceType: "forum" })],
      }),
      ...["c", "d", "e", "f"].map((id) => makeFinding(id)),
    ];

    const { output, conflicts } = synthesize(plan, doneAll(plan), reads(findings));

    expect(output.format).toBe("report");
    expect(output.conflicts).toBe(1);
    expect(conflicts[0].verdict).toEqual({ kind: "leans", position: "yes", authority: 5, runnerUp: 1 });

    const lines = output.body.split("\n");
    expect(lines).toContain('**Conflict on "Is it stable?"**');
    expect(lines).toContain('- Position "yes" (thread `a`, authority 5): It is stable [1]');
    expect(lines).toContain('- Position "no" (thread `b`, authority 1): It is not stable [2]');
    expect(lines).toContain('Leans toward "yes" (source authority 5 vs 1); all perspectives are kept.');
    expect(lines).toContain("- It is stable [1] (conflicting)");
    expect(lines).toContain("- It is not stable [2] (conflicting)");
    expect(lines[0]).toBe("# Research Report: test query");
  });

  it("leaves a conflict undecided when authority ties", () => {
    const plan = makePlan([alpha, beta]);
    const findings = [
      makeFinding("a", {
        findingsList: [makeItem("Which is faster?", "A wins", ["https://a.example"], "a")],
        sourcesConsulted: [makeSource("https://a.example")],
      }),
      makeFinding("b", {
        findingsList: [makeItem("which is faster", "B wins", ["https://b.example"], "b")],
        sourcesConsulted: [makeSource("https://b.example")],
      }),
    ];

    const { output } = synthesize(plan, doneAll(plan), reads(findings));

    expect(output.format).toBe("report");
    expect(output.body.split("\n")).toContain(
      "Undecided: the strongest sources share authority 2; all perspectives are kept."
    );
  });

  it("notes topics that several threads corroborate", () => {
    const plan = makePlan([alpha, beta], { complexity: "moderate", formatHint: "report" });
    const findings = [
      makeFinding("a", { findingsList: [makeItem("Licensing", "MIT licensed", [])] }),
      makeFinding("b", { findingsList: [makeItem("licensing", "Permissive license", [])] }),
    ];

    const { output } = synthesize(plan, doneAll(plan), reads(findings));

    expect(output.body.split("\n")).toContain('- "Licensing" is supported by 2 threads (`a`, `b`).');
  });

  it("proceeds with a partial finding and carries its gaps", () => {
    const plan = makePlan([alpha, beta, gamma, makeThread("d", "Delta")], { complexity: "moderate" });
    const partial = makeFinding("b", {
      partial: true,
      gaps: ['Capability semantic-search failed for "q" after 3 attempt(s): down'],
    });
    const statuses = doneAll(plan);
    statuses.set("b", { state: "done", durationMs: 1, partial: true });

    const { output } = synthesize(
      plan,
      statuses,
      reads([findingA, partial, makeFinding("c"), makeFinding("d")])
    );

    const lines = output.body.split("\n");
    expect(output.missingThreads).toEqual([]);
    expect(lines).toContain("- Thread `b` stopped early; its finding is partial.");
    expect(lines).toContain('- `b`: Capability semantic-search failed for "q" after 3 attempt(s): down');
  });

  it("reports only gaps when no finding is available", () => {
    const plan = makePlan([alpha, beta]);
    const statuses = new Map<string, TerminalStatus>([
      ["a", FAILED],
      ["b", { state: "timed_out", durationMs: 100, afterMs: 100 }],
    ]);

    const { output } = synthesize(plan, statuses, new Map());

    expect(output).toEqual({
      format: "report",
      body: [
        "## Gaps",
        "",
        '- No findings were available when the barrier closed; nothing can be reported for "test query".',
        "- Missing findings for thread `a` (Alpha): failed: boom",
        "- Missing findings for thread `b` (Beta): timed out after 100 ms",
        "",
      ].join("\n"),
      lowConfidence: true,
      conflicts: 0,
      missingThreads: ["a", "b"],
    });
  });

  it("names every missing thread in the output", () => {
    const plan = makePlan([alpha, beta, gamma]);
    const statuses = doneAll(plan);
    statuses.set("c", FAILED);

    const { output } = synthesize(plan, statuses, reads([findingA, findingB]));

    expect(output.format).toBe("report");
    expect(output.missingThreads).toEqual(["c"]);
    expect(output.lowConfidence).toBe(false);
    expect(output.body.split("\n")).toContain("- Missing findings for thread `c` (Gamma): failed: boom");
  });

  it("marks low confidence when half the threads are missing", () => {
    const plan = makePlan([alpha, beta]);
    const statuses = doneAll(plan);
    statuses.set("b", FAILED);

    const { output } = synthesize(plan, statuses, reads([findingA]));

    expect(output.lowConfidence).toBe(true);
  });

  it("describes a finding that could not be read", () => {
    const plan = makePlan([alpha, beta]);
    const findings: Map<string, FindingRead> = reads([findingA]);
    findings.set("b", { status: "invalid", reason: "Required" });

    const { output } = synthesize(plan, doneAll(plan), findings);

    expect(output.body.split("\n")).toContain(
      "- Missing findings for thread `b` (Beta): finished but its finding is unreadable: Required"
    );
  });

  it("renders identical inputs identically", () => {
    const plan = makePlan([alpha, beta]);

    const first = synthesize(plan, doneAll(plan), reads([findingA, findingB]));
    const second = synthesize(plan, doneAll(plan), reads([findingA, findingB]));

    expect(second.output).toEqual(first.output);
  });

  it("refuses to run before every thread is terminal", () => {
    const plan = makePlan([alpha, beta]);

    expect(() => synthesize(plan, new Map<string, TerminalStatus>([["a", DONE]]), reads([findingA]))).toThrow(ValidationError);
    expect(() => synthesize(plan, new Map<string, TerminalStatus>([["a", DONE]]), reads([findingA]))).toThrow(
      "Barrier not reached: no terminal status for b"
    );
  });
});

describe("decideFormat", () => {
  it("picks the brief only for simple, complete, conflict-free runs", () => {
    expect(decideFormat("simple", false, true)).toBe("brief");
    expect(decideFormat("simple", true, true)).toBe("report");
    expect(decideFormat("simple", false, false)).toBe("report");
    expect(decideFormat("moderate", false, true)).toBe("report");
    expect(decideFormat("complex", false, true)).toBe("report");
  });
});
