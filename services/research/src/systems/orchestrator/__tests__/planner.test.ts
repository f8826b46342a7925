import { describe, expect, it } from "vitest";
import { loadRoutingTable } from "../../../tools/routing.js";
import { classifyQuery } from "../classifier/index.js";
import { anglesFor, buildPlan, extractSubjects, loadAngleCatalog } from "../planner/index.js";
import { makeClassification } from "../../../__tests__/helpers.js";

const routing = loadRoutingTable();

describe("extractSubjects", () => {
  it("splits a versus comparison and keeps the trailing qualifier as context", () => {
    expect(extractSubjects("React vs Vue for large dashboards")).toEqual({
      subjects: ["React", "Vue"],
      context: "large dashboards",
    });
  });

  it("strips the question lead-in from an either-or pair", () => {
    expect(extractSubjects("Should I use Postgres or MySQL?")).toEqual({
      subjects: ["Postgres", "MySQL"],
      context: "",
    });
  });

  it("reads the subjects of a compare request", () => {
    expect(extractSubjects("Compare PostgreSQL, MySQL and SQLite for embedded analytics")).toEqual({
      subjects: ["PostgreSQL", "MySQL", "SQLite"],
      context: "embedded analytics",
    });
  });

  it("reads an enumeration", () => {
    expect(extractSubjects("Redis, Memcached, Hazelcast and Aerospike").subjects).toEqual([
      "Redis",
      "Memcached",
      "Hazelcast",
      "Aerospike",
    ]);
  });

  it("finds no subjects in an open question", () => {
    expect(extractSubjects("How does garbage collection work in Go")).toEqual({
      subjects: [],
      context: "",
    });
  });
});

describe("buildPlan", () => {
  it("fills a simple technical plan from the technical angles", () => {
    const query = "What is a Rust trait?";
    const plan = buildPlan(query, classifyQuery(query), routing, {
      runId: "r1",
      createdAt: "2026-01-01T00:00:00.000Z",
    });

    expect(plan.threads.map((t) => t.id)).toEqual([
      "t1-architecture-and-design",
      "t2-implementation-and-apis",
    ]);
    expect(plan.threads[1].questions).toEqual([
      "What is a Rust trait: what does a typical implementation look like?",
      "What is a Rust trait: which APIs or libraries are central?",
    ]);
    expect(plan.threads.map((t) => t.primaryCapability)).toEqual(["semantic-search", "code-context"]);
    expect(plan.overflow).toBeUndefined();
  });

  it("puts named subjects first, then interleaved hybrid angles", () => {
    const query = "React vs Vue for large dashboards";
    const plan = buildPlan(query, classifyQuery(query), routing, { runId: "r1" });

    expect(plan.threads.map((t) => t.id)).toEqual([
      "t1-react",
      "t2-vue",
      "t3-architecture-and-design",
      "t4-background-and-definitions",
    ]);
    expect(plan.threads[0].questions).toEqual([
      "What are the core strengths of React for large dashboards?",
      "What are the main limitations and trade-offs of React compared with Vue?",
      "How mature is React in adoption, community and long-term support?",
    ]);
  });

  it("builds ASCII ids for subjects written in other scripts", () => {
    for (const [query, expected] of [
      ["Café vs Thé", ["t1-cafe", "t2-the"]],
      ["寿司 vs 拉面", ["t1-thread", "t2-thread"]],
    ] as const) {
      const plan = buildPlan(query, classifyQuery(query), routing, { runId: "r1" });

      expect(plan.threads.slice(0, 2).map((t) => t.id)).toEqual(expected);
      expect(plan.threads.slice(0, 2).map((t) => t.focus)).toEqual(query.split(" vs "));
    }
  });

  it("always has workerCount threads with distinct ids", () => {
    const queries = [
      "What is a Rust trait?",
      "React vs Vue for large dashboards",
      "Comprehensive landscape of vector database adoption across the healthcare industry",
      "Tell me about tea ceremonies",
    ];

    for (const query of queries) {
      const classification = classifyQuery(query);
      const plan = buildPlan(query, classification, routing, { runId: "r1" });

      expect(plan.threads).toHaveLength(classification.workerCount);
      expect(new Set(plan.threads.map((t) => t.id)).size).toBe(plan.threads.length);
    }
  });

  it("folds overflowing subjects into kept threads and records it", () => {
    const plan = buildPlan(
      "Redis, Memcached, Hazelcast and Aerospike",
      makeClassification({ workerCount: 2 }),
      routing,
      { runId: "r1" }
    );

    expect(plan.threads.map((t) => t.focus)).toEqual(["Redis", "Memcached"]);
    expect(plan.threads[0].questions).toHaveLength(6);
    expect(plan.threads[0].questions).toContain("What are the core strengths of Hazelcast?");
    expect(plan.threads[1].questions).toContain("What are the core strengths of Aerospike?");
    expect(plan.threads[0].questions[1]).toBe(
      "What are the main limitations and trade-offs of Redis compared with Memcached, Hazelcast and Aerospike?"
    );
    expect(plan.overflow).toEqual({ requested: 4, kept: 2, merged: ["Hazelcast", "Aerospike"] });
  });

  it("freezes the plan", () => {
    const query = "What is a Rust trait?";
    const plan = buildPlan(query, classifyQuery(query), routing, { runId: "r1" });

    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.threads)).toBe(true);
    expect(Object.isFrozen(plan.threads[0])).toBe(true);
  });
});

describe("anglesFor", () => {
  it("interleaves technical and domain angles for hybrid queries", () => {
    const catalog = loadAngleCatalog();

    expect(anglesFor("hybrid", catalog).slice(0, 4).map((a) => a.focus)).toEqual([
      "Architecture and design",
      "Background and definitions",
      "Implementation and APIs",
      "Current state and trends",
    ]);
  });
});
