import { mkdtemp } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { ClassificationError, StorageError, resetBaseConfig } from "@fanout/core";
import { MemoryStore } from "../../../shared/store/memory.js";
import { createFileStore } from "../../../shared/store/file.js";
import { CapabilityRegistry } from "../../../tools/registry.js";
import { loadRoutingTable, routedCapabilities } from "../../../tools/routing.js";
import { createResearchSystem } from "../system.js";
import { loadRun } from "../store.js";
import {
  ScriptedTool,
  echoHandler,
  recordingObservability,
  waitForAbort,
  type SearchHandler,
} from "../../../__tests__/helpers.js";

const routing = loadRoutingTable();
const SETTINGS = { maxDeepeningRounds: 2, maxAttempts: 2, backoffMs: 0, minSources: 1 };

function registryWith(handler: (capability: string) => SearchHandler): CapabilityRegistry {
  return new CapabilityRegistry(
    routedCapabilities(routing).map((capability) => new ScriptedTool(capability, handler(capability)))
  );
}

class FindingRejectingStore extends MemoryStore {
  async write<T>(key: string, data: T): Promise<void> {
    if (key.includes("/finding-")) {
      throw new Error("disk full");
    }
    return super.write(key, data);
  }
}

class SlowFindingStore extends MemoryStore {
  async write<T>(key: string, data: T): Promise<void> {
    if (key.includes("/finding-")) {
      await new Promise((resolve) => setTimeout(resolve, 80));
    }
    return super.write(key, data);
  }
}

function setup(handler: (capability: string) => SearchHandler, store = new MemoryStore()) {
  const { observability, events } = recordingObservability();
  const system = createResearchSystem(
    { registry: registryWith(handler), store, observability },
    { settings: SETTINGS, routing, now: () => new Date("2026-03-01T12:00:00.000Z") }
  );
  return { system, store, events };
}

describe("ResearchSystem", () => {
  it("answers a simple technical query with a brief", async () => {
    const { system, store, events } = setup(echoHandler);

    const result = await system.run({ query: "What is a Rust trait?", runId: "r1" });

    expect(result.classification).toMatchObject({ queryType: "technical", complexity: "simple", workerCount: 2 });
    expect(result.output.format).toBe("brief");
    expect(result.output.lowConfidence).toBe(false);
    expect(result.output.body.startsWith("## Bottom Line\n\n2 of 2 thread(s) reported")).toBe(true);
    expect(result.conditions).toEqual([]);
    expect(result.artifacts).toEqual({
      plan: "memory://run-r1/plan",
      findings: {
        "t1-architecture-and-design": "memory://run-r1/finding-t1-architecture-and-design",
        "t2-implementation-and-apis": "memory://run-r1/finding-t2-implementation-and-apis",
      },
      finalOutput: "memory://run-r1/final-output",
    });

    const milestones = events
      .map((e) => e.type)
      .filter((type) => type.startsWith("system.") || type.endsWith(".written"));
    expect(milestones).toEqual([
      "system.started",
      "plan.written",
      "finding.written",
      "finding.written",
      "output.written",
      "system.completed",
    ]);

    const stored = await loadRun(store, "r1");
    expect(stored?.finalOutput).toEqual(result.output);
  });

  it("plans and completes a comparison of non-ASCII subjects", async () => {
    const { system } = setup(echoHandler);

    const result = await system.run({ query: "Café vs Thé", runId: "r6" });

    expect(result.plan.threads.slice(0, 2).map((t) => t.id)).toEqual(["t1-cafe", "t2-the"]);
    expect(result.output.missingThreads).toEqual([]);
    expect(result.artifacts.findings["t1-cafe"]).toBe("memory://run-r6/finding-t1-cafe");
  });

  it("still synthesizes when one worker exhausts its retries", async () => {
    const failing = "What are the core strengths of Vue for large dashboards?";
    const { system } = setup((capability) => (query, options) => {
      if (query === failing) throw new Error("backend down");
      return echoHandler(capability)(query, options);
    });

    const result = await system.run({ query: "React vs Vue for large dashboards", runId: "r2" });

    const vue = result.plan.threads[1];
    expect(vue.id).toBe("t2-vue");
    expect(result.plan.threads).toHaveLength(4);
    expect(result.statuses.get("t2-vue")).toMatchObject({ state: "done", partial: true });
    expect(result.conditions).toEqual([
      { kind: "worker_failure", threadId: "t2-vue", reason: "partial finding after a capability failure" },
    ]);
    expect(result.output.format).toBe("report");
    expect(result.output.missingThreads).toEqual([]);
    expect(result.output.body.split("\n")).toContain(
      `- \`t2-vue\`: Capability ${vue.primaryCapability} failed for "${failing}" after 2 attempt(s): backend down`
    );
  });

  it("reports only gaps when every worker times out", async () => {
    const { system } = setup(() => (_query, options) => waitForAbort(options.signal));

    const result = await system.run(
      { query: "What is a Rust trait?" },
      { correlationId: "r3", limits: { maxDurationMs: 30 } }
    );

    expect(result.runId).toBe("r3");
    expect(result.output.format).toBe("report");
    expect(result.output.lowConfidence).toBe(true);
    expect(result.output.body.startsWith("## Gaps\n")).toBe(true);
    expect(result.conditions).toEqual([
      { kind: "worker_failure", threadId: "t1-architecture-and-design", reason: "timed out after 30 ms" },
      { kind: "worker_failure", threadId: "t2-implementation-and-apis", reason: "timed out after 30 ms" },
      { kind: "synthesis_gap", missingThreads: ["t1-architecture-and-design", "t2-implementation-and-apis"] },
    ]);
    expect(result.artifacts.findings).toEqual({});
  });

  it("settles findings already being written before it writes the final output", async () => {
    const { system, store, events } = setup(echoHandler, new SlowFindingStore());

    const result = await system.run(
      { query: "What is a Rust trait?", runId: "r7" },
      { limits: { maxDurationMs: 40 } }
    );

    expect([...result.statuses.values()].map((s) => s.state)).toEqual(["timed_out", "timed_out"]);
    expect(events.map((e) => e.type).filter((type) => type.endsWith(".written"))).toEqual([
      "plan.written",
      "finding.written",
      "finding.written",
      "output.written",
    ]);
    expect(result.output.missingThreads).toEqual([]);
    expect(await store.list("run-r7/finding-")).toHaveLength(2);
  });

  it("halts on a storage failure without writing a final output", async () => {
    const { system, store, events } = setup(echoHandler, new FindingRejectingStore());

    const error = await system.run({ query: "What is a Rust trait?", runId: "r4" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({ reason: "io" });
    expect(await store.exists("run-r4/final-output")).toBe(false);
    const types = events.map((e) => e.type);
    expect(types).toContain("system.failed");
    expect(types).not.toContain("output.written");
  });

  it("rejects an empty query before any artifact is written", async () => {
    const { system, store } = setup(echoHandler);

    await expect(system.run({ query: "   ", runId: "r5" })).rejects.toBeInstanceOf(ClassificationError);
    expect(await store.list()).toEqual([]);
  });

  it("describes its roles and the capabilities it can serve", () => {
    const system = createResearchSystem(
      {
        registry: new CapabilityRegistry([
          new ScriptedTool("fetch", echoHandler("fetch")),
          new ScriptedTool("semantic-search", echoHandler("semantic-search")),
        ]),
        store: new MemoryStore(),
        observability: recordingObservability().observability,
      },
      { routing }
    );

    const info = system.getInfo();

    expect(info.name).toBe("research");
    expect(info.roles.map((r) => r.role)).toEqual(["classifier", "planner", "dispatcher", "worker", "synthesizer"]);
    expect(info.capabilities).toEqual(["semantic-search", "fetch"]);
  });

  describe("without an injected store", () => {
    const dataDir = process.env.DATA_DIR;

    afterEach(() => {
      if (dataDir === undefined) {
        delete process.env.DATA_DIR;
      } else {
        process.env.DATA_DIR = dataDir;
      }
      resetBaseConfig();
    });

    it("writes the run under the configured data directory", async () => {
      const dir = await mkdtemp(path.join(tmpdir(), "fanout-data-"));
      process.env.DATA_DIR = dir;
      resetBaseConfig();

      const { observability } = recordingObservability();
      const system = createResearchSystem(
        { registry: registryWith(echoHandler), observability },
        { settings: SETTINGS, routing }
      );

      const result = await system.run({ query: "What is a Rust trait?", runId: "r8" });

      expect(result.artifacts.plan).toBe(path.join(dir, "run-r8/plan.json"));
      expect(await createFileStore(dir).list("run-r8/")).toEqual([
        "run-r8/final-output",
        "run-r8/finding-t1-architecture-and-design",
        "run-r8/finding-t2-implementation-and-apis",
        "run-r8/plan",
      ]);
    });
  });
});
