/**
 * @fanout/research
 * Command-line host for the research orchestrator
 *
 * Usage:
 *   npm run research -- "<query>"
 *   npm run research -- --list
 *   npm run research -- --show <runId>
 */

import { ConfigError, getBaseConfig, logger } from "@fanout/core";
import { createClaudeExecutor } from "./shared/executor/claude.js";
import { createConsoleObservability } from "./shared/observability/console.js";
import { createFileStore } from "./shared/store/file.js";
import type { IStore } from "./shared/store/types.js";
import { CapabilityRegistry } from "./tools/registry.js";
import { loadRoutingTable, routedCapabilities } from "./tools/routing.js";
import { createClaudeSearchTools } from "./tools/claude.js";
import { createResearchSystem } from "./systems/orchestrator/system.js";
import { listRuns, loadRun } from "./systems/orchestrator/store.js";

async function listCommand(store: IStore): Promise<void> {
  const runs = await listRuns(store);
  if (runs.length === 0) {
    console.log("No runs recorded.");
    return;
  }
  for (const runId of runs) {
    console.log(runId);
  }
}

async function showCommand(store: IStore, runId: string): Promise<void> {
  const run = await loadRun(store, runId);
  if (!run) {
    throw new ConfigError(`Run not found: ${runId}`, { runId });
  }

  console.log(`Query: ${run.plan.query}`);
  for (const thread of run.plan.threads) {
    console.log(`  ${thread.id}: ${run.findings.get(thread.id)?.status ?? "absent"}`);
  }
  console.log();
  console.log(run.finalOutput?.body ?? "(no final output)");
}

async function researchCommand(store: IStore, query: string): Promise<void> {
  const config = getBaseConfig();

  if (!config.anthropic) {
    throw new ConfigError("ANTHROPIC_API_KEY is required to run research", {
      name: "ANTHROPIC_API_KEY",
    });
  }

  const routing = loadRoutingTable(config.research.routingPath);
  const executor = createClaudeExecutor();
  const registry = new CapabilityRegistry(createClaudeSearchTools(routedCapabilities(routing), executor));

  const system = createResearchSystem(
    {
      registry,
      store,
      observability: createConsoleObservability({ logLevel: config.env.logLevel }),
    },
    { settings: config.research, routing }
  );

  console.log("System Info:", system.getInfo());
  console.log();

  const result = await system.run({ query }, { initiatedBy: "cli" });

  console.log("=".repeat(60));
  console.log(`RUN ${result.runId} (${result.output.format}${result.output.lowConfidence ? ", low confidence" : ""})`);
  console.log("=".repeat(60));
  for (const condition of result.conditions) {
    console.log(`! ${condition.kind}`);
  }
  console.log(`Output: ${result.artifacts.finalOutput}`);
  console.log();
  console.log(result.output.body);
}

async function main(): Promise<void> {
  const config = getBaseConfig();
  logger.setLevel(config.env.logLevel);
  logger.setFormat(config.env.logFormat);

  const store = createFileStore(config.env.dataDir);
  const [first, second] = process.argv.slice(2);

  if (first === "--list") {
    await listCommand(store);
  } else if (first === "--show" && second) {
    await showCommand(store, second);
  } else if (first && !first.startsWith("--")) {
    await researchCommand(store, process.argv.slice(2).join(" "));
  } else {
    console.error('Usage: npm run research -- "<query>" | --list | --show <runId>');
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error("Fatal error", error);
  process.exit(1);
});
