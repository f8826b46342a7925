/**
 * Configuration Management
 * Loads and validates configuration from environment variables
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const baseEnvSchema = z.object({
  // Anthropic (only the Claude-backed source tools need it)
  ANTHROPIC_API_KEY: z.string().min(1).optional(),

  // General
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOG_FORMAT: z.enum(["pretty", "json"]).default("pretty"),
  DATA_DIR: z.string().min(1).default("./data"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Research run bounds
  RESEARCH_MAX_DEEPENING_ROUNDS: z.coerce.number().int().min(0).max(10).default(3),
  RESEARCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RESEARCH_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
  RESEARCH_WORKER_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  RESEARCH_MIN_SOURCES: z.coerce.number().int().min(1).default(3),

  // Injected tables (JSON files); bundled defaults when unset
  RESEARCH_ROUTING_PATH: z.string().min(1).optional(),
  RESEARCH_LEXICON_PATH: z.string().min(1).optional(),
});

export type BaseEnv = z.infer<typeof baseEnvSchema>;

export interface ResearchSettings {
  /** Deepening rounds a worker may spend before it must finalize */
  maxDeepeningRounds: number;
  /** Attempts per capability call, first one included */
  maxAttempts: number;
  backoffMs: number;
  /** Per-worker deadline; the barrier stops waiting after it */
  workerTimeoutMs: number;
  /** Unique sources a thread needs before it counts as comprehensive */
  minSources: number;
  routingPath?: string;
  lexiconPath?: string;
}

export interface BaseConfig {
  anthropic?: {
    apiKey: string;
  };

  env: {
    logLevel: z.infer<typeof baseEnvSchema>["LOG_LEVEL"];
    logFormat: "pretty" | "json";
    dataDir: string;
    nodeEnv: "development" | "production" | "test";
  };

  research: ResearchSettings;
}

let baseConfigInstance: BaseConfig | null = null;

/**
 * Load and validate base configuration
 */
export function loadBaseConfig(source: NodeJS.ProcessEnv = process.env): BaseConfig {
  const parseResult = baseEnvSchema.safeParse(source);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${errors}`, {
      fields: parseResult.error.issues.map((e) => e.path.join(".")),
    });
  }

  const env = parseResult.data;

  return {
    anthropic: env.ANTHROPIC_API_KEY
      ? { apiKey: env.ANTHROPIC_API_KEY }
      : undefined,

    env: {
      logLevel: env.LOG_LEVEL,
      logFormat: env.LOG_FORMAT,
      dataDir: env.DATA_DIR,
      nodeEnv: env.NODE_ENV,
    },

    research: {
      maxDeepeningRounds: env.RESEARCH_MAX_DEEPENING_ROUNDS,
      maxAttempts: env.RESEARCH_MAX_ATTEMPTS,
      backoffMs: env.RESEARCH_BACKOFF_MS,
      workerTimeoutMs: env.RESEARCH_WORKER_TIMEOUT_MS,
      minSources: env.RESEARCH_MIN_SOURCES,
      routingPath: env.RESEARCH_ROUTING_PATH,
      lexiconPath: env.RESEARCH_LEXICON_PATH,
    },
  };
}

/**
 * Get base configuration (lazy-loaded singleton)
 */
export function getBaseConfig(): BaseConfig {
  if (!baseConfigInstance) {
    baseConfigInstance = loadBaseConfig();
  }
  return baseConfigInstance;
}

/**
 * Reset config (for testing)
 */
export function resetBaseConfig(): void {
  baseConfigInstance = null;
}
