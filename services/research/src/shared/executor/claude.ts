/**
 * Claude Executor
 * Implementation using the Claude Agent SDK
 */

import { setTimeout as sleep } from "timers/promises";
import { query, type Options } from "@anthropic-ai/claude-agent-sdk";
import { errorMessage, isRetryableError } from "@fanout/core";
import type {
  IExecutor,
  ExecutorRequest,
  ExecutorResponse,
  ExecutorOptions,
  ExecutorProfile,
} from "./types.js";

export class ClaudeExecutor implements IExecutor {
  private readonly options: Required<ExecutorOptions>;

  constructor(options: ExecutorOptions = {}) {
    this.options = {
      cwd: options.cwd ?? process.cwd(),
      permissionMode: options.permissionMode ?? "bypassPermissions",
      retries: options.retries ?? 2,
      backoffMs: options.backoffMs ?? 1000,
    };
  }

  isReady(): boolean {
    return Boolean(process.env.ANTHROPIC_API_KEY);
  }

  async execute(request: ExecutorRequest): Promise<ExecutorResponse> {
    const startTime = Date.now();
    let lastError: unknown;
    let attempt = 0;

    while (attempt < this.options.retries) {
      attempt++;

      try {
        return await this.executeOnce(request, startTime);
      } catch (error) {
        lastError = error;

        if (request.signal?.aborted || !isRetryableError(error) || attempt >= this.options.retries) {
          break;
        }

        // Exponential backoff
        const delay = this.options.backoffMs * Math.pow(2, attempt - 1);
        try {
          await sleep(delay, undefined, { signal: request.signal });
        } catch (sleepError) {
          if (request.signal?.aborted) {
            return failure(startTime, "EXECUTOR_ABORTED", "Aborted during backoff", false);
          }
          throw sleepError;
        }
      }
    }

    return failure(
      startTime,
      "EXECUTOR_ERROR",
      lastError === undefined ? "Unknown error" : errorMessage(lastError),
      !request.signal?.aborted && isRetryableError(lastError)
    );
  }

  /**
   * One SDK session; throws on transport errors and unsuccessful results
   */
  protected async executeOnce(
    request: ExecutorRequest,
    startTime: number
  ): Promise<ExecutorResponse> {
    const { prompt, systemPrompt, profile, signal } = request;
    const abortController = linkedController(signal);

    const options: Options = {
      systemPrompt,
      model: profile.model,
      allowedTools: profile.tools,
      maxTurns: profile.maxTurns,
      permissionMode: this.options.permissionMode,
      cwd: this.options.cwd,
      abortController,
    };

    let output = "";
    let costUsd = 0;
    let durationMs = 0;
    let turns = 0;

    for await (const message of query({ prompt, options })) {
      if (message.type === "assistant") {
        for (const block of message.message.content) {
          if (block.type === "text") {
            output += block.text;
          }
        }
        turns++;
      } else if (message.type === "result") {
        if (message.subtype === "success") {
          costUsd = message.total_cost_usd;
          durationMs = message.duration_ms;

          if (!output && message.result) {
            output = message.result;
          }
        } else {
          throw new Error(`Claude session ended with ${message.subtype} after ${turns} turns`);
        }
      }
    }

    return {
      success: true,
      output,
      costUsd,
      durationMs: durationMs || Date.now() - startTime,
      turns,
    };
  }
}

function failure(
  startTime: number,
  code: string,
  message: string,
  retryable: boolean
): ExecutorResponse {
  return {
    success: false,
    output: "",
    costUsd: 0,
    durationMs: Date.now() - startTime,
    turns: 0,
    error: { code, message, retryable },
  };
}

/**
 * Controller that aborts when the caller's signal does
 */
function linkedController(signal?: AbortSignal): AbortController {
  const controller = new AbortController();
  if (signal) {
    if (signal.aborted) {
      controller.abort(signal.reason);
    } else {
      signal.addEventListener("abort", () => controller.abort(signal.reason), { once: true });
    }
  }
  return controller;
}

export function createClaudeExecutor(options?: ExecutorOptions): IExecutor {
  return new ClaudeExecutor(options);
}

export const WEB_RESEARCH_PROFILE: ExecutorProfile = {
  model: "sonnet",
  maxTurns: 8,
  tools: ["WebSearch", "WebFetch"],
};
