import { describe, expect, it } from "vitest";
import { ClaudeExecutor, WEB_RESEARCH_PROFILE } from "../executor/claude.js";
import type { ExecutorRequest, ExecutorResponse } from "../executor/types.js";

/**
 * Executor whose sessions fail with a retryable error until it runs out of them
 */
class FlakyExecutor extends ClaudeExecutor {
  attempts = 0;

  constructor(
    private readonly failures: number,
    backoffMs: number
  ) {
    super({ retries: 3, backoffMs });
  }

  protected async executeOnce(_request: ExecutorRequest, startTime: number): Promise<ExecutorResponse> {
    this.attempts++;
    if (this.attempts <= this.failures) {
      throw new Error("rate limit exceeded");
    }
    return { success: true, output: "{}", costUsd: 0.1, durationMs: Date.now() - startTime, turns: 2 };
  }
}

function request(signal?: AbortSignal): ExecutorRequest {
  return { prompt: "q", profile: WEB_RESEARCH_PROFILE, signal };
}

describe("ClaudeExecutor", () => {
  it("retries retryable failures with backoff", async () => {
    const executor = new FlakyExecutor(2, 1);

    const response = await executor.execute(request());

    expect(executor.attempts).toBe(3);
    expect(response).toMatchObject({ success: true, output: "{}", turns: 2 });
  });

  it("reports the last error once retries run out", async () => {
    const executor = new FlakyExecutor(5, 1);

    const response = await executor.execute(request());

    expect(executor.attempts).toBe(3);
    expect(response.success).toBe(false);
    expect(response.error).toEqual({
      code: "EXECUTOR_ERROR",
      message: "rate limit exceeded",
      retryable: true,
    });
  });

  it("stops waiting between attempts when the caller aborts", async () => {
    const executor = new FlakyExecutor(5, 60_000);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const started = Date.now();
    const response = await executor.execute(request(controller.signal));

    expect(Date.now() - started).toBeLessThan(5_000);
    expect(executor.attempts).toBe(1);
    expect(response.success).toBe(false);
    expect(response.error).toEqual({
      code: "EXECUTOR_ABORTED",
      message: "Aborted during backoff",
      retryable: false,
    });
  });
});
