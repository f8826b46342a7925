/**
 * Executor Types
 * Interface for the LLM execution layer behind LLM-backed source tools
 */

// ============================================
// EXECUTOR INTERFACE
// ============================================

export interface IExecutor {
  execute(request: ExecutorRequest): Promise<ExecutorResponse>;

  /**
   * Check if executor is ready (credentials present)
   */
  isReady(): boolean;
}

// ============================================
// PROFILE
// ============================================

/**
 * Model, tool allowance and limits for one execution
 */
export interface ExecutorProfile {
  model: "haiku" | "sonnet" | "opus";
  maxTurns: number;
  tools: string[];
}

// ============================================
// REQUEST / RESPONSE
// ============================================

export interface ExecutorRequest {
  prompt: string;

  systemPrompt?: string;

  profile: ExecutorProfile;

  /** Aborts the underlying session */
  signal?: AbortSignal;
}

export interface ExecutorResponse {
  success: boolean;

  /** Raw output from the model */
  output: string;

  costUsd: number;

  durationMs: number;

  /** Assistant turns taken */
  turns: number;

  error?: {
    code: string;
    message: string;
    retryable: boolean;
  };
}

// ============================================
// EXECUTOR OPTIONS
// ============================================

export interface ExecutorOptions {
  /** Working directory for tools */
  cwd?: string;

  permissionMode?: "bypassPermissions" | "default";

  retries?: number;
  backoffMs?: number;
}
