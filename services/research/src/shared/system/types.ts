/**
 * System Types
 * Core interfaces for orchestrating systems
 */

// ============================================
// SYSTEM INTERFACE
// ============================================

/**
 * Base system interface. A system coordinates internal roles to turn one
 * input into one output.
 */
export interface ISystem<TInput = unknown, TOutput = unknown> {
  readonly name: string;

  /** System version for tracking changes */
  readonly version: string;

  run(input: TInput, context?: SystemContext): Promise<TOutput>;

  /** Get system info including internal roles */
  getInfo(): SystemInfo;
}

// ============================================
// CONTEXT
// ============================================

export interface SystemContext {
  /** Correlation ID for tracing; research runs use it as the run id */
  correlationId?: string;

  /** User/initiator identifier */
  initiatedBy?: string;

  limits?: SystemLimits;

  metadata?: Record<string, unknown>;
}

export interface SystemLimits {
  /** Maximum duration per worker in milliseconds */
  maxDurationMs?: number;
}

// ============================================
// SYSTEM INFO
// ============================================

export type SystemRole =
  | "classifier"
  | "planner"
  | "dispatcher"
  | "worker"
  | "synthesizer";

export interface SystemInfo {
  name: string;
  version: string;
  description?: string;

  /** Internal roles this system runs */
  roles: SystemRoleRef[];

  /** Capabilities the system can route threads to */
  capabilities: string[];
}

export interface SystemRoleRef {
  name: string;
  role: SystemRole;

  /** How many instances run per invocation */
  instances: string;
}
