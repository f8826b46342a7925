/**
 * Observability Types
 * Interface for logging, session tracking, events and metrics
 */

import type { LogLevel } from "@fanout/core";

export type { LogLevel };

// ============================================
// OBSERVABILITY INTERFACE
// ============================================

export interface IObservability {
  /**
   * Start tracking a unit of work (a run, a worker)
   */
  startSession(params: StartSessionParams): Promise<string>;

  endSession(sessionId: string, result: SessionResult): Promise<void>;

  recordEvent(event: ObservabilityEvent): Promise<void>;

  log(level: LogLevel, message: string, data?: Record<string, unknown>): void;

  metric(name: MetricName, value: number, tags?: Record<string, string>): void;
}

// ============================================
// SESSION TRACKING
// ============================================

export interface StartSessionParams {
  agentName: string;
  agentVersion: string;
  correlationId: string;
  input: unknown;
  metadata?: Record<string, unknown>;
}

export interface SessionResult {
  success: boolean;
  output?: unknown;
  error?: unknown;
  metadata?: {
    durationMs?: number;
    [key: string]: unknown;
  };
}

// ============================================
// EVENT TAXONOMY
// ============================================

/**
 * Standardized event types. The three `*.written` events are the
 * externally observable write events of a research run.
 */
export type EventType =
  // System events
  | "system.started"
  | "system.completed"
  | "system.failed"

  // Run artifacts
  | "plan.written"
  | "finding.written"
  | "output.written"

  // Worker lifecycle
  | "worker.started"
  | "worker.transition"
  | "worker.completed"
  | "worker.failed"
  | "worker.timed_out"

  // Capability calls
  | "capability.retry"
  | "capability.failed";

export interface ObservabilityEvent {
  type: EventType;

  /** When the event occurred */
  timestamp?: string;

  /** Correlation ID (the run id) */
  correlationId?: string;

  sessionId?: string;

  /** Thread the event belongs to */
  threadId?: string;

  level?: LogLevel;

  data?: Record<string, unknown>;
}

// ============================================
// OPTIONS
// ============================================

export interface ObservabilityOptions {
  /** Minimum log level */
  logLevel?: LogLevel;

  /** Enable console output */
  console?: boolean;

  /** Custom event handler, called for every recorded event */
  onEvent?: (event: ObservabilityEvent) => void;
}

// ============================================
// METRICS
// ============================================

export type MetricName =
  | "run.duration_ms"
  | "worker.duration_ms"
  | "worker.queries"
  | "worker.sources"
  | "synthesis.conflicts"
  | "synthesis.missing_threads";
