/**
 * Console Observability
 * Routes through the core structured logger
 */

import { randomUUID } from "crypto";
import { logger } from "@fanout/core";
import type {
  IObservability,
  StartSessionParams,
  SessionResult,
  ObservabilityEvent,
  ObservabilityOptions,
  LogLevel,
  MetricName,
} from "./types.js";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class ConsoleObservability implements IObservability {
  private readonly options: ObservabilityOptions;
  private readonly minLevel: number;
  private readonly sessions = new Map<string, string>();

  constructor(options: ObservabilityOptions = {}) {
    this.options = {
      ...options,
      logLevel: options.logLevel ?? "info",
      console: options.console ?? true,
    };
    this.minLevel = LOG_LEVELS[this.options.logLevel ?? "info"];
  }

  async startSession(params: StartSessionParams): Promise<string> {
    const sessionId = randomUUID();
    this.sessions.set(sessionId, params.agentName);

    this.log("debug", `[${params.agentName}] Session started`, {
      sessionId,
      correlationId: params.correlationId,
      agentVersion: params.agentVersion,
    });

    return sessionId;
  }

  async endSession(sessionId: string, result: SessionResult): Promise<void> {
    const agentName = this.sessions.get(sessionId) ?? "unknown";
    this.sessions.delete(sessionId);

    if (result.success) {
      this.log("debug", `[${agentName}] Session completed`, {
        sessionId,
        durationMs: result.metadata?.durationMs,
      });
    } else {
      this.log("warn", `[${agentName}] Session failed`, {
        sessionId,
        error: result.error instanceof Error ? result.error.message : String(result.error),
      });
    }
  }

  async recordEvent(event: ObservabilityEvent): Promise<void> {
    const stamped: ObservabilityEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };

    this.log(stamped.level ?? "debug", `[Event] ${stamped.type}`, {
      correlationId: stamped.correlationId,
      threadId: stamped.threadId,
      ...stamped.data,
    });

    this.options.onEvent?.(stamped);
  }

  log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < this.minLevel || !this.options.console) {
      return;
    }

    if (level === "error") {
      logger.error(message, data?.error, data);
    } else {
      logger[level](message, data);
    }
  }

  metric(name: MetricName, value: number, tags?: Record<string, string>): void {
    if (!this.options.console) {
      return;
    }
    logger.metric(name, value, tags);
  }
}

/**
 * No-op observability for testing
 */
export class NoOpObservability implements IObservability {
  async startSession(_params: StartSessionParams): Promise<string> {
    return randomUUID();
  }

  async endSession(_sessionId: string, _result: SessionResult): Promise<void> {}

  async recordEvent(_event: ObservabilityEvent): Promise<void> {}

  log(_level: LogLevel, _message: string, _data?: Record<string, unknown>): void {}

  metric(_name: MetricName, _value: number, _tags?: Record<string, string>): void {}
}

export function createConsoleObservability(options?: ObservabilityOptions): IObservability {
  return new ConsoleObservability(options);
}

export function createNoOpObservability(): IObservability {
  return new NoOpObservability();
}
