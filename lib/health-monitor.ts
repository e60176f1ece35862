/**
 * Health monitoring and metrics tracking
 * Provides service health status and per-route invocation counters
 */

import type { RouteDecision } from "./routing/guard-rails";

export type InvocationOutcome =
  | "ok"
  | "classification_failed"
  | "tool_execution_failed"
  | "pipeline_failed";

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthMetrics {
  uptime: number;
  timestamp: string;
  status: HealthStatus;
  invocations: {
    total: number;
    succeeded: number;
    classificationFailures: number;
    toolFailures: number;
    pipelineFailures: number;
    avgLatencyMs: number;
    routes: Record<RouteDecision, number>;
    lastInvocation?: string;
  };
  lastError?: {
    type: InvocationOutcome;
    timestamp: string;
    message: string;
  };
}

export interface InvocationRecord {
  decision: RouteDecision;
  outcome: InvocationOutcome;
  latencyMs: number;
  /** Diagnostic for failed outcomes */
  error?: string;
}

function emptyCounters(): HealthMetrics["invocations"] {
  return {
    total: 0,
    succeeded: 0,
    classificationFailures: 0,
    toolFailures: 0,
    pipelineFailures: 0,
    avgLatencyMs: 0,
    routes: { execute_tool: 0, use_fallback: 0 },
    lastInvocation: undefined,
  };
}

export class HealthMonitor {
  private startTime = Date.now();
  private counters = emptyCounters();
  private lastError: HealthMetrics["lastError"];

  /**
   * Track one completed invocation
   */
  trackInvocation(record: InvocationRecord) {
    const c = this.counters;
    c.total++;
    c.routes[record.decision]++;

    switch (record.outcome) {
      case "ok":
        c.succeeded++;
        break;
      case "classification_failed":
        c.classificationFailures++;
        break;
      case "tool_execution_failed":
        c.toolFailures++;
        break;
      case "pipeline_failed":
        c.pipelineFailures++;
        break;
    }

    if (record.outcome !== "ok") {
      this.lastError = {
        type: record.outcome,
        timestamp: new Date().toISOString(),
        message: (record.error ?? record.outcome).substring(0, 200),
      };
    }

    // Rolling average latency
    c.avgLatencyMs = (c.avgLatencyMs * (c.total - 1) + record.latencyMs) / c.total;
    c.lastInvocation = new Date().toISOString();
  }

  /**
   * Get current health metrics
   */
  getMetrics(): HealthMetrics {
    const c = this.counters;
    const failureRate = c.total > 0 ? (c.total - c.succeeded) / c.total : 0;

    let status: HealthStatus = 'healthy';
    if (failureRate > 0.5) status = 'unhealthy';
    else if (failureRate > 0.2) status = 'degraded';

    return {
      uptime: (Date.now() - this.startTime) / 1000, // in seconds
      timestamp: new Date().toISOString(),
      status,
      invocations: { ...c, routes: { ...c.routes } },
      lastError: this.lastError,
    };
  }

  /**
   * Reset metrics (useful for testing)
   */
  reset() {
    this.startTime = Date.now();
    this.counters = emptyCounters();
    this.lastError = undefined;
  }
}
