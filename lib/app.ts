/**
 * HTTP surface
 *
 * - POST /invocations: route one query (always 200 with an InvocationResponse
 *   once the body is valid)
 * - GET /ping: static liveness
 * - GET /health: invocation metrics
 */

import { Hono } from "hono";
import { describeError } from "./errors";
import type { HealthMonitor } from "./health-monitor";
import { invocationRequestSchema, type InvocationResponse } from "./invocation-types";
import { logger } from "./logger";
import type { Orchestrator } from "./orchestrator";
import type { ToolRegistry } from "./registry/tool-registry";
import { FALLBACK_MESSAGES } from "./routing/fallback";

export const SERVICE_NAME = "tool-router";

export interface AppDependencies {
  orchestrator: Pick<Orchestrator, "handleInvocation">;
  registry: ToolRegistry;
  healthMonitor: HealthMonitor;
}

export function createApp({ orchestrator, registry, healthMonitor }: AppDependencies): Hono {
  const app = new Hono();

  app.get("/ping", (c) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.get("/health", (c) => {
    const metrics = healthMonitor.getMetrics();
    const statusCode = metrics.status === "unhealthy" ? 503 : 200;
    return c.json(
      {
        service: SERVICE_NAME,
        ...metrics,
        registry: { tools: registry.names(), capabilities: registry.capabilities() },
      },
      statusCode
    );
  });

  app.post("/invocations", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error) {
      logger.warn(`[Invocations] Unparseable body: ${describeError(error)}`);
      return c.json(
        { success: false, error: "invalid_request", details: ["Body must be valid JSON"] },
        400
      );
    }

    const parsed = invocationRequestSchema.safeParse(body);
    if (!parsed.success) {
      const details = parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      );
      return c.json({ success: false, error: "invalid_request", details }, 400);
    }

    const request = parsed.data;
    try {
      const response = await orchestrator.handleInvocation(request, c.req.raw.signal);
      return c.json(response);
    } catch (error) {
      logger.fail("Invocations", `Unhandled error for session=${request.sessionId}: ${describeError(error)}`);
      const fallback: InvocationResponse = {
        sessionId: request.sessionId,
        selectedTool: null,
        confidence: 0,
        responseText: FALLBACK_MESSAGES.serviceUnavailable,
        success: false,
        message: "pipeline_failed",
        timestamp: new Date().toISOString(),
        executionTimeMs: 0,
      };
      return c.json(fallback);
    }
  });

  return app;
}
