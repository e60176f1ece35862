/**
 * Orchestrator - maps one invocation onto one pipeline run
 *
 * Constructed once at startup with the loaded registry and the pipeline,
 * then shared by every request. Holds no per-request state.
 */

import { describeError } from "./errors";
import type { HealthMonitor, InvocationOutcome } from "./health-monitor";
import type { InvocationRequest, InvocationResponse } from "./invocation-types";
import { logger } from "./logger";
import type { ToolRegistry } from "./registry/tool-registry";
import { FALLBACK_MESSAGES } from "./routing/fallback";
import type { PipelineDriver, PipelineOutcome } from "./workflows/tool-routing-workflow";

export interface OrchestratorOptions {
  registry: ToolRegistry;
  pipeline: Pick<PipelineDriver, "run">;
  healthMonitor?: HealthMonitor;
}

function outcomeOf(result: PipelineOutcome): InvocationOutcome {
  if (result.pipelineFailed) return "pipeline_failed";
  if (result.state.classificationFailed) return "classification_failed";
  if (result.state.toolResult && !result.state.toolResult.succeeded) return "tool_execution_failed";
  return "ok";
}

export class Orchestrator {
  private readonly registry: ToolRegistry;
  private readonly pipeline: Pick<PipelineDriver, "run">;
  private readonly healthMonitor?: HealthMonitor;

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry;
    this.pipeline = options.pipeline;
    this.healthMonitor = options.healthMonitor;
  }

  /**
   * Run the pipeline for one request. Always resolves with a well-formed
   * response; soft failures are reported with `success: false`.
   */
  async handleInvocation(
    request: InvocationRequest,
    signal?: AbortSignal
  ): Promise<InvocationResponse> {
    const startTime = Date.now();

    let result: PipelineOutcome;
    try {
      result = await this.pipeline.run(
        {
          query: request.query,
          sessionId: request.sessionId,
          registrySnapshot: this.registry.snapshot(),
        },
        signal
      );
    } catch (error) {
      // PipelineDriver does not throw; this guards injected pipelines
      logger.fail("Orchestrator", `Pipeline threw for session=${request.sessionId}: ${describeError(error)}`);
      return this.respond(request.sessionId, startTime, {
        selectedTool: null,
        confidence: 0,
        responseText: FALLBACK_MESSAGES.serviceUnavailable,
        outcome: "pipeline_failed",
        decision: "use_fallback",
        error: describeError(error),
      });
    }

    const { state } = result;
    const outcome = outcomeOf(result);
    const classification = state.classification;
    const selectedTool =
      classification && !state.classificationFailed
        ? {
            name: classification.toolName,
            confidence: classification.confidenceScore,
            reasoning: classification.reasoning,
          }
        : null;

    return this.respond(request.sessionId, startTime, {
      selectedTool,
      confidence: selectedTool?.confidence ?? 0,
      responseText: state.finalAnswer ?? FALLBACK_MESSAGES.serviceUnavailable,
      outcome,
      decision: result.decision,
      error: state.toolResult?.error ?? (state.classificationFailed ? classification?.reasoning : undefined),
    });
  }

  private respond(
    sessionId: string,
    startTime: number,
    parts: {
      selectedTool: InvocationResponse["selectedTool"];
      confidence: number;
      responseText: string;
      outcome: InvocationOutcome;
      decision: PipelineOutcome["decision"];
      error?: string;
    }
  ): InvocationResponse {
    const executionTimeMs = Date.now() - startTime;

    this.healthMonitor?.trackInvocation({
      decision: parts.decision,
      outcome: parts.outcome,
      latencyMs: executionTimeMs,
      error: parts.error,
    });

    return {
      sessionId,
      selectedTool: parts.selectedTool,
      confidence: parts.confidence,
      responseText: parts.responseText,
      success: parts.outcome === "ok",
      message: parts.outcome,
      timestamp: new Date().toISOString(),
      executionTimeMs,
    };
  }
}
