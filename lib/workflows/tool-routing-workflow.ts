/**
 * Tool Routing Workflow
 *
 * One pass per request over the WorkflowState:
 *
 *   START ──classify-intent──▶ CLASSIFIED ──guard rails──▶ EXECUTING    ──execute-tool─────▶ DONE
 *                                                      └─▶ FALLING_BACK ──compose-fallback──▶ DONE
 *
 * The branch conditions are complementary, so exactly one terminal step
 * runs; `compose-response` reads whichever one did. A failing classifier
 * never fails the run: `classify-intent` synthesizes a zero-confidence
 * classification that the guard rails send to the service-unavailable
 * fallback.
 */

import { createStep, createWorkflow } from "@mastra/core/workflows";
import { z } from "zod";
import { PreconditionError, describeError } from "../errors";
import { logger, truncateForLog } from "../logger";
import type { RegistrySnapshot } from "../registry/types";
import type { DirectToolExecutor } from "../routing/direct-tool-executor";
import { FALLBACK_MESSAGES, composeFallback } from "../routing/fallback";
import { explainRoute, route, type RouteDecision } from "../routing/guard-rails";
import type { IntentClassifier } from "../routing/intent-classifier";
import {
  CONVERSATIONAL,
  workflowStateSchema,
  type Classification,
  type WorkflowState,
} from "../routing/types";

export type PipelineStage = "START" | "CLASSIFIED" | "EXECUTING" | "FALLING_BACK" | "DONE";

export interface PipelineInput {
  query: string;
  sessionId: string;
  registrySnapshot: RegistrySnapshot;
}

export interface PipelineOutcome {
  state: WorkflowState;
  decision: RouteDecision;
  /** States visited, in order */
  stages: PipelineStage[];
  /** The run itself failed (e.g. a broken invariant) and was answered generically */
  pipelineFailed: boolean;
}

export interface PipelineDependencies {
  classifier: Pick<IntentClassifier, "classify">;
  executor: Pick<DirectToolExecutor, "execute">;
  confidenceThreshold: number;
}

const pipelineInputSchema = workflowStateSchema.pick({
  query: true,
  sessionId: true,
  registrySnapshot: true,
});

const branchOutputSchema = z.object({
  "execute-tool": workflowStateSchema.optional(),
  "compose-fallback": workflowStateSchema.optional(),
});

const pipelineOutputSchema = z.object({
  state: workflowStateSchema,
  decision: z.enum(["execute_tool", "use_fallback"]),
});

/**
 * Classification used when the intent model could not be consulted.
 * CONVERSATIONAL without a direct response at confidence 0 routes to
 * fallback and selects the service-unavailable message.
 */
export function unavailableClassification(error: unknown): Classification {
  return {
    toolName: CONVERSATIONAL,
    confidenceScore: 0,
    reasoning: `Intent classification unavailable: ${describeError(error)}`,
  };
}

function stagesFor(decision: RouteDecision): PipelineStage[] {
  return ["START", "CLASSIFIED", decision === "execute_tool" ? "EXECUTING" : "FALLING_BACK", "DONE"];
}

/**
 * Stages reached by a run that did not complete. It is always answered by
 * the generic fallback, after whichever steps did run.
 */
function visitedStages(steps: Record<string, { status: string } | undefined>): PipelineStage[] {
  const stages: PipelineStage[] = ["START"];
  if (steps["classify-intent"]?.status === "success") {
    stages.push("CLASSIFIED");
  }
  if (steps["execute-tool"] !== undefined) {
    stages.push("EXECUTING");
  }
  stages.push("FALLING_BACK", "DONE");
  return stages;
}

export function createToolRoutingWorkflow(deps: PipelineDependencies) {
  const { classifier, executor, confidenceThreshold } = deps;

  const classifyIntentStep = createStep({
    id: "classify-intent",
    description: "Ask the intent model which registered tool should answer the query",
    inputSchema: pipelineInputSchema,
    outputSchema: workflowStateSchema,
    execute: async ({ inputData, abortSignal }) => {
      const state: WorkflowState = { ...inputData, classificationFailed: false };

      try {
        const classification = await classifier.classify(
          state.query,
          state.registrySnapshot,
          abortSignal
        );
        return { ...state, classification };
      } catch (error) {
        logger.fail("Pipeline", `Classification failed, forcing fallback: ${describeError(error)}`);
        return {
          ...state,
          classification: unavailableClassification(error),
          classificationFailed: true,
        };
      }
    },
  });

  const executeToolStep = createStep({
    id: "execute-tool",
    description: "Dispatch the query to the selected tool",
    inputSchema: workflowStateSchema,
    outputSchema: workflowStateSchema,
    execute: async ({ inputData, abortSignal }) => executor.execute(inputData, abortSignal),
  });

  const composeFallbackStep = createStep({
    id: "compose-fallback",
    description: "Answer without a tool: conversational reply or canned message",
    inputSchema: workflowStateSchema,
    outputSchema: workflowStateSchema,
    execute: async ({ inputData }) => composeFallback(inputData, confidenceThreshold),
  });

  const composeResponseStep = createStep({
    id: "compose-response",
    description: "Collect the answer written by the terminal step",
    inputSchema: branchOutputSchema,
    outputSchema: pipelineOutputSchema,
    execute: async ({ inputData }) => {
      const executed = inputData["execute-tool"];
      const fellBack = inputData["compose-fallback"];

      if (executed && fellBack) {
        throw new PreconditionError("Both terminal stages ran for one request");
      }
      const state = executed ?? fellBack;
      if (!state) {
        throw new PreconditionError("No terminal stage ran");
      }
      if (!state.finalAnswer || state.finalAnswer.trim().length === 0) {
        throw new PreconditionError("Terminal stage finished without an answer");
      }

      const decision: RouteDecision = executed ? "execute_tool" : "use_fallback";
      return { state, decision };
    },
  });

  return createWorkflow({
    id: "tool-routing",
    description: "Classify a query, apply guard rails, then run a tool or answer with a fallback",
    inputSchema: pipelineInputSchema,
    outputSchema: pipelineOutputSchema,
  })
    .then(classifyIntentStep)
    .branch([
      [
        async ({ inputData }) => route(inputData.classification, confidenceThreshold) === "execute_tool",
        executeToolStep,
      ],
      [
        async ({ inputData }) => route(inputData.classification, confidenceThreshold) === "use_fallback",
        composeFallbackStep,
      ],
    ])
    .then(composeResponseStep)
    .commit();
}

export type ToolRoutingWorkflow = ReturnType<typeof createToolRoutingWorkflow>;

/**
 * Pipeline driver: runs the workflow once per request and always comes back
 * with a displayable answer.
 */
export class PipelineDriver {
  private readonly workflow: ToolRoutingWorkflow;
  private readonly confidenceThreshold: number;

  constructor(deps: PipelineDependencies) {
    this.workflow = createToolRoutingWorkflow(deps);
    this.confidenceThreshold = deps.confidenceThreshold;
  }

  async run(input: PipelineInput, signal?: AbortSignal): Promise<PipelineOutcome> {
    const startTime = Date.now();
    logger.pending("Pipeline", `session=${input.sessionId} query="${truncateForLog(input.query, 50)}"`);

    const run = await this.workflow.createRunAsync();

    // A client that disconnected before the run started never fires "abort"
    if (signal?.aborted) {
      logger.warn(`[Pipeline] Request already cancelled, skipping run for session=${input.sessionId}`);
      return this.failedOutcome(input, ["START", "FALLING_BACK", "DONE"]);
    }

    const onAbort = () => {
      logger.warn(`[Pipeline] Request cancelled, cancelling run for session=${input.sessionId}`);
      Promise.resolve(run.cancel()).catch((error: unknown) => {
        logger.error(`[Pipeline] Failed to cancel run: ${describeError(error)}`);
      });
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const result = await run.start({ inputData: input });

      if (result.status === "success") {
        const { state, decision } = result.result;
        const { reason } = explainRoute(state.classification, this.confidenceThreshold);
        logger.info(
          `[Pipeline] DONE via ${decision} (${reason}) in ${Date.now() - startTime}ms`
        );
        return { state, decision, stages: stagesFor(decision), pipelineFailed: false };
      }

      const detail = result.status === "failed" ? describeError(result.error) : `status ${result.status}`;
      logger.fail("Pipeline", `Run did not complete for session=${input.sessionId}: ${detail}`);
      return this.failedOutcome(input, visitedStages(result.steps));
    } catch (error) {
      logger.fail("Pipeline", `Run threw for session=${input.sessionId}: ${describeError(error)}`);
      return this.failedOutcome(input, ["START", "FALLING_BACK", "DONE"]);
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private failedOutcome(input: PipelineInput, stages: PipelineStage[]): PipelineOutcome {
    return {
      state: {
        ...input,
        classificationFailed: false,
        finalAnswer: FALLBACK_MESSAGES.serviceUnavailable,
      },
      decision: "use_fallback",
      stages,
      pipelineFailed: true,
    };
  }
}
