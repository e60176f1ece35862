/**
 * Routing Types
 *
 * Shapes shared by the classify → guard-rail → execute/fallback pipeline.
 */

import { z } from "zod";
import { toolDefinitionSchema } from "../registry/types";

/** Greeting, thanks or farewell: answered from the classifier's direct response */
export const CONVERSATIONAL = "CONVERSATIONAL";
/** No registered tool fits the query */
export const NO_TOOL = "NO_TOOL";

export type SentinelToolName = typeof CONVERSATIONAL | typeof NO_TOOL;

export function isSentinelToolName(name: string): name is SentinelToolName {
  return name === CONVERSATIONAL || name === NO_TOOL;
}

/**
 * Classification as validated from the model's structured output.
 * Nullable fields are accepted here because models often emit `null`
 * for absent values; they are normalized by `parseClassification`.
 */
export const classificationOutputSchema = z.object({
  toolName: z.string().trim().min(1),
  confidenceScore: z.number().finite().min(0).max(10),
  reasoning: z.string(),
  directResponse: z.string().nullish(),
  parameters: z.record(z.string(), z.string()).nullish(),
});

export type ClassificationOutput = z.infer<typeof classificationOutputSchema>;

export const classificationSchema = z.object({
  toolName: z.string().min(1),
  confidenceScore: z.number().min(0).max(10),
  reasoning: z.string(),
  directResponse: z.string().optional(),
  parameters: z.record(z.string(), z.string()).optional(),
});

export type Classification = z.infer<typeof classificationSchema>;

export const toolResultSchema = z.object({
  toolName: z.string(),
  succeeded: z.boolean(),
  responseBody: z.unknown(),
  error: z.string().optional(),
  durationMs: z.number(),
});

export type ToolResult = z.infer<typeof toolResultSchema>;

/**
 * Request-scoped record threaded through every pipeline stage
 */
export const workflowStateSchema = z.object({
  query: z.string(),
  sessionId: z.string(),
  registrySnapshot: z.record(z.string(), toolDefinitionSchema),
  classification: classificationSchema.optional(),
  /** Set when the classifier failed and the classification was synthesized */
  classificationFailed: z.boolean(),
  toolResult: toolResultSchema.optional(),
  finalAnswer: z.string().optional(),
});

export type WorkflowState = z.infer<typeof workflowStateSchema>;

/**
 * Outbound LLM collaborator. Owns authentication, pooling and retries;
 * returns whatever structured payload the model produced.
 */
export interface IntentModelRequest {
  system: string;
  query: string;
  signal?: AbortSignal;
}

export interface IntentModel {
  readonly id: string;
  classify(request: IntentModelRequest): Promise<unknown>;
}
