/**
 * Request/response shapes for POST /invocations
 */

import { z } from "zod";
import type { InvocationOutcome } from "./health-monitor";

/**
 * `userPrompt` is accepted as an alias of `query` for callers that use
 * the agent-invocation field name.
 */
export const invocationRequestSchema = z
  .object({
    query: z.string().optional(),
    userPrompt: z.string().optional(),
    sessionId: z.string().trim().min(1, "sessionId is required"),
    context: z.unknown().optional(),
  })
  .transform((body, ctx) => {
    const query = (body.query ?? body.userPrompt ?? "").trim();
    if (query.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["query"],
        message: "query is required",
      });
      return z.NEVER;
    }
    return { query, sessionId: body.sessionId, context: body.context };
  });

export type InvocationRequest = z.infer<typeof invocationRequestSchema>;

export interface SelectedToolResponse {
  name: string;
  confidence: number;
  reasoning: string;
}

export interface InvocationResponse {
  sessionId: string;
  selectedTool: SelectedToolResponse | null;
  confidence: number;
  responseText: string;
  success: boolean;
  message: InvocationOutcome;
  timestamp: string;
  executionTimeMs: number;
}
