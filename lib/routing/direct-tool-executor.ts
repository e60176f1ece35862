/**
 * Direct Tool Executor
 *
 * Dispatches the query to the tool chosen by the classifier, without any
 * further LLM reasoning. Tool choice is already decided by the guard rails.
 *
 * Backend failures (unreachable, timeout, non-success status, empty answer)
 * are reported in the ToolResult and answered with a generic message; they
 * never escape this stage. Being called with no executable classification
 * is a PreconditionError, since the guard rails make that impossible.
 */

import {
  DeadlineExceededError,
  PreconditionError,
  ToolExecutionError,
  describeError,
} from "../errors";
import { logger, truncateForLog } from "../logger";
import { withDeadline } from "../shared/deadline";
import type { ToolClient } from "../tools/types";
import { isRecord } from "../utils";
import { FALLBACK_MESSAGES } from "./fallback";
import { isSentinelToolName, type ToolResult, type WorkflowState } from "./types";

const ANSWER_FIELDS = ["answer", "response", "message", "text", "output"] as const;

export interface DirectToolExecutorOptions {
  client: ToolClient;
  /** Overall deadline for one tool call */
  timeoutMs: number;
}

/**
 * Render a tool response body as the user-facing answer
 */
export function formatToolResponse(body: unknown): string {
  if (typeof body === "string") {
    return body.trim();
  }
  if (body === undefined || body === null) {
    return "";
  }

  if (isRecord(body)) {
    for (const field of ANSWER_FIELDS) {
      const value = body[field];
      if (typeof value === "string" && value.trim().length > 0) {
        return value.trim();
      }
    }
  }

  return JSON.stringify(body, null, 2);
}

function describeToolError(error: unknown, toolName: string): string {
  if (error instanceof DeadlineExceededError) {
    return error.reason === "timeout"
      ? `${toolName} timed out after ${error.timeoutMs}ms`
      : `${toolName} call was cancelled`;
  }
  if (error instanceof ToolExecutionError) {
    return error.message;
  }
  return `${toolName} unreachable: ${describeError(error)}`;
}

export class DirectToolExecutor {
  private readonly client: ToolClient;
  private readonly timeoutMs: number;

  constructor(options: DirectToolExecutorOptions) {
    this.client = options.client;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Terminal stage for the execute_tool route
   *
   * @throws PreconditionError if the state has no executable classification
   * or a terminal stage already answered
   */
  async execute(state: WorkflowState, signal?: AbortSignal): Promise<WorkflowState> {
    const classification = state.classification;

    if (!classification || classification.toolName.trim().length === 0) {
      throw new PreconditionError("Tool executor invoked without a selected tool");
    }
    if (isSentinelToolName(classification.toolName)) {
      throw new PreconditionError(
        `Tool executor invoked with sentinel tool name ${classification.toolName}`
      );
    }
    if (state.finalAnswer !== undefined) {
      throw new PreconditionError("Tool executor invoked after finalAnswer was already written");
    }

    const toolName = classification.toolName;
    const startTime = Date.now();
    logger.action("DirectToolExecutor", `Executing ${toolName} for: "${truncateForLog(state.query, 50)}"`);

    let toolResult: ToolResult;
    let finalAnswer: string;

    try {
      const tool = state.registrySnapshot[toolName];
      if (!tool) {
        throw new ToolExecutionError(toolName, `Unknown tool: ${toolName} is not in the registry`);
      }

      const result = await withDeadline(
        (callSignal) =>
          this.client.invoke(
            tool,
            {
              query: state.query,
              sessionId: state.sessionId,
              parameters: classification.parameters ?? {},
            },
            callSignal
          ),
        { timeoutMs: this.timeoutMs, signal }
      );

      if (!result.ok) {
        throw new ToolExecutionError(toolName, result.error ?? `${toolName} reported a failure`);
      }

      const answer = formatToolResponse(result.body);
      if (answer.length === 0) {
        throw new ToolExecutionError(toolName, `${toolName} returned an empty response`);
      }

      toolResult = {
        toolName,
        succeeded: true,
        responseBody: result.body,
        durationMs: Date.now() - startTime,
      };
      finalAnswer = answer;
      logger.success("DirectToolExecutor", `${toolName} completed in ${toolResult.durationMs}ms`);
    } catch (error) {
      const diagnostic = describeToolError(error, toolName);
      toolResult = {
        toolName,
        succeeded: false,
        responseBody: undefined,
        error: diagnostic,
        durationMs: Date.now() - startTime,
      };
      finalAnswer = FALLBACK_MESSAGES.toolFailure;
      logger.fail("DirectToolExecutor", diagnostic);
    }

    return { ...state, toolResult, finalAnswer };
  }
}
