/**
 * Fallback composer - answers for every route that does not execute a tool
 */

import { PreconditionError } from "../errors";
import { logger } from "../logger";
import { DEFAULT_CONFIDENCE_THRESHOLD } from "./guard-rails";
import { CONVERSATIONAL, NO_TOOL, type WorkflowState } from "./types";

export const FALLBACK_MESSAGES = {
  noToolFound:
    "I'm sorry, I couldn't find the right resource to help with your question. Please try rephrasing your query or contact our support team for assistance.",
  lowConfidence:
    "I'm not entirely sure I understand your question. Could you please provide more details or rephrase your request?",
  serviceUnavailable:
    "I'm currently experiencing technical difficulties. Please try again in a few moments or contact support if the issue persists.",
  toolFailure:
    "I wasn't able to retrieve an answer from the service that handles this request. Please try again in a few moments or contact support if the issue persists.",
} as const;

export type FallbackKind = "conversational" | "no_tool" | "low_confidence" | "service_unavailable";

/**
 * Pick the canned (or conversational) answer for a state
 *
 * Confidence exactly 0 is not "low confidence": it only comes from a
 * synthesized or degenerate classification and gets the generic message.
 */
export function selectFallback(
  state: WorkflowState,
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD
): { kind: FallbackKind; message: string } {
  const classification = state.classification;

  if (!classification) {
    return { kind: "service_unavailable", message: FALLBACK_MESSAGES.serviceUnavailable };
  }

  const directResponse = classification.directResponse;
  if (classification.toolName === CONVERSATIONAL && directResponse && directResponse.trim().length > 0) {
    return { kind: "conversational", message: directResponse };
  }

  if (classification.toolName === NO_TOOL) {
    return { kind: "no_tool", message: FALLBACK_MESSAGES.noToolFound };
  }

  if (classification.confidenceScore > 0 && classification.confidenceScore < threshold) {
    return { kind: "low_confidence", message: FALLBACK_MESSAGES.lowConfidence };
  }

  return { kind: "service_unavailable", message: FALLBACK_MESSAGES.serviceUnavailable };
}

/**
 * Terminal stage for the use_fallback route. Never calls out, never fails
 * on well-formed input.
 *
 * @throws PreconditionError if a terminal stage already answered
 */
export function composeFallback(
  state: WorkflowState,
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD
): WorkflowState {
  if (state.finalAnswer !== undefined) {
    throw new PreconditionError("Fallback invoked after finalAnswer was already written");
  }

  const { kind, message } = selectFallback(state, threshold);
  logger.info(
    `[Fallback] ${kind} (tool: ${state.classification?.toolName ?? "none"}, confidence: ${state.classification?.confidenceScore ?? "n/a"})`
  );

  return { ...state, finalAnswer: message };
}
