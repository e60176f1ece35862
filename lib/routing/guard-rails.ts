/**
 * Guard-rail router
 *
 * Deterministic decision table gating tool execution, evaluated in order:
 * 1. no classification        → use_fallback
 * 2. CONVERSATIONAL           → use_fallback
 * 3. NO_TOOL                  → use_fallback
 * 4. confidence < threshold   → use_fallback
 * 5. otherwise                → execute_tool
 */

import { CONVERSATIONAL, NO_TOOL, type Classification } from "./types";

export const DEFAULT_CONFIDENCE_THRESHOLD = 7.0;

export type RouteDecision = "execute_tool" | "use_fallback";

export type RouteReason =
  | "no_classification"
  | "conversational"
  | "no_tool"
  | "low_confidence"
  | "passed";

export interface RouteExplanation {
  decision: RouteDecision;
  reason: RouteReason;
}

export function explainRoute(
  classification: Classification | undefined,
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD
): RouteExplanation {
  if (!classification) {
    return { decision: "use_fallback", reason: "no_classification" };
  }
  if (classification.toolName === CONVERSATIONAL) {
    return { decision: "use_fallback", reason: "conversational" };
  }
  if (classification.toolName === NO_TOOL) {
    return { decision: "use_fallback", reason: "no_tool" };
  }
  // Written as >= so a NaN score can never pass
  if (classification.confidenceScore >= threshold) {
    return { decision: "execute_tool", reason: "passed" };
  }
  return { decision: "use_fallback", reason: "low_confidence" };
}

export function route(
  classification: Classification | undefined,
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD
): RouteDecision {
  return explainRoute(classification, threshold).decision;
}
