/**
 * Routing Module - classify, gate, then execute or fall back
 *
 * Usage:
 * ```typescript
 * import { IntentClassifier, DirectToolExecutor, route } from "./routing";
 *
 * const classification = await classifier.classify(query, registry.snapshot());
 * if (route(classification, threshold) === "execute_tool") {
 *   state = await executor.execute({ ...state, classification });
 * }
 * ```
 */

export {
  IntentClassifier,
  parseClassification,
  type IntentClassifierOptions,
} from "./intent-classifier";

export { buildToolSelectionPrompt, buildToolsContext } from "./intent-prompt";

export {
  DEFAULT_CONFIDENCE_THRESHOLD,
  explainRoute,
  route,
  type RouteDecision,
  type RouteExplanation,
  type RouteReason,
} from "./guard-rails";

export {
  DirectToolExecutor,
  formatToolResponse,
  type DirectToolExecutorOptions,
} from "./direct-tool-executor";

export {
  FALLBACK_MESSAGES,
  composeFallback,
  selectFallback,
  type FallbackKind,
} from "./fallback";

export {
  CONVERSATIONAL,
  NO_TOOL,
  isSentinelToolName,
  type Classification,
  type IntentModel,
  type IntentModelRequest,
  type ToolResult,
  type WorkflowState,
} from "./types";
