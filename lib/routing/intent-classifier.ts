/**
 * Intent Classifier - LLM-based tool selection
 *
 * Sends the query plus a rendered description of the registry to the
 * intent model and validates the structured answer. The routing policy
 * (greetings → CONVERSATIONAL, unsure/out-of-domain → NO_TOOL) lives in
 * the prompt; this module only enforces the output contract.
 *
 * One outbound call per query, bounded by a timeout. No retries here:
 * retry/backoff belongs to the IntentModel implementation.
 */

import { ClassificationError, DeadlineExceededError, describeError } from "../errors";
import { logger, truncateForLog } from "../logger";
import type { RegistrySnapshot } from "../registry/types";
import { withDeadline } from "../shared/deadline";
import { buildToolSelectionPrompt, buildToolsContext } from "./intent-prompt";
import {
  CONVERSATIONAL,
  classificationOutputSchema,
  type Classification,
  type IntentModel,
} from "./types";

export interface IntentClassifierOptions {
  model: IntentModel;
  /** Upper bound for the outbound call */
  timeoutMs: number;
  /** Subject area used in the system prompt */
  domain: string;
}

/**
 * Validate a raw model payload into a Classification
 *
 * @throws ClassificationError (reason "invalid_output") on any schema mismatch
 */
export function parseClassification(payload: unknown): Classification {
  const parsed = classificationOutputSchema.safeParse(payload);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ClassificationError("invalid_output", `Model output is not a valid classification: ${problems}`);
  }

  const { toolName, confidenceScore, reasoning, directResponse, parameters } = parsed.data;
  const classification: Classification = { toolName, confidenceScore, reasoning };

  // A direct response only means something for conversational queries
  if (toolName === CONVERSATIONAL && directResponse) {
    classification.directResponse = directResponse;
  }
  if (parameters && Object.keys(parameters).length > 0) {
    classification.parameters = parameters;
  }

  return classification;
}

function toClassificationError(error: unknown, timeoutMs: number): ClassificationError {
  if (error instanceof ClassificationError) {
    return error;
  }
  if (error instanceof DeadlineExceededError) {
    return new ClassificationError(
      error.reason,
      error.reason === "timeout"
        ? `Intent model timed out after ${timeoutMs}ms`
        : "Intent classification was cancelled",
      { cause: error }
    );
  }
  if (error instanceof Error && error.name === "TimeoutError") {
    return new ClassificationError("timeout", `Intent model timed out: ${error.message}`, { cause: error });
  }
  return new ClassificationError("model_error", `Intent model call failed: ${describeError(error)}`, {
    cause: error,
  });
}

export class IntentClassifier {
  private readonly model: IntentModel;
  private readonly timeoutMs: number;
  private readonly domain: string;

  constructor(options: IntentClassifierOptions) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.domain = options.domain;
  }

  /**
   * Classify a query against the registered tools
   *
   * @throws ClassificationError when the call errors, times out, is cancelled
   * or returns a payload that does not match the Classification shape
   */
  async classify(
    query: string,
    registry: RegistrySnapshot,
    signal?: AbortSignal
  ): Promise<Classification> {
    const system = buildToolSelectionPrompt(buildToolsContext(registry), this.domain);
    logger.debug(`[IntentClassifier] Classifying with ${this.model.id} over ${Object.keys(registry).length} tools`);

    let payload: unknown;
    try {
      payload = await withDeadline(
        (callSignal) => this.model.classify({ system, query, signal: callSignal }),
        { timeoutMs: this.timeoutMs, signal }
      );
    } catch (error) {
      throw toClassificationError(error, this.timeoutMs);
    }

    const classification = parseClassification(payload);
    logger.info(
      `[IntentClassifier] "${truncateForLog(query, 50)}" → ${classification.toolName} (confidence: ${classification.confidenceScore})`
    );
    return classification;
  }
}
