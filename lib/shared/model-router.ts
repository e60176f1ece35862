/**
 * Model Router - intent model on the OpenRouter AI SDK provider
 *
 * Builds the IntentModel the classifier calls: one `generateObject`
 * request asking for the classification shape. Authentication, HTTP
 * connection reuse and retry/backoff (`maxRetries`) are handled by the
 * AI SDK and the provider.
 */

import { createOpenRouter } from "@openrouter/ai-sdk-provider";
import { generateObject } from "ai";
import { logger } from "../logger";
import { classificationOutputSchema, type IntentModel, type IntentModelRequest } from "../routing/types";
import type { OrchestratorSettings } from "./config";

export type IntentModelSettings = Pick<
  OrchestratorSettings,
  "openRouterApiKey" | "intentModel" | "llmMaxRetries" | "llmTemperature"
>;

export function createIntentModel(settings: IntentModelSettings): IntentModel {
  if (!settings.openRouterApiKey) {
    logger.warn("[Model Router] OPENROUTER_API_KEY is not set; classification calls will fail");
  }

  const openrouter = createOpenRouter({
    apiKey: settings.openRouterApiKey,
  });
  const model = openrouter(settings.intentModel);

  logger.info(`📌 [Model Router] Intent model: ${settings.intentModel} (maxRetries: ${settings.llmMaxRetries})`);

  return {
    id: settings.intentModel,

    async classify({ system, query, signal }: IntentModelRequest): Promise<unknown> {
      const { object } = await generateObject({
        model,
        schema: classificationOutputSchema,
        schemaName: "ToolSelection",
        schemaDescription: "Tool selection decision for a user query",
        system,
        prompt: query,
        temperature: settings.llmTemperature,
        maxRetries: settings.llmMaxRetries,
        abortSignal: signal,
      });

      return object;
    },
  };
}
