/**
 * In-process stand-ins for the intent model and tool backends
 */

import { vi, type Mock } from "vitest";
import { ToolRegistry } from "../../lib/registry/tool-registry";
import type { ToolDefinition } from "../../lib/registry/types";
import type { IntentModel, IntentModelRequest } from "../../lib/routing/types";
import type { ToolClient, ToolInvocationRequest, ToolInvocationResult } from "../../lib/tools/types";

export function makeTool(overrides: Partial<ToolDefinition> = {}): ToolDefinition {
  return {
    name: "IBTAgent",
    description: "Answers questions about insurance benefits and coverage",
    endpoint: "http://localhost:8101/invocations",
    capabilities: ["benefits", "coverage", "deductibles"],
    parameters: { required: ["query"], optional: ["planId"] },
    examples: [{ prompt: "What is my deductible?" }],
    ...overrides,
  };
}

export function makeRegistry(): ToolRegistry {
  return new ToolRegistry([
    makeTool(),
    makeTool({
      name: "ClaimsAgent",
      description: "Looks up claim status and history",
      endpoint: "http://localhost:8102/invocations",
      capabilities: ["claims"],
      parameters: { required: ["query"], optional: ["claimId"] },
      examples: [],
    }),
  ]);
}

/**
 * Intent model that answers every request with a fixed payload
 */
export function fakeIntentModel(payload: unknown): IntentModel & {
  classify: Mock<(request: IntentModelRequest) => Promise<unknown>>;
} {
  return {
    id: "fake-intent-model",
    classify: vi.fn(async (_request: IntentModelRequest) => payload),
  };
}

/**
 * Intent model whose call rejects
 */
export function failingIntentModel(error: unknown): IntentModel {
  return {
    id: "failing-intent-model",
    classify: vi.fn(async () => {
      throw error;
    }),
  };
}

/**
 * Intent model that only settles when its signal aborts
 */
export function hangingIntentModel(): IntentModel {
  return {
    id: "hanging-intent-model",
    classify: ({ signal }: IntentModelRequest) =>
      new Promise<unknown>((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(new Error("model call aborted")), {
          once: true,
        });
      }),
  };
}

type InvokeFn = (
  tool: ToolDefinition,
  request: ToolInvocationRequest,
  signal: AbortSignal
) => Promise<ToolInvocationResult>;

export function fakeToolClient(result: ToolInvocationResult): ToolClient & {
  invoke: Mock<InvokeFn>;
} {
  return {
    invoke: vi.fn<InvokeFn>(async () => result),
  };
}

export function hangingToolClient(): ToolClient {
  return {
    invoke: (_tool, _request, signal) =>
      new Promise<ToolInvocationResult>((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(new Error("tool call aborted")), {
          once: true,
        });
      }),
  };
}
