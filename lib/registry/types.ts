/**
 * Tool definition schemas for the registry document
 */

import { z } from "zod";

const ALLOWED_ENDPOINT_PROTOCOLS = new Set(["http:", "https:", "stub:"]);

function isValidEndpoint(value: string): boolean {
  try {
    return ALLOWED_ENDPOINT_PROTOCOLS.has(new URL(value).protocol);
  } catch {
    return false;
  }
}

export const toolExampleSchema = z.object({
  prompt: z.string().min(1),
  reasoning: z.string().optional(),
});

export const toolParametersSchema = z.object({
  required: z.array(z.string().min(1)),
  optional: z.array(z.string().min(1)).default([]),
});

export const toolDefinitionSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().min(1),
  endpoint: z.string().refine(isValidEndpoint, {
    message: "endpoint must be an http(s) URL or a stub:// identifier",
  }),
  capabilities: z.array(z.string().min(1)),
  parameters: toolParametersSchema,
  examples: z.array(toolExampleSchema).default([]),
});

export const registryDocumentSchema = z.object({
  tools: z.array(z.unknown()),
});

export type ToolExample = z.infer<typeof toolExampleSchema>;
export type ToolParameters = z.infer<typeof toolParametersSchema>;
export type ToolDefinition = z.infer<typeof toolDefinitionSchema>;

/** Tool name → definition, as handed to each request */
export type RegistrySnapshot = Readonly<Record<string, ToolDefinition>>;
