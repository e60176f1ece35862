/**
 * Prompt templates for the intent classifier
 */

import type { RegistrySnapshot, ToolDefinition } from "../registry/types";
import { CONVERSATIONAL, NO_TOOL } from "./types";

function formatList(items: readonly string[], empty: string): string {
  return items.length > 0 ? items.join(", ") : empty;
}

function describeTool(tool: ToolDefinition): string {
  const lines = [
    `Tool: ${tool.name}`,
    `Description: ${tool.description}`,
    `Endpoint: ${tool.endpoint}`,
    `Capabilities: ${formatList(tool.capabilities, "None")}`,
    `Parameters (Required): ${formatList(tool.parameters.required, "None")}`,
    `Parameters (Optional): ${formatList(tool.parameters.optional, "None")}`,
  ];

  if (tool.examples.length > 0) {
    lines.push("Example prompts:");
    for (const example of tool.examples) {
      lines.push(`- "${example.prompt}"`);
    }
  }

  return lines.join("\n");
}

/**
 * Render every registered tool as plain text, sorted by name so the
 * prompt is identical for identical registries.
 */
export function buildToolsContext(registry: RegistrySnapshot): string {
  const names = Object.keys(registry).sort();
  if (names.length === 0) {
    return "No tools available";
  }

  return names.map((name) => describeTool(registry[name])).join("\n\n");
}

/**
 * System instruction for tool selection
 *
 * @param toolsContext - Output of buildToolsContext
 * @param domain - Subject area the assistant serves (e.g. "healthcare insurance")
 */
export function buildToolSelectionPrompt(toolsContext: string, domain: string): string {
  return `You are an intelligent tool selection agent for a ${domain} assistant.

Available tools and their capabilities:
${toolsContext}

Your task is to:
1. Analyze the user's query to understand their intent
2. Classify the query type:
   - TOOL REQUIRED: a genuine ${domain} question one of the tools above can answer
   - CONVERSATIONAL: simple greeting, thank you, goodbye, small talk
   - OUT OF SCOPE: anything unrelated to ${domain}

**CONVERSATIONAL QUERIES:**
For greetings (hello, hi, hey), thank you messages, or goodbyes:
- Set toolName to "${CONVERSATIONAL}"
- Set confidenceScore to 10.0
- Provide a short, friendly directResponse

Examples:
- "Hello" → ${CONVERSATIONAL} with directResponse: "Hello! I'm here to help with your ${domain} questions. What can I assist you with today?"
- "Thank you" → ${CONVERSATIONAL} with directResponse: "You're welcome! Let me know if you need anything else."

**TOOL ROUTING:**
- Only route to a tool for an actual ${domain} question, using the exact tool name listed above
- confidenceScore (0-10) must reflect how certain you are that the tool can answer
- If your confidence is below 7.0, set toolName to "${NO_TOOL}"
- If the query is out of scope, set toolName to "${NO_TOOL}"
- Put any parameter values you can read from the query into parameters, keyed by the tool's parameter names

Return:
- toolName: a tool name, "${CONVERSATIONAL}", or "${NO_TOOL}"
- confidenceScore: 0-10
- reasoning: a short explanation of your decision
- directResponse: (only for ${CONVERSATIONAL}) your friendly response
- parameters: (optional) extracted parameter values as strings`;
}
