/**
 * Outbound tool collaborator contract
 */

import type { ToolDefinition } from "../registry/types";

export interface ToolInvocationRequest {
  query: string;
  sessionId: string;
  /** Parameters extracted by the intent classifier */
  parameters: Record<string, string>;
}

export interface ToolInvocationResult {
  ok: boolean;
  /** HTTP status for network-backed tools */
  status?: number;
  body?: unknown;
  error?: string;
}

/**
 * One call per selected tool. Implementations report backend failures as
 * `ok: false` and may throw on transport errors; the executor handles both.
 */
export interface ToolClient {
  invoke(
    tool: ToolDefinition,
    request: ToolInvocationRequest,
    signal: AbortSignal
  ): Promise<ToolInvocationResult>;
}
