/**
 * Tool Clients
 *
 * Backends the tool executor dispatches to:
 * - HttpToolClient: real tool services reached over HTTP
 * - StubToolClient: canned in-process answers
 *
 * `stub://` endpoints always go to the stub, whatever the configured backend.
 */

import type { ToolClient } from "./types";

export { HttpToolClient, type HttpToolClientOptions } from "./http-tool-client";
export { StubToolClient } from "./stub-tool-client";
export type { ToolClient, ToolInvocationRequest, ToolInvocationResult } from "./types";

export const STUB_ENDPOINT_PROTOCOL = "stub:";

export function isStubEndpoint(endpoint: string): boolean {
  return endpoint.toLowerCase().startsWith(`${STUB_ENDPOINT_PROTOCOL}//`);
}

/**
 * Combine the configured backend with the stub for `stub://` endpoints
 */
export function createToolClient(
  backend: "http" | "stub",
  clients: { http: ToolClient; stub: ToolClient }
): ToolClient {
  const primary = backend === "stub" ? clients.stub : clients.http;

  return {
    invoke(tool, request, signal) {
      const client = isStubEndpoint(tool.endpoint) ? clients.stub : primary;
      return client.invoke(tool, request, signal);
    },
  };
}
