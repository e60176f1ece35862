/**
 * HTTP Tool Client
 *
 * POSTs `{ userPrompt, sessionId, parameters }` as JSON to the tool's
 * endpoint. A non-2xx status, or a JSON body carrying a `status` other
 * than "success", is reported as a failed invocation.
 */

import { logger } from "../logger";
import type { ToolDefinition } from "../registry/types";
import { isRecord } from "../utils";
import type { ToolClient, ToolInvocationRequest, ToolInvocationResult } from "./types";

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpToolClientOptions {
  /** Injected for tests; defaults to the global fetch */
  fetch?: FetchLike;
  headers?: Record<string, string>;
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  const contentType = response.headers.get("content-type") ?? "";

  if (contentType.includes("application/json") && text.length > 0) {
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      logger.warn(`[HttpToolClient] Response declared JSON but did not parse, using raw text`);
      return text;
    }
  }
  return text;
}

export class HttpToolClient implements ToolClient {
  private readonly fetchImpl: FetchLike;
  private readonly headers: Record<string, string>;

  constructor(options: HttpToolClientOptions = {}) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.headers = options.headers ?? {};
  }

  async invoke(
    tool: ToolDefinition,
    request: ToolInvocationRequest,
    signal: AbortSignal
  ): Promise<ToolInvocationResult> {
    logger.debug(`[HttpToolClient] POST ${tool.endpoint} (${tool.name})`);

    const response = await this.fetchImpl(tool.endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        ...this.headers,
      },
      body: JSON.stringify({
        userPrompt: request.query,
        sessionId: request.sessionId,
        parameters: request.parameters,
      }),
      signal,
    });

    const body = await readBody(response);

    if (!response.ok) {
      return {
        ok: false,
        status: response.status,
        body,
        error: `${tool.name} returned HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`,
      };
    }

    if (isRecord(body) && typeof body.status === "string" && body.status !== "success") {
      return {
        ok: false,
        status: response.status,
        body,
        error: `${tool.name} reported status "${body.status}"`,
      };
    }

    return { ok: true, status: response.status, body };
  }
}
