/**
 * Stub Tool Client
 *
 * In-process stand-in for tool backends: answers from canned responses
 * keyed by tool name. Used for local development (TOOL_BACKEND=stub) and
 * for registry entries whose endpoint is `stub://<name>`.
 */

import * as fs from "fs";
import { z } from "zod";
import { ConfigError, describeError } from "../errors";
import { logger } from "../logger";
import type { ToolDefinition } from "../registry/types";
import type { ToolClient, ToolInvocationRequest, ToolInvocationResult } from "./types";

const stubResponsesSchema = z.record(z.string(), z.string());

export class StubToolClient implements ToolClient {
  private readonly responses: Readonly<Record<string, string>>;

  constructor(responses: Record<string, string> = {}) {
    this.responses = Object.freeze({ ...responses });
  }

  /**
   * Load canned responses from a JSON object of tool name → answer
   */
  static fromFile(path: string): StubToolClient {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(path, "utf-8"));
    } catch (error) {
      throw new ConfigError(`Cannot read stub responses from ${path}: ${describeError(error)}`);
    }

    const parsed = stubResponsesSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Stub responses in ${path} must map tool names to strings`);
    }

    logger.info(`[StubToolClient] Loaded ${Object.keys(parsed.data).length} canned responses`);
    return new StubToolClient(parsed.data);
  }

  async invoke(
    tool: ToolDefinition,
    request: ToolInvocationRequest,
    signal: AbortSignal
  ): Promise<ToolInvocationResult> {
    if (signal.aborted) {
      return { ok: false, error: `${tool.name} call was cancelled` };
    }

    const answer =
      this.responses[tool.name] ?? `Tool '${tool.name}' executed successfully for: ${request.query}`;

    return {
      ok: true,
      body: { tool: tool.name, status: "success", answer },
    };
  }
}
