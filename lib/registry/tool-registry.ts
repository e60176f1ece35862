/**
 * Tool Registry - Centralized tool definition management
 *
 * Provides:
 * - Loading and validating the YAML registry document
 * - Lookup by tool name
 * - Capability listing for prompts and health output
 *
 * The registry is loaded once at startup and is read-only afterwards;
 * every definition is frozen so requests can share it without copying.
 */

import * as fs from "fs";
import { parse as parseYaml } from "yaml";
import type { ZodIssue } from "zod";
import { RegistryLoadError, describeError } from "../errors";
import { logger } from "../logger";
import {
  registryDocumentSchema,
  toolDefinitionSchema,
  type RegistrySnapshot,
  type ToolDefinition,
} from "./types";

function freezeDefinition(tool: ToolDefinition): ToolDefinition {
  Object.freeze(tool.parameters.required);
  Object.freeze(tool.parameters.optional);
  Object.freeze(tool.parameters);
  Object.freeze(tool.capabilities);
  tool.examples.forEach((example) => Object.freeze(example));
  Object.freeze(tool.examples);
  return Object.freeze(tool);
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export class ToolRegistry {
  private readonly byName: Map<string, ToolDefinition>;
  private readonly snapshotRecord: RegistrySnapshot;

  constructor(tools: ToolDefinition[]) {
    this.byName = new Map();
    const record: Record<string, ToolDefinition> = {};

    for (const tool of tools) {
      const frozen = Object.isFrozen(tool) ? tool : freezeDefinition(tool);
      this.byName.set(frozen.name, frozen);
      record[frozen.name] = frozen;
    }

    this.snapshotRecord = Object.freeze(record);
  }

  get size(): number {
    return this.byName.size;
  }

  /**
   * Get a tool definition by name (undefined when not registered)
   */
  lookup(name: string): ToolDefinition | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  names(): string[] {
    return Array.from(this.byName.keys());
  }

  /**
   * Tool name → capability tags
   */
  capabilities(): Record<string, readonly string[]> {
    const result: Record<string, readonly string[]> = {};
    for (const tool of this.byName.values()) {
      result[tool.name] = tool.capabilities;
    }
    return result;
  }

  /**
   * Read-only name → definition record shared by every request
   */
  snapshot(): RegistrySnapshot {
    return this.snapshotRecord;
  }
}

/**
 * Validate a registry document already held in memory
 *
 * @param text - YAML document with a top-level `tools` list
 * @param source - Label used in error messages (usually the file path)
 * @throws RegistryLoadError on malformed YAML or any invalid entry
 */
export function parseToolRegistry(text: string, source: string): ToolRegistry {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new RegistryLoadError(source, `Failed to parse YAML: ${describeError(error)}`, {
      cause: error,
    });
  }

  const document = registryDocumentSchema.safeParse(raw);
  if (!document.success) {
    throw new RegistryLoadError(
      source,
      `Registry must be a mapping with a top-level 'tools' list (${formatIssues(document.error.issues)})`
    );
  }

  const tools: ToolDefinition[] = [];
  const seen = new Set<string>();

  document.data.tools.forEach((entry, index) => {
    const parsed = toolDefinitionSchema.safeParse(entry);
    if (!parsed.success) {
      throw new RegistryLoadError(
        source,
        `Invalid tool at index ${index}: ${formatIssues(parsed.error.issues)}`
      );
    }
    if (seen.has(parsed.data.name)) {
      throw new RegistryLoadError(
        source,
        `Duplicate tool name at index ${index}: ${parsed.data.name}`
      );
    }
    seen.add(parsed.data.name);
    tools.push(parsed.data);
  });

  return new ToolRegistry(tools);
}

/**
 * Load tool definitions from a local YAML file
 *
 * @throws RegistryLoadError if the file is missing, unreadable or invalid
 */
export function loadToolRegistry(path: string): ToolRegistry {
  logger.info(`[ToolRegistry] Loading tools from ${path}`);

  if (!fs.existsSync(path)) {
    throw new RegistryLoadError(path, "Tool registry file not found");
  }

  let text: string;
  try {
    text = fs.readFileSync(path, "utf-8");
  } catch (error) {
    throw new RegistryLoadError(path, `Failed to read file: ${describeError(error)}`, {
      cause: error,
    });
  }

  const registry = parseToolRegistry(text, path);
  logger.success("ToolRegistry", `Loaded ${registry.size} tools: ${registry.names().join(", ")}`);
  return registry;
}
