/**
 * Tool Registry
 *
 * `TOOL_REGISTRY_PATH` is either a local YAML file or an `s3://bucket/key`
 * object; both go through `parseToolRegistry`.
 */

import {
  S3ClientObjectReader,
  isS3Location,
  loadToolRegistryFromS3,
  type S3ObjectReader,
} from "./s3-source";
import { loadToolRegistry, type ToolRegistry } from "./tool-registry";

export { ToolRegistry, loadToolRegistry, parseToolRegistry } from "./tool-registry";
export {
  S3ClientObjectReader,
  isS3Location,
  loadToolRegistryFromS3,
  parseS3Location,
  type S3Location,
  type S3ObjectReader,
} from "./s3-source";
export type { RegistrySnapshot, ToolDefinition } from "./types";

export interface OpenToolRegistryOptions {
  /** Builds the S3 reader, only called for `s3://` locations */
  s3Reader?: () => S3ObjectReader;
}

/**
 * Load the registry from a file path or an `s3://` location
 *
 * @throws RegistryLoadError on any failure
 */
export async function openToolRegistry(
  location: string,
  options: OpenToolRegistryOptions = {}
): Promise<ToolRegistry> {
  if (isS3Location(location)) {
    const reader = options.s3Reader ? options.s3Reader() : new S3ClientObjectReader();
    return loadToolRegistryFromS3(location, reader);
  }
  return loadToolRegistry(location);
}
