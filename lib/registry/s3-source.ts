/**
 * Remote registry source - `s3://bucket/key`
 *
 * The object is read as UTF-8 YAML and validated by `parseToolRegistry`.
 */

import { GetObjectCommand, S3Client, S3ServiceException } from "@aws-sdk/client-s3";
import { RegistryLoadError, describeError } from "../errors";
import { logger } from "../logger";
import { parseToolRegistry, type ToolRegistry } from "./tool-registry";

export const S3_LOCATION_PREFIX = "s3://";

export interface S3Location {
  bucket: string;
  key: string;
}

/**
 * Fetches one object body as text. Backed by the AWS SDK in production and
 * by an in-memory fake in tests.
 */
export interface S3ObjectReader {
  readText(location: S3Location): Promise<string>;
}

export function isS3Location(location: string): boolean {
  return location.toLowerCase().startsWith(S3_LOCATION_PREFIX);
}

/**
 * @throws RegistryLoadError when the bucket or key is missing
 */
export function parseS3Location(location: string): S3Location {
  const rest = location.slice(S3_LOCATION_PREFIX.length);
  const slash = rest.indexOf("/");
  const bucket = slash === -1 ? rest : rest.slice(0, slash);
  const key = slash === -1 ? "" : rest.slice(slash + 1);

  if (bucket.length === 0 || key.length === 0) {
    throw new RegistryLoadError(location, "Invalid S3 location, expected s3://<bucket>/<key>");
  }
  return { bucket, key };
}

export class S3ClientObjectReader implements S3ObjectReader {
  private readonly client: S3Client;

  constructor(options: { region?: string; client?: S3Client } = {}) {
    this.client = options.client ?? new S3Client({ region: options.region });
  }

  async readText({ bucket, key }: S3Location): Promise<string> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!response.Body) {
      throw new Error("S3 object has no body");
    }
    return response.Body.transformToString("utf-8");
  }
}

/**
 * Load tool definitions from a YAML object in S3
 *
 * @throws RegistryLoadError if the object cannot be fetched or is invalid
 */
export async function loadToolRegistryFromS3(
  location: string,
  reader: S3ObjectReader
): Promise<ToolRegistry> {
  const target = parseS3Location(location);
  logger.info(`[ToolRegistry] Loading tools from ${location}`);

  let text: string;
  try {
    text = await reader.readText(target);
  } catch (error) {
    if (error instanceof S3ServiceException) {
      throw new RegistryLoadError(location, `S3 error (${error.name}): ${error.message}`, {
        cause: error,
      });
    }
    throw new RegistryLoadError(location, `Failed to fetch from S3: ${describeError(error)}`, {
      cause: error,
    });
  }

  const registry = parseToolRegistry(text, location);
  logger.success("ToolRegistry", `Loaded ${registry.size} tools from S3: ${registry.names().join(", ")}`);
  return registry;
}
