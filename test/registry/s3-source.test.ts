import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { NoSuchKey } from "@aws-sdk/client-s3";
import { describe, it, expect, vi, type Mock } from "vitest";
import { RegistryLoadError } from "../../lib/errors";
import {
  isS3Location,
  loadToolRegistryFromS3,
  openToolRegistry,
  parseS3Location,
  type S3Location,
  type S3ObjectReader,
} from "../../lib/registry";

const REGISTRY_DOCUMENT = `
tools:
  - name: IBTAgent
    description: Benefits lookups
    endpoint: http://localhost:8101/invocations
    capabilities: [benefits]
    parameters:
      required: [query]
  - name: ClaimsAgent
    description: Claim status
    endpoint: http://localhost:8102/invocations
    capabilities: [claims]
    parameters:
      required: [query]
`;

function fakeReader(read: (location: S3Location) => Promise<string>): S3ObjectReader & {
  readText: Mock<(location: S3Location) => Promise<string>>;
} {
  return { readText: vi.fn(read) };
}

describe("Tool Registry - S3 source", () => {
  describe("isS3Location()", () => {
    it("should recognise s3:// locations in any case", () => {
      expect(isS3Location("s3://cfg-bucket/tools.yaml")).toBe(true);
      expect(isS3Location("S3://cfg-bucket/tools.yaml")).toBe(true);
      expect(isS3Location("config/tools.yaml")).toBe(false);
    });
  });

  describe("parseS3Location()", () => {
    it("should split the bucket from a nested key", () => {
      expect(parseS3Location("s3://cfg-bucket/routing/tools.yaml")).toEqual({
        bucket: "cfg-bucket",
        key: "routing/tools.yaml",
      });
    });

    it("should reject a location without a key", () => {
      expect(() => parseS3Location("s3://cfg-bucket")).toThrow(RegistryLoadError);
      expect(() => parseS3Location("s3://cfg-bucket/")).toThrow(
        "Invalid S3 location, expected s3://<bucket>/<key> (source: s3://cfg-bucket/)"
      );
    });

    it("should reject a location without a bucket", () => {
      expect(() => parseS3Location("s3:///tools.yaml")).toThrow(RegistryLoadError);
    });
  });

  describe("loadToolRegistryFromS3()", () => {
    it("should parse the fetched object like a local file", async () => {
      const reader = fakeReader(async () => REGISTRY_DOCUMENT);

      const registry = await loadToolRegistryFromS3("s3://cfg-bucket/tools.yaml", reader);

      expect(registry.names()).toEqual(["IBTAgent", "ClaimsAgent"]);
      expect(reader.readText).toHaveBeenCalledWith({ bucket: "cfg-bucket", key: "tools.yaml" });
    });

    it("should report S3 service errors by name", async () => {
      const reader = fakeReader(async () => {
        throw new NoSuchKey({ $metadata: {}, message: "The specified key does not exist." });
      });

      await expect(loadToolRegistryFromS3("s3://cfg-bucket/tools.yaml", reader)).rejects.toThrow(
        "S3 error (NoSuchKey): The specified key does not exist. (source: s3://cfg-bucket/tools.yaml)"
      );
    });

    it("should wrap other fetch failures", async () => {
      const reader = fakeReader(async () => {
        throw new Error("connect ETIMEDOUT");
      });

      const error = await loadToolRegistryFromS3("s3://cfg-bucket/tools.yaml", reader).catch(
        (caught: unknown) => caught
      );

      expect(error).toBeInstanceOf(RegistryLoadError);
      if (error instanceof RegistryLoadError) {
        expect(error.message).toBe(
          "Failed to fetch from S3: connect ETIMEDOUT (source: s3://cfg-bucket/tools.yaml)"
        );
        expect(error.source).toBe("s3://cfg-bucket/tools.yaml");
      }
    });

    it("should reject an invalid document", async () => {
      const reader = fakeReader(async () => "tools: not-a-list");

      await expect(loadToolRegistryFromS3("s3://cfg-bucket/tools.yaml", reader)).rejects.toThrow(
        RegistryLoadError
      );
    });

    it("should not fetch when the location is malformed", async () => {
      const reader = fakeReader(async () => REGISTRY_DOCUMENT);

      await expect(loadToolRegistryFromS3("s3://cfg-bucket", reader)).rejects.toThrow(RegistryLoadError);
      expect(reader.readText).not.toHaveBeenCalled();
    });
  });

  describe("openToolRegistry()", () => {
    it("should read s3:// locations through the configured reader", async () => {
      const reader = fakeReader(async () => REGISTRY_DOCUMENT);

      const registry = await openToolRegistry("s3://cfg-bucket/tools.yaml", { s3Reader: () => reader });

      expect(registry.size).toBe(2);
      expect(reader.readText).toHaveBeenCalledTimes(1);
    });

    it("should read other locations from disk", async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), "registry-"));
      const file = path.join(dir, "tools.yaml");
      fs.writeFileSync(file, REGISTRY_DOCUMENT);
      const s3Reader = vi.fn(() => fakeReader(async () => ""));

      try {
        const registry = await openToolRegistry(file, { s3Reader });

        expect(registry.names()).toEqual(["IBTAgent", "ClaimsAgent"]);
        expect(s3Reader).not.toHaveBeenCalled();
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
