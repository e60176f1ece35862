import { describe, it, expect } from "vitest";
import { RegistryLoadError } from "../../lib/errors";
import { ToolRegistry, loadToolRegistry, parseToolRegistry } from "../../lib/registry/tool-registry";
import { makeTool } from "../helpers/fakes";

const VALID_DOCUMENT = `
tools:
  - name: IBTAgent
    description: Benefits lookups
    endpoint: http://localhost:8101/invocations
    capabilities: [benefits_lookup]
    parameters:
      required: [query]
  - name: EchoTool
    description: Canned answers
    endpoint: stub://echo
    capabilities: []
    parameters:
      required: []
      optional: [tone]
    examples:
      - prompt: say something
`;

describe("Tool Registry - Loading", () => {
  describe("parseToolRegistry()", () => {
    it("should load every valid entry keyed by name", () => {
      const registry = parseToolRegistry(VALID_DOCUMENT, "inline");

      expect(registry.size).toBe(2);
      expect(registry.names()).toEqual(["IBTAgent", "EchoTool"]);
      expect(registry.lookup("EchoTool")?.endpoint).toBe("stub://echo");
    });

    it("should default optional parameters and examples to empty lists", () => {
      const registry = parseToolRegistry(VALID_DOCUMENT, "inline");
      const tool = registry.lookup("IBTAgent");

      expect(tool?.parameters.optional).toEqual([]);
      expect(tool?.examples).toEqual([]);
    });

    it("should accept an empty tools list", () => {
      const registry = parseToolRegistry("tools: []\n", "inline");
      expect(registry.size).toBe(0);
    });

    it("should reject malformed YAML", () => {
      expect(() => parseToolRegistry("tools: [\n  - name: X", "bad.yaml")).toThrow(RegistryLoadError);
      expect(() => parseToolRegistry("tools: [\n  - name: X", "bad.yaml")).toThrow(/Failed to parse YAML/);
    });

    it("should reject a document without a tools list", () => {
      expect(() => parseToolRegistry("agents: []\n", "doc.yaml")).toThrow(
        /Registry must be a mapping with a top-level 'tools' list/
      );
    });

    it("should name the invalid field and index for a bad entry", () => {
      const text = `
tools:
  - name: Broken
    description: Missing the endpoint
    capabilities: []
    parameters:
      required: []
`;
      expect(() => parseToolRegistry(text, "tools.yaml")).toThrow(
        "Invalid tool at index 0: endpoint: Required (source: tools.yaml)"
      );
    });

    it("should reject endpoints that are not http(s) or stub URLs", () => {
      const text = `
tools:
  - name: Ftp
    description: Wrong scheme
    endpoint: ftp://example.test/tool
    capabilities: []
    parameters:
      required: []
`;
      expect(() => parseToolRegistry(text, "tools.yaml")).toThrow(
        "Invalid tool at index 0: endpoint: endpoint must be an http(s) URL or a stub:// identifier (source: tools.yaml)"
      );
    });

    it("should reject duplicate tool names", () => {
      const text = `
tools:
  - name: Twin
    description: First
    endpoint: stub://a
    capabilities: []
    parameters: { required: [] }
  - name: Twin
    description: Second
    endpoint: stub://b
    capabilities: []
    parameters: { required: [] }
`;
      expect(() => parseToolRegistry(text, "tools.yaml")).toThrow(
        "Duplicate tool name at index 1: Twin (source: tools.yaml)"
      );
    });
  });

  describe("loadToolRegistry()", () => {
    it("should load the bundled registry file", () => {
      const registry = loadToolRegistry("config/tools.yaml");

      expect(registry.names()).toEqual(["IBTAgent", "ClaimsAgent", "SupportAgent", "DocumentAgent"]);
      expect(registry.lookup("ClaimsAgent")?.parameters.optional).toEqual(["claimId"]);
    });

    it("should fail with the path when the file is missing", () => {
      let caught: unknown;
      try {
        loadToolRegistry("config/does-not-exist.yaml");
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(RegistryLoadError);
      if (caught instanceof RegistryLoadError) {
        expect(caught.source).toBe("config/does-not-exist.yaml");
        expect(caught.code).toBe("REGISTRY_LOAD_FAILED");
        expect(caught.message).toBe("Tool registry file not found (source: config/does-not-exist.yaml)");
      }
    });
  });
});

describe("Tool Registry - Lookup", () => {
  const registry = new ToolRegistry([makeTool(), makeTool({ name: "ClaimsAgent", capabilities: ["claims"] })]);

  it("should return undefined for unknown names", () => {
    expect(registry.lookup("Nope")).toBeUndefined();
    expect(registry.has("Nope")).toBe(false);
    expect(registry.has("IBTAgent")).toBe(true);
  });

  it("should list capabilities per tool", () => {
    expect(registry.capabilities()).toEqual({
      IBTAgent: ["benefits", "coverage", "deductibles"],
      ClaimsAgent: ["claims"],
    });
  });

  it("should hand out the same frozen snapshot to every caller", () => {
    const first = registry.snapshot();
    const second = registry.snapshot();

    expect(first).toBe(second);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.IBTAgent)).toBe(true);
    expect(Object.isFrozen(first.IBTAgent.capabilities)).toBe(true);
  });
});
