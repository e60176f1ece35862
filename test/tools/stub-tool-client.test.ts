import { describe, it, expect } from "vitest";
import { ConfigError } from "../../lib/errors";
import { createToolClient, isStubEndpoint } from "../../lib/tools";
import { StubToolClient } from "../../lib/tools/stub-tool-client";
import { fakeToolClient, makeTool } from "../helpers/fakes";

const REQUEST = { query: "What is covered?", sessionId: "session-1", parameters: {} };

describe("Stub Tool Client", () => {
  it("should answer from the canned responses", async () => {
    const client = new StubToolClient({ IBTAgent: "Preventive care is covered." });

    const result = await client.invoke(makeTool(), REQUEST, new AbortController().signal);

    expect(result).toEqual({
      ok: true,
      body: { tool: "IBTAgent", status: "success", answer: "Preventive care is covered." },
    });
  });

  it("should echo the query for tools without a canned response", async () => {
    const client = new StubToolClient();

    const result = await client.invoke(makeTool({ name: "EchoTool" }), REQUEST, new AbortController().signal);

    expect(result.body).toEqual({
      tool: "EchoTool",
      status: "success",
      answer: "Tool 'EchoTool' executed successfully for: What is covered?",
    });
  });

  it("should not answer once the call is cancelled", async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await new StubToolClient().invoke(makeTool(), REQUEST, controller.signal);

    expect(result).toEqual({ ok: false, error: "IBTAgent call was cancelled" });
  });

  it("should load the bundled responses file", async () => {
    const client = StubToolClient.fromFile("data/stub-responses.json");

    const result = await client.invoke(makeTool(), REQUEST, new AbortController().signal);

    expect(result.body).toEqual({
      tool: "IBTAgent",
      status: "success",
      answer:
        "Your insurance benefits include coverage for preventive care, hospitalization, and emergency services. Your current deductible is $1,500 with 80/20 coinsurance after deductible.",
    });
  });

  it("should raise a ConfigError for a missing responses file", () => {
    expect(() => StubToolClient.fromFile("data/missing.json")).toThrow(ConfigError);
  });
});

describe("Tool Client Selection", () => {
  it("should recognise stub endpoints", () => {
    expect(isStubEndpoint("stub://echo")).toBe(true);
    expect(isStubEndpoint("STUB://echo")).toBe(true);
    expect(isStubEndpoint("http://localhost:8101/invocations")).toBe(false);
  });

  it("should send stub endpoints to the stub even with the http backend", async () => {
    const http = fakeToolClient({ ok: true, body: "from http" });
    const stub = fakeToolClient({ ok: true, body: "from stub" });
    const client = createToolClient("http", { http, stub });
    const signal = new AbortController().signal;

    const viaStub = await client.invoke(makeTool({ endpoint: "stub://ibt" }), REQUEST, signal);
    const viaHttp = await client.invoke(makeTool(), REQUEST, signal);

    expect(viaStub.body).toBe("from stub");
    expect(viaHttp.body).toBe("from http");
  });

  it("should send everything to the stub backend when configured", async () => {
    const http = fakeToolClient({ ok: true, body: "from http" });
    const stub = fakeToolClient({ ok: true, body: "from stub" });
    const client = createToolClient("stub", { http, stub });

    await client.invoke(makeTool(), REQUEST, new AbortController().signal);

    expect(stub.invoke).toHaveBeenCalledTimes(1);
    expect(http.invoke).not.toHaveBeenCalled();
  });
});
