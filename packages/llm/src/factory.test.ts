import { describe, expect, it, vi } from "vitest";
import OpenAI from "openai";
import { LlmTransportError } from "@lexrag/core";
import { checkLlmConnection, createLlmGateway } from "./factory.js";
import { MockLlmGateway } from "./mock.js";
import { OllamaGateway } from "./ollama.js";
import { OpenAiGateway } from "./openai.js";

describe("createLlmGateway", () => {
  it("selects the backend by provider", () => {
    expect(createLlmGateway({ provider: "ollama", model: "qwen2.5" })).toBeInstanceOf(OllamaGateway);
    expect(createLlmGateway({ provider: "mock" })).toBeInstanceOf(MockLlmGateway);

    const groq = createLlmGateway({ provider: "groq", apiKey: "test-secret" });
    expect(groq).toBeInstanceOf(OpenAiGateway);
    expect(groq.provider).toBe("groq");
    expect(groq.model).toBe("llama-3.1-8b-instant");
  });

  it("falls back to the mock backend without an API key", () => {
    const gateway = createLlmGateway({ provider: "openai" });
    expect(gateway).toBeInstanceOf(MockLlmGateway);
    expect(gateway.provider).toBe("mock");
  });
});

describe("MockLlmGateway", () => {
  it("echoes the last user message by default", async () => {
    const gateway = new MockLlmGateway();
    const res = await gateway.complete(
      [
        { role: "system", content: "You are a legal assistant." },
        { role: "user", content: "What is the notice period?" },
      ],
      { temperature: 0.3, maxTokens: 100 }
    );

    expect(res).toEqual({
      content:
        "This is a mock response to your query: 'What is the notice period?...'. In a real implementation, this would be generated by an AI model.",
      model: "mock-model",
      usage: { promptTokens: 50, completionTokens: 25, totalTokens: 75 },
      finishReason: "stop",
    });
  });

  it("records calls and uses the responder", async () => {
    const gateway = new MockLlmGateway(() => "scripted");
    const res = await gateway.complete([{ role: "user", content: "q" }], {
      temperature: 0.2,
      maxTokens: 300,
      model: "override",
    });
    expect(res.content).toBe("scripted");
    expect(res.model).toBe("override");
    expect(gateway.calls[0]?.options).toEqual({ temperature: 0.2, maxTokens: 300, model: "override" });
  });
});

describe("OpenAiGateway", () => {
  it("maps API errors to transport errors", async () => {
    const client = new OpenAI({ apiKey: "test-secret", maxRetries: 0 });
    vi.spyOn(client.chat.completions, "create").mockRejectedValue(
      new OpenAI.APIError(503, undefined, "Service unavailable", undefined)
    );

    const gateway = new OpenAiGateway({ provider: "groq", apiKey: "test-secret", client });
    const err = await gateway
      .complete([{ role: "user", content: "hi" }], { temperature: 0, maxTokens: 5 })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(LlmTransportError);
    expect(err).toMatchObject({ provider: "groq", status: 503 });
  });
});

describe("checkLlmConnection", () => {
  it("reports the answering model", async () => {
    expect(await checkLlmConnection(new MockLlmGateway(() => "Hi"))).toEqual({
      ok: true,
      provider: "mock",
      model: "mock-model",
    });
  });

  it("reports failures instead of throwing", async () => {
    const failing = new MockLlmGateway(() => {
      throw new LlmTransportError("mock", "offline");
    });
    expect(await checkLlmConnection(failing)).toEqual({ ok: false, provider: "mock", error: "offline" });
  });
});
