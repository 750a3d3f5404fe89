import { createLogger, describeError, type LlmConfig, type LlmProvider } from "@lexrag/core";
import type { LlmGateway } from "./gateway.js";
import { MockLlmGateway } from "./mock.js";
import { OllamaGateway } from "./ollama.js";
import { OpenAiGateway } from "./openai.js";

const log = createLogger("llm");

export function createLlmGateway(config: LlmConfig): LlmGateway {
  switch (config.provider) {
    case "ollama":
      return new OllamaGateway({
        ...(config.baseUrl !== undefined && { baseUrl: config.baseUrl }),
        ...(config.model !== undefined && { model: config.model }),
      });

    case "openai":
    case "groq": {
      if (!config.apiKey) {
        log.warn(`no API key for ${config.provider}; falling back to the mock backend`);
        return new MockLlmGateway();
      }
      return new OpenAiGateway({
        provider: config.provider,
        apiKey: config.apiKey,
        ...(config.model !== undefined && { model: config.model }),
      });
    }

    case "mock":
      return new MockLlmGateway();
  }
}

export type ConnectionStatus =
  | { ok: true; provider: LlmProvider; model: string }
  | { ok: false; provider: LlmProvider; error: string };

/** Sends a one-line prompt and reports whether the backend answered. */
export async function checkLlmConnection(gateway: LlmGateway): Promise<ConnectionStatus> {
  try {
    const res = await gateway.complete([{ role: "user", content: "Hello" }], {
      temperature: 0,
      maxTokens: 10,
    });
    return { ok: true, provider: gateway.provider, model: res.model };
  } catch (err) {
    log.warn("connection check failed", { provider: gateway.provider, error: describeError(err) });
    return { ok: false, provider: gateway.provider, error: describeError(err) };
  }
}
