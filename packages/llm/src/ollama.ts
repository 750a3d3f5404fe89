import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { DEFAULT_OLLAMA_BASE_URL, LlmTransportError, describeError } from "@lexrag/core";
import type { ChatMessage, Completion, CompletionOptions, LlmGateway } from "./gateway.js";

export const DEFAULT_OLLAMA_MODEL = "llama3.1:8b";

const OllamaChatResponse = Type.Object({
  model: Type.String(),
  message: Type.Object({ role: Type.String(), content: Type.String() }),
  done_reason: Type.Optional(Type.String()),
  prompt_eval_count: Type.Optional(Type.Number()),
  eval_count: Type.Optional(Type.Number()),
});

function normalizeBaseUrl(url: string): string {
  return url.trim().replace(/\/+$/, "");
}

export class OllamaGateway implements LlmGateway {
  readonly provider = "ollama" as const;
  readonly model: string;
  private readonly baseUrl: string;

  constructor(opts: { baseUrl?: string; model?: string } = {}) {
    this.baseUrl = normalizeBaseUrl(opts.baseUrl ?? DEFAULT_OLLAMA_BASE_URL);
    this.model = (opts.model ?? DEFAULT_OLLAMA_MODEL).trim();
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<Completion> {
    const model = options.model ?? this.model;

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/api/chat`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          model,
          messages,
          stream: false,
          options: {
            temperature: options.temperature,
            num_predict: options.maxTokens,
          },
        }),
      });
    } catch (err) {
      throw new LlmTransportError("ollama", `Ollama unreachable at ${this.baseUrl}: ${describeError(err)}`, {
        cause: err,
      });
    }

    if (!res.ok) {
      const body = await res.text().catch(() => "");
      throw new LlmTransportError(
        "ollama",
        `Ollama chat request failed: ${res.status} ${res.statusText}\n${body}`,
        { status: res.status }
      );
    }

    const data: unknown = await res.json();
    if (!Value.Check(OllamaChatResponse, data)) {
      throw new LlmTransportError("ollama", "Ollama chat response missing `message.content`.");
    }

    const promptTokens = data.prompt_eval_count;
    const completionTokens = data.eval_count;

    return {
      content: data.message.content,
      model: data.model,
      ...(promptTokens !== undefined &&
        completionTokens !== undefined && {
          usage: {
            promptTokens,
            completionTokens,
            totalTokens: promptTokens + completionTokens,
          },
        }),
      ...(data.done_reason !== undefined && { finishReason: data.done_reason }),
    };
  }
}
