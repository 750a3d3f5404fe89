import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { LlmTransportError, describeError } from "@lexrag/core";
import type { ChatMessage, Completion, CompletionOptions, LlmGateway } from "./gateway.js";

export const GROQ_BASE_URL = "https://api.groq.com/openai/v1";
export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";
export const DEFAULT_GROQ_MODEL = "llama-3.1-8b-instant";

function toOpenAiMessage(m: ChatMessage): ChatCompletionMessageParam {
  switch (m.role) {
    case "system":
      return { role: "system", content: m.content };
    case "user":
      return { role: "user", content: m.content };
    case "assistant":
      return { role: "assistant", content: m.content };
  }
}

/** OpenAI and Groq share the chat-completions wire format; Groq only changes the base URL. */
export class OpenAiGateway implements LlmGateway {
  readonly provider: "openai" | "groq";
  readonly model: string;
  private readonly client: OpenAI;

  constructor(opts: { provider: "openai" | "groq"; apiKey: string; model?: string; client?: OpenAI }) {
    this.provider = opts.provider;
    this.model = opts.model ?? (opts.provider === "groq" ? DEFAULT_GROQ_MODEL : DEFAULT_OPENAI_MODEL);
    this.client =
      opts.client ??
      new OpenAI({
        apiKey: opts.apiKey,
        ...(opts.provider === "groq" && { baseURL: GROQ_BASE_URL }),
      });
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<Completion> {
    try {
      const res = await this.client.chat.completions.create({
        model: options.model ?? this.model,
        messages: messages.map(toOpenAiMessage),
        temperature: options.temperature,
        max_tokens: options.maxTokens,
      });

      const choice = res.choices[0];
      return {
        content: choice?.message?.content ?? "",
        model: res.model,
        ...(res.usage && {
          usage: {
            promptTokens: res.usage.prompt_tokens,
            completionTokens: res.usage.completion_tokens,
            totalTokens: res.usage.total_tokens,
          },
        }),
        ...(choice?.finish_reason && { finishReason: choice.finish_reason }),
      };
    } catch (err) {
      const status = err instanceof OpenAI.APIError ? err.status : undefined;
      throw new LlmTransportError(this.provider, `${this.provider} request failed: ${describeError(err)}`, {
        ...(status !== undefined && { status }),
        cause: err,
      });
    }
  }
}
