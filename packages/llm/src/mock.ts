import type { ChatMessage, Completion, CompletionOptions, LlmGateway } from "./gateway.js";

export type MockResponder = (messages: ChatMessage[], options: CompletionOptions) => string;

export const MOCK_MODEL = "mock-model";

function defaultResponse(messages: ChatMessage[]): string {
  const lastUser = [...messages].reverse().find((m) => m.role === "user");
  const preview = (lastUser?.content ?? "").slice(0, 100);
  return `This is a mock response to your query: '${preview}...'. In a real implementation, this would be generated by an AI model.`;
}

/** Offline backend. Without a responder it echoes the last user message. */
export class MockLlmGateway implements LlmGateway {
  readonly provider = "mock" as const;
  readonly model = MOCK_MODEL;
  readonly calls: Array<{ messages: ChatMessage[]; options: CompletionOptions }> = [];

  constructor(private readonly responder?: MockResponder) {}

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<Completion> {
    this.calls.push({ messages, options });
    const content = this.responder ? this.responder(messages, options) : defaultResponse(messages);
    return {
      content,
      model: options.model ?? this.model,
      usage: { promptTokens: 50, completionTokens: 25, totalTokens: 75 },
      finishReason: "stop",
    };
  }
}
