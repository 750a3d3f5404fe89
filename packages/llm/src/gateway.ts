import type { LlmProvider, TokenUsage } from "@lexrag/core";

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type CompletionOptions = {
  temperature: number;
  maxTokens: number;
  /** overrides the gateway's default model for this call */
  model?: string;
};

export type Completion = {
  content: string;
  model: string;
  usage?: TokenUsage;
  finishReason?: string;
};

/**
 * One chat-completion contract for every backend. Implementations throw
 * LlmTransportError when the provider cannot be reached or rejects the call.
 */
export interface LlmGateway {
  readonly provider: LlmProvider;
  readonly model: string;
  complete(messages: ChatMessage[], options: CompletionOptions): Promise<Completion>;
}
