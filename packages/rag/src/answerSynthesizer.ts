import type { RetrievalMatch, TokenUsage } from "@lexrag/core";
import type { LlmGateway } from "@lexrag/llm";
import { buildContext } from "./context.js";
import { LLM_SETTINGS, SYNTHESIS_SYSTEM_PROMPT, synthesisPrompt } from "./prompts.js";

export const NOT_FOUND_ANSWER =
  "I could not find information relevant to your question in the available documents. " +
  "Try rephrasing the question, or add documents that cover this topic.";

export type SynthesisResult =
  | { kind: "answer"; content: string; model: string; usage?: TokenUsage }
  | { kind: "not_found"; content: string };

export class AnswerSynthesizer {
  constructor(private readonly gateway: LlmGateway) {}

  async synthesize(question: string, evidence: readonly RetrievalMatch[]): Promise<SynthesisResult> {
    if (evidence.length === 0) return { kind: "not_found", content: NOT_FOUND_ANSWER };

    const res = await this.gateway.complete(
      [
        { role: "system", content: SYNTHESIS_SYSTEM_PROMPT },
        { role: "user", content: synthesisPrompt(question, buildContext(evidence)) },
      ],
      { ...LLM_SETTINGS.synthesize }
    );

    return {
      kind: "answer",
      content: res.content.trim(),
      model: res.model,
      ...(res.usage !== undefined && { usage: res.usage }),
    };
  }
}
