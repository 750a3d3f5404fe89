import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { createLogger, type Assessment, type RetrievalMatch } from "@lexrag/core";
import type { LlmGateway } from "@lexrag/llm";
import { buildContext } from "./context.js";
import { LLM_SETTINGS, assessmentPrompt } from "./prompts.js";
import { cleanStrings, extractJson } from "./structuredOutput.js";

const log = createLogger("assessor");

const AssessmentReply = Type.Object({
  sufficient: Type.Boolean(),
  confidence: Type.Number(),
  missing_info: Type.Optional(Type.String()),
  additional_queries: Type.Optional(Type.Array(Type.String())),
});

export const ASSESSMENT_FALLBACK_NOTE = "Could not assess information sufficiency";

export type AssessmentResult =
  | { kind: "assessed"; assessment: Assessment }
  | { kind: "fallback"; assessment: Assessment; reason: string };

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

export function fallbackAssessment(evidenceCount: number): Assessment {
  const found = evidenceCount > 0;
  return {
    sufficient: found,
    confidence: found ? 0.5 : 0.0,
    missingInfo: ASSESSMENT_FALLBACK_NOTE,
    additionalQueries: [],
  };
}

export class SufficiencyAssessor {
  constructor(private readonly gateway: LlmGateway) {}

  async assess(question: string, evidence: readonly RetrievalMatch[]): Promise<AssessmentResult> {
    const prompt = assessmentPrompt(question, buildContext(evidence));
    const res = await this.gateway.complete([{ role: "user", content: prompt }], {
      ...LLM_SETTINGS.assess,
    });

    const parsed = extractJson(res.content);
    if (!parsed.ok) return this.fallback(evidence, `unparseable reply: ${parsed.error}`);

    const reply = parsed.value;
    if (!Value.Check(AssessmentReply, reply)) {
      return this.fallback(evidence, "reply does not match the assessment shape");
    }

    return {
      kind: "assessed",
      assessment: {
        sufficient: reply.sufficient,
        confidence: clamp01(reply.confidence),
        missingInfo: reply.missing_info ?? "",
        additionalQueries: cleanStrings(reply.additional_queries ?? []),
      },
    };
  }

  private fallback(evidence: readonly RetrievalMatch[], reason: string): AssessmentResult {
    log.warn(`assessment fallback (${reason})`);
    return { kind: "fallback", assessment: fallbackAssessment(evidence.length), reason };
  }
}
