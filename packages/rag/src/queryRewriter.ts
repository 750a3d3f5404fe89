import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { createLogger } from "@lexrag/core";
import type { LlmGateway } from "@lexrag/llm";
import { LLM_SETTINGS, rewritePrompt } from "./prompts.js";
import { cleanStrings, extractJson } from "./structuredOutput.js";

const log = createLogger("rewriter");

export const MAX_REWRITTEN_QUERIES = 3;

const QueryList = Type.Array(Type.String());

export type RewriteResult =
  | { kind: "rewritten"; queries: string[] }
  | { kind: "fallback"; queries: string[]; reason: string };

export class QueryRewriter {
  constructor(private readonly gateway: LlmGateway) {}

  /** Transport errors propagate; anything unparseable falls back to the question itself. */
  async rewrite(question: string): Promise<RewriteResult> {
    const res = await this.gateway.complete([{ role: "user", content: rewritePrompt(question) }], {
      ...LLM_SETTINGS.rewrite,
    });

    const parsed = extractJson(res.content);
    if (!parsed.ok) return this.fallback(question, `unparseable reply: ${parsed.error}`);
    const reply = parsed.value;
    if (!Value.Check(QueryList, reply)) return this.fallback(question, "reply is not a string array");

    const queries = cleanStrings(reply).slice(0, MAX_REWRITTEN_QUERIES);
    if (queries.length === 0) return this.fallback(question, "no queries in reply");

    log.debug("rewrote question", { queries });
    return { kind: "rewritten", queries };
  }

  private fallback(question: string, reason: string): RewriteResult {
    log.warn(`using original question as the only query (${reason})`);
    return { kind: "fallback", queries: [question], reason };
  }
}
