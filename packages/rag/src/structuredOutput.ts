import { describeError } from "@lexrag/core";

const FENCED = /```(?:json)?\s*([\s\S]*?)```/i;

export type JsonExtraction = { ok: true; value: unknown } | { ok: false; error: string };

/** Parses a model reply as JSON, preferring the first fenced block when there is one. */
export function extractJson(raw: string): JsonExtraction {
  const fenced = FENCED.exec(raw);
  const body = (fenced?.[1] ?? raw).trim();
  if (!body) return { ok: false, error: "empty reply" };

  try {
    return { ok: true, value: JSON.parse(body) };
  } catch (err) {
    return { ok: false, error: describeError(err) };
  }
}

export function cleanStrings(values: readonly string[]): string[] {
  const out: string[] = [];
  for (const v of values) {
    const t = v.trim();
    if (t && !out.includes(t)) out.push(t);
  }
  return out;
}
