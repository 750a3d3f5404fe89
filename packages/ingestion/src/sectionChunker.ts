import crypto from "node:crypto";
import type { Chunk, RawDocument } from "@lexrag/core";
import { classifyChunk } from "./chunkClassifier.js";

export const DEFAULT_MAX_CHUNK_CHARS = 1500;

function sha256(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

type Span = { start: number; end: number; headingOnly: boolean };

const HEADING = /^(?:(?:section|article)\s+[\divxlc]+\b|#{1,6}\s+\S)/i;
const CLAUSE = /^\d+\.(?:\d+\.?)*\s+\S/;

export function isHeadingLine(line: string): boolean {
  return HEADING.test(line.trim());
}

export function isClauseStart(line: string): boolean {
  return CLAUSE.test(line.trim());
}

/**
 * Splits on blank lines, headings and numbered clauses. Spans exclude surrounding
 * whitespace so that content.slice(start, end) is the chunk text.
 */
function splitSections(content: string): Span[] {
  const spans: Span[] = [];
  let cur: { start: number; end: number; lines: number; heading: boolean } | null = null;

  const flush = () => {
    if (cur) spans.push({ start: cur.start, end: cur.end, headingOnly: cur.heading && cur.lines === 1 });
    cur = null;
  };

  let offset = 0;
  for (const raw of content.split("\n")) {
    const lineStart = offset;
    offset += raw.length + 1;

    const trimmed = raw.trim();
    if (!trimmed) {
      flush();
      continue;
    }

    const heading = isHeadingLine(trimmed);
    if (heading || isClauseStart(trimmed)) flush();

    const start = lineStart + (raw.length - raw.trimStart().length);
    const end = lineStart + raw.trimEnd().length;

    if (cur) {
      cur.end = end;
      cur.lines += 1;
    } else {
      cur = { start, end, lines: 1, heading };
    }
  }
  flush();

  return spans;
}

/** A heading standing alone is joined to the section that follows it. */
function attachHeadings(spans: Span[]): Span[] {
  const out: Span[] = [];
  let pending: Span | null = null;

  for (const s of spans) {
    if (s.headingOnly) {
      const joined: Span = pending ? { ...pending, end: s.end } : s;
      pending = joined;
      continue;
    }
    out.push({ start: pending ? pending.start : s.start, end: s.end, headingOnly: false });
    pending = null;
  }
  if (pending) out.push(pending);

  return out;
}

function isSpace(ch: string): boolean {
  return /\s/.test(ch);
}

/** Cuts spans longer than maxChars at the last whitespace before the limit. */
function capSize(content: string, span: Span, maxChars: number): Span[] {
  const out: Span[] = [];
  let start = span.start;

  while (span.end - start > maxChars) {
    const head = content.slice(start, start + maxChars);
    const lastSpace = head.search(/\s\S*$/);
    let cut = lastSpace > 0 ? start + lastSpace : start + maxChars;

    let end = cut;
    while (end > start && isSpace(content.charAt(end - 1))) end--;
    out.push({ start, end, headingOnly: false });

    while (cut < span.end && isSpace(content.charAt(cut))) cut++;
    start = cut;
  }

  if (span.end > start) out.push({ start, end: span.end, headingOnly: false });
  return out;
}

export function chunkLegalDocument(doc: RawDocument, opts?: { maxChars?: number }): Chunk[] {
  const maxChars = Math.max(1, opts?.maxChars ?? DEFAULT_MAX_CHUNK_CHARS);

  const spans = attachHeadings(splitSections(doc.content)).flatMap((s) =>
    capSize(doc.content, s, maxChars)
  );

  return spans.map((s, i) => {
    const text = doc.content.slice(s.start, s.end);
    const id = sha256(`${doc.id}:${i}:${sha256(text)}`);
    return {
      id,
      documentId: doc.id,
      text,
      chunkType: classifyChunk(text),
      startChar: s.start,
      endChar: s.end,
    };
  });
}
