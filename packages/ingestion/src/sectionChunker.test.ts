import { describe, expect, it } from "vitest";
import type { RawDocument } from "@lexrag/core";
import { chunkLegalDocument, isClauseStart, isHeadingLine } from "./sectionChunker.js";

const content = [
  "EMPLOYMENT AGREEMENT",
  "",
  "SECTION 1. DEFINITIONS",
  '"Cause" means gross misconduct or material breach.',
  "",
  "SECTION 2. COMPENSATION",
  "2.1 Base Salary. Employee receives an annual base salary of $90,000.",
  "2.2 Bonus. Employee may receive a discretionary bonus.",
  "",
  "SECTION 3. TERMINATION",
  "Severance: If terminated without cause, Employee receives three (3) months base salary.",
  "",
].join("\n");

const doc: RawDocument = { id: "doc-1", filename: "employment.txt", fileType: "text", content };

describe("chunkLegalDocument", () => {
  const chunks = chunkLegalDocument(doc);

  it("splits on blank lines, headings and numbered clauses", () => {
    expect(chunks.map((c) => c.text)).toEqual([
      "EMPLOYMENT AGREEMENT",
      'SECTION 1. DEFINITIONS\n"Cause" means gross misconduct or material breach.',
      "SECTION 2. COMPENSATION\n2.1 Base Salary. Employee receives an annual base salary of $90,000.",
      "2.2 Bonus. Employee may receive a discretionary bonus.",
      "SECTION 3. TERMINATION\nSeverance: If terminated without cause, Employee receives three (3) months base salary.",
    ]);
  });

  it("records exact offsets", () => {
    expect(chunks[0]).toMatchObject({ startChar: 0, endChar: 20 });
    for (const c of chunks) {
      expect(content.slice(c.startChar, c.endChar)).toBe(c.text);
      expect(c.documentId).toBe("doc-1");
    }
  });

  it("tags every chunk", () => {
    expect(chunks.map((c) => c.chunkType)).toEqual([
      "general",
      "definition",
      "compensation",
      "compensation",
      "termination",
    ]);
  });

  it("produces stable, distinct ids", () => {
    const again = chunkLegalDocument(doc);
    expect(again.map((c) => c.id)).toEqual(chunks.map((c) => c.id));
    expect(new Set(chunks.map((c) => c.id)).size).toBe(chunks.length);
  });

  it("caps oversized sections at whitespace", () => {
    const small: RawDocument = { ...doc, content: "alpha beta gamma delta" };
    expect(chunkLegalDocument(small, { maxChars: 11 }).map((c) => [c.text, c.startChar, c.endChar])).toEqual([
      ["alpha beta", 0, 10],
      ["gamma delta", 11, 22],
    ]);

    const word: RawDocument = { ...doc, content: "abcdefghij" };
    expect(chunkLegalDocument(word, { maxChars: 4 }).map((c) => c.text)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("handles CRLF line endings and an empty document", () => {
    const crlf: RawDocument = { ...doc, content: "ARTICLE IV\r\nThe Company may assign this Agreement.\r\n" };
    const [only] = chunkLegalDocument(crlf);
    expect(only?.text).toBe("ARTICLE IV\r\nThe Company may assign this Agreement.");
    expect(only?.chunkType).toBe("permission");

    expect(chunkLegalDocument({ ...doc, content: "\n\n  \n" })).toEqual([]);
  });
});

describe("line predicates", () => {
  it("recognises headings", () => {
    expect(isHeadingLine("SECTION 5. TERMINATION")).toBe(true);
    expect(isHeadingLine("Article XII")).toBe(true);
    expect(isHeadingLine("## Payment terms")).toBe(true);
    expect(isHeadingLine("Section covers the following")).toBe(false);
  });

  it("recognises numbered clauses", () => {
    expect(isClauseStart("5.1 The Employee shall")).toBe(true);
    expect(isClauseStart("3. Notice")).toBe(true);
    expect(isClauseStart("3 months of salary")).toBe(false);
  });
});
