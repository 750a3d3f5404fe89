import { describe, it, expect } from "vitest";
import type { SearchPattern } from "@lexrag/core";
import { isRelevant, scoreChunk } from "./scoring.js";
import { buildSearchPatterns, textFilterTerms } from "./searchPatterns.js";
import { QueryAnalyzer } from "./queryAnalyzer.js";

const patterns: SearchPattern[] = [
  { kind: "exact_phrase", weight: 3, phrase: "base salary" },
  { kind: "core_concepts", weight: 2.5, concepts: ["severance", "notice"] },
  { kind: "synonym_expansion", weight: 2, term: "severance", terms: ["severance", "separation pay"] },
  { kind: "intent_keywords", weight: 1.8, intent: "conditions", keywords: ["if", "upon"] },
  {
    kind: "broad_keywords",
    weight: 1,
    keywords: ["severance", "notice", "salary", "weeks", "employee", "cause"],
  },
];

const text = "Upon termination the Employee receives severance equal to base salary for twelve weeks.";

describe("scoreChunk", () => {
  it("adds every matching pattern's contribution", () => {
    const s = scoreChunk(text, patterns);
    // 30 + 10 + 2 + 10.8 + 4
    expect(s.score).toBeCloseTo(56.8, 10);
    expect(s.matchedTerms).toEqual(["base salary", "severance", "upon", "salary", "weeks", "employee"]);
  });

  it("is deterministic", () => {
    expect(scoreChunk(text, patterns)).toEqual(scoreChunk(text, patterns));
  });

  it("caps the broad keyword contribution", () => {
    const broad: SearchPattern[] = [
      { kind: "broad_keywords", weight: 1, keywords: ["a", "b", "c", "d", "e", "f"] },
    ];
    expect(scoreChunk("a b c d e f", broad).score).toBe(5);
  });

  it("scores unrelated text as zero", () => {
    const s = scoreChunk("Governing law is Delaware.", patterns);
    expect(s).toEqual({ score: 0, matchedTerms: [] });
    expect(isRelevant(s)).toBe(false);
  });
});

describe("isRelevant", () => {
  it("requires a score strictly above the gate", () => {
    expect(isRelevant({ score: 0.5, matchedTerms: [] })).toBe(false);
    expect(isRelevant({ score: 0.51, matchedTerms: [] })).toBe(true);
  });
});

describe("buildSearchPatterns", () => {
  const analysis = new QueryAnalyzer().analyze("What is the severance if terminated without cause?");

  it("orders patterns by weight", () => {
    const built = buildSearchPatterns(analysis);
    expect(built.map((p) => p.kind)).toEqual([
      "exact_phrase",
      "core_concepts",
      "synonym_expansion",
      "synonym_expansion",
      "synonym_expansion",
      "intent_keywords",
      "broad_keywords",
    ]);
    expect(built[1]).toEqual({
      kind: "core_concepts",
      weight: 2.5,
      concepts: ["severance", "terminated", "without cause"],
    });
    expect(built[3]).toEqual({
      kind: "synonym_expansion",
      weight: 2,
      term: "terminated",
      terms: ["terminated", "dismissed", "discharged", "let go", "fired"],
    });
  });

  it("omits intent keywords for general questions", () => {
    const general = new QueryAnalyzer().analyze("severance");
    expect(buildSearchPatterns(general).map((p) => p.kind)).toEqual([
      "core_concepts",
      "synonym_expansion",
      "broad_keywords",
    ]);
  });

  it("builds the candidate text filter from terms, phrases and synonyms", () => {
    expect(textFilterTerms(analysis)).toEqual([
      "severance",
      "terminated",
      "without",
      "cause",
      "without cause",
      "severance pay",
      "separation pay",
      "termination pay",
      "redundancy payment",
      "dismissed",
      "discharged",
      "let go",
      "fired",
      "reason",
      "grounds",
      "justification",
    ]);
  });
});
