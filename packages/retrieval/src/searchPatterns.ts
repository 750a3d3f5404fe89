import type { QueryAnalysis, SearchPattern } from "@lexrag/core";
import { defaultLexicon, type Lexicon } from "./lexicon.js";
import { SCORING } from "./scoring.js";

/**
 * Ordered pattern list for one analysis, highest weight first.
 * Equal weights keep their construction order.
 */
export function buildSearchPatterns(
  analysis: QueryAnalysis,
  lexicon: Lexicon = defaultLexicon
): SearchPattern[] {
  const patterns: SearchPattern[] = [];

  for (const phrase of analysis.phrases) {
    patterns.push({ kind: "exact_phrase", weight: SCORING.exactPhraseWeight, phrase });
  }

  const core = analysis.searchTerms
    .filter((t) => t.weight >= SCORING.coreTermMinWeight)
    .map((t) => t.term);
  if (core.length > 0) {
    patterns.push({ kind: "core_concepts", weight: SCORING.coreConceptWeight, concepts: core });
  }

  for (const t of analysis.searchTerms) {
    if (t.synonyms.length === 0) continue;
    patterns.push({
      kind: "synonym_expansion",
      weight: SCORING.synonymWeight,
      term: t.term,
      terms: [t.term, ...t.synonyms],
    });
  }

  const intent = analysis.intent.type;
  if (intent !== "general") {
    patterns.push({
      kind: "intent_keywords",
      weight: SCORING.intentWeight,
      intent,
      keywords: [...lexicon.intentKeywords[intent]],
    });
  }

  const all = analysis.searchTerms.map((t) => t.term);
  if (all.length > 0) {
    patterns.push({ kind: "broad_keywords", weight: SCORING.broadWeight, keywords: all });
  }

  return patterns.sort((a, b) => b.weight - a.weight);
}

/** Candidate prefilter terms: key terms, phrases and every synonym. */
export function textFilterTerms(analysis: QueryAnalysis): string[] {
  const out = new Set<string>([...analysis.keyTerms, ...analysis.phrases]);
  for (const t of analysis.searchTerms) for (const s of t.synonyms) out.add(s);
  return [...out];
}
