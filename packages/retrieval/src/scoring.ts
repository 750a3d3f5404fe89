import type { ChunkScore, SearchPattern } from "@lexrag/core";

/**
 * Pattern weights and per-pattern multipliers. The values are tuned by hand;
 * changing them changes ranking for every query.
 */
export const SCORING = {
  exactPhraseWeight: 3.0,
  coreConceptWeight: 2.5,
  synonymWeight: 2.0,
  intentWeight: 1.8,
  broadWeight: 1.0,

  exactPhraseMultiplier: 10,
  coreConceptMultiplier: 8,
  intentMultiplier: 6,
  broadCap: 5,

  /** search terms at or above this weight become core concepts */
  coreTermMinWeight: 1.5,
  /** chunks must score strictly above this to be kept */
  minRelevance: 0.5,
} as const;

/** Sums every pattern's contribution for one chunk. Pure. */
export function scoreChunk(text: string, patterns: readonly SearchPattern[]): ChunkScore {
  const haystack = text.toLowerCase();
  const has = (term: string) => haystack.includes(term.toLowerCase());

  let score = 0;
  const matched: string[] = [];
  const note = (terms: string[]) => {
    for (const t of terms) if (!matched.includes(t)) matched.push(t);
  };

  for (const p of patterns) {
    switch (p.kind) {
      case "exact_phrase": {
        if (has(p.phrase)) {
          score += p.weight * SCORING.exactPhraseMultiplier;
          note([p.phrase]);
        }
        break;
      }
      case "core_concepts": {
        const found = p.concepts.filter(has);
        if (found.length > 0) {
          score += (found.length / p.concepts.length) * p.weight * SCORING.coreConceptMultiplier;
          note(found);
        }
        break;
      }
      case "synonym_expansion": {
        const found = p.terms.filter(has);
        if (found.length > 0) {
          score += p.weight * found.length;
          note(found);
        }
        break;
      }
      case "intent_keywords": {
        const found = p.keywords.filter(has);
        if (found.length > 0) {
          score += p.weight * SCORING.intentMultiplier;
          note(found);
        }
        break;
      }
      case "broad_keywords": {
        const found = p.keywords.filter(has);
        if (found.length > 0) {
          score += Math.min(found.length * p.weight, SCORING.broadCap);
          note(found);
        }
        break;
      }
    }
  }

  return { score, matchedTerms: matched };
}

export function isRelevant(s: ChunkScore): boolean {
  return s.score > SCORING.minRelevance;
}
