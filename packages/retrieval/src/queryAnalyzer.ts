import type { IntentType, QueryAnalysis, QueryIntent, SearchTerm } from "@lexrag/core";
import { defaultLexicon, INTENT_ORDER, type Lexicon, type MarkedIntent } from "./lexicon.js";

export const TERM_WEIGHTS = {
  highImportance: 2.0,
  intentFocus: 1.8,
  longTerm: 1.5,
  base: 1.0,
  /** terms longer than this many characters count as specific */
  longTermMinLength: 8,
  /** tokens this short or shorter are dropped */
  maxIgnoredTokenLength: 2,
} as const;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function wholeWord(marker: string): RegExp {
  return new RegExp(`\\b${escapeRegExp(marker)}\\b`);
}

export class QueryAnalyzer {
  private readonly markerPatterns: ReadonlyArray<{ intent: MarkedIntent; patterns: RegExp[] }>;

  constructor(private readonly lexicon: Lexicon = defaultLexicon) {
    this.markerPatterns = INTENT_ORDER.map((intent) => ({
      intent,
      patterns: lexicon.intentMarkers[intent].map(wholeWord),
    }));
  }

  analyze(query: string): QueryAnalysis {
    const q = query.toLowerCase().trim();
    const intent = this.detectIntent(q);
    const keyTerms = this.extractKeyTerms(q);

    return {
      originalQuery: query,
      intent,
      keyTerms,
      searchTerms: keyTerms.map((t) => this.toSearchTerm(t, intent)),
      phrases: this.extractPhrases(q),
    };
  }

  detectIntent(lowerQuery: string): QueryIntent {
    let type: IntentType = "general";
    for (const { intent, patterns } of this.markerPatterns) {
      if (patterns.some((p) => p.test(lowerQuery))) {
        type = intent;
        break;
      }
    }

    const focus = this.lexicon.focusTerms.filter((f) => lowerQuery.includes(f));
    return { type, focus };
  }

  extractKeyTerms(lowerQuery: string): string[] {
    const words = lowerQuery.replace(/[^\w\s]/g, " ").split(/\s+/).filter(Boolean);

    const terms: string[] = [];
    const seen = new Set<string>();
    const add = (t: string) => {
      if (seen.has(t)) return;
      seen.add(t);
      terms.push(t);
    };

    for (const w of words) {
      if (this.lexicon.stopWords.has(w)) continue;
      if (w.length <= TERM_WEIGHTS.maxIgnoredTokenLength) continue;
      add(w);
    }

    for (let i = 0; i < words.length - 1; i++) {
      const bigram = `${words[i]} ${words[i + 1]}`;
      if (this.lexicon.compoundPhrases.some((p) => p.includes(bigram))) add(bigram);
    }

    return terms;
  }

  extractPhrases(lowerQuery: string): string[] {
    const phrases: string[] = [];

    for (const m of lowerQuery.matchAll(/"([^"]*)"/g)) {
      const quoted = m[1]?.trim();
      if (quoted && !phrases.includes(quoted)) phrases.push(quoted);
    }

    for (const p of this.lexicon.compoundPhrases) {
      if (lowerQuery.includes(p) && !phrases.includes(p)) phrases.push(p);
    }

    return phrases;
  }

  private toSearchTerm(term: string, intent: QueryIntent): SearchTerm {
    let weight: number = TERM_WEIGHTS.base;
    if (this.lexicon.highImportanceTerms.has(term)) weight = TERM_WEIGHTS.highImportance;
    else if (intent.focus.includes(term)) weight = TERM_WEIGHTS.intentFocus;
    else if (term.length > TERM_WEIGHTS.longTermMinLength) weight = TERM_WEIGHTS.longTerm;

    return {
      term,
      weight,
      category: this.lexicon.categories.get(term) ?? "general",
      synonyms: [...(this.lexicon.synonyms.get(term) ?? [])],
    };
  }
}

export const defaultAnalyzer = new QueryAnalyzer();
