import { readFileSync } from "node:fs";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { IntentType, TermCategory } from "@lexrag/core";

const WordList = Type.Array(Type.String());

const IntentLists = Type.Object({
  definition: WordList,
  conditions: WordList,
  permission: WordList,
  obligation: WordList,
  consequence: WordList,
});

export const LexiconSchema = Type.Object({
  stopWords: WordList,
  compoundPhrases: WordList,
  highImportanceTerms: WordList,
  focusTerms: WordList,
  intentMarkers: IntentLists,
  intentKeywords: IntentLists,
  categories: Type.Object({
    concept: WordList,
    action: WordList,
    entity: WordList,
    modifier: WordList,
  }),
  synonyms: Type.Record(Type.String(), WordList),
});

export type LexiconFile = Static<typeof LexiconSchema>;

export type MarkedIntent = Exclude<IntentType, "general">;

/** Detection order; the first intent with a marker in the query wins. */
export const INTENT_ORDER: readonly MarkedIntent[] = [
  "definition",
  "conditions",
  "permission",
  "obligation",
  "consequence",
];

export interface Lexicon {
  readonly stopWords: ReadonlySet<string>;
  readonly compoundPhrases: readonly string[];
  readonly highImportanceTerms: ReadonlySet<string>;
  readonly focusTerms: readonly string[];
  readonly intentMarkers: Readonly<Record<MarkedIntent, readonly string[]>>;
  readonly intentKeywords: Readonly<Record<MarkedIntent, readonly string[]>>;
  readonly categories: ReadonlyMap<string, TermCategory>;
  readonly synonyms: ReadonlyMap<string, readonly string[]>;
}

const lower = (words: string[]): string[] => words.map((w) => w.trim().toLowerCase());

function freezeIntentLists(lists: LexiconFile["intentMarkers"]): Readonly<Record<MarkedIntent, readonly string[]>> {
  return Object.freeze({
    definition: Object.freeze(lower(lists.definition)),
    conditions: Object.freeze(lower(lists.conditions)),
    permission: Object.freeze(lower(lists.permission)),
    obligation: Object.freeze(lower(lists.obligation)),
    consequence: Object.freeze(lower(lists.consequence)),
  });
}

export function parseLexicon(raw: unknown): Lexicon {
  if (!Value.Check(LexiconSchema, raw)) {
    const first = [...Value.Errors(LexiconSchema, raw)][0];
    throw new Error(
      `Invalid lexicon${first ? ` at ${first.path || "/"}: ${first.message}` : ""}`
    );
  }

  const categories = new Map<string, TermCategory>();
  // first listed category wins for a term that appears twice
  for (const category of ["concept", "action", "entity", "modifier"] as const) {
    for (const term of lower(raw.categories[category])) {
      if (!categories.has(term)) categories.set(term, category);
    }
  }

  const synonyms = new Map<string, readonly string[]>();
  for (const [term, list] of Object.entries(raw.synonyms)) {
    synonyms.set(term.toLowerCase(), Object.freeze([...list]));
  }

  return Object.freeze({
    stopWords: new Set(lower(raw.stopWords)),
    compoundPhrases: Object.freeze(lower(raw.compoundPhrases)),
    highImportanceTerms: new Set(lower(raw.highImportanceTerms)),
    focusTerms: Object.freeze(lower(raw.focusTerms)),
    intentMarkers: freezeIntentLists(raw.intentMarkers),
    intentKeywords: freezeIntentLists(raw.intentKeywords),
    categories,
    synonyms,
  });
}

export const DEFAULT_LEXICON_URL = new URL("../data/lexicon.json", import.meta.url);

export function loadLexicon(location: URL | string = DEFAULT_LEXICON_URL): Lexicon {
  const raw: unknown = JSON.parse(readFileSync(location, "utf8"));
  return parseLexicon(raw);
}

/** Shared, read-only vocabulary loaded once per process. */
export const defaultLexicon: Lexicon = loadLexicon();
