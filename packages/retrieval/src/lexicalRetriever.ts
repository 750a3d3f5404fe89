import {
  createLogger,
  describeError,
  type ChunkType,
  type DocumentId,
  type RetrievalMatch,
  type StoredChunk,
} from "@lexrag/core";
import type { ChunkStore } from "@lexrag/store";
import { defaultAnalyzer, type QueryAnalyzer } from "./queryAnalyzer.js";
import { buildSearchPatterns, textFilterTerms } from "./searchPatterns.js";
import { isRelevant, scoreChunk } from "./scoring.js";

const log = createLogger("retriever");

export const SIMILARITY = {
  fullQuery: 0.9,
  leadingWords: 0.7,
  baseline: 0.5,
  leadingWordCount: 3,
} as const;

/**
 * Lexical stand-in for vector similarity: 0.9 when the whole query occurs in the
 * text, 0.7 when its first three words do, 0.5 otherwise.
 */
export function lexicalSimilarity(query: string, text: string): number {
  const q = query.trim().toLowerCase();
  const t = text.toLowerCase();
  if (q.length > 0 && t.includes(q)) return SIMILARITY.fullQuery;

  const lead = q.split(/\s+/).filter(Boolean).slice(0, SIMILARITY.leadingWordCount).join(" ");
  if (lead.length > 0 && t.includes(lead)) return SIMILARITY.leadingWords;

  return SIMILARITY.baseline;
}

function byScoreThenRecency(a: RetrievalMatch, b: RetrievalMatch): number {
  if (b.score !== a.score) return b.score - a.score;
  // undated chunks rank as the oldest
  const ta = a.chunk.createdAt ?? "";
  const tb = b.chunk.createdAt ?? "";
  if (ta === tb) return 0;
  return tb < ta ? -1 : 1;
}

export class LexicalRetriever {
  constructor(
    private readonly store: ChunkStore,
    private readonly analyzer: QueryAnalyzer = defaultAnalyzer
  ) {}

  /**
   * Scores candidate chunks against the query's search patterns and returns
   * at most `limit` of them, best first. Store failures yield [].
   */
  async retrieveRelevantChunks(
    query: string,
    limit: number,
    documentIds?: DocumentId[],
    chunkTypes?: ChunkType[]
  ): Promise<RetrievalMatch[]> {
    if (limit <= 0) return [];

    const analysis = this.analyzer.analyze(query);
    const patterns = buildSearchPatterns(analysis);
    if (patterns.length === 0) {
      log.debug("no search patterns for query", { query });
      return [];
    }

    let candidates: StoredChunk[];
    try {
      candidates = await this.store.getChunks({
        ...(documentIds !== undefined && { documentIds }),
        ...(chunkTypes !== undefined && { chunkTypes }),
        textFilter: textFilterTerms(analysis),
      });
    } catch (err) {
      log.error("chunk store query failed", { query, error: describeError(err) });
      return [];
    }

    const matches: RetrievalMatch[] = [];
    for (const { chunk, document } of candidates) {
      const s = scoreChunk(chunk.text, patterns);
      if (!isRelevant(s)) continue;
      matches.push({
        chunk,
        document,
        score: s.score,
        similarityScore: lexicalSimilarity(query, chunk.text),
        matchedTerms: s.matchedTerms,
      });
    }

    matches.sort(byScoreThenRecency);
    const out = matches.slice(0, limit);

    log.debug(`retrieved ${out.length}/${candidates.length} chunks`, {
      query,
      intent: analysis.intent.type,
    });
    return out;
  }
}
