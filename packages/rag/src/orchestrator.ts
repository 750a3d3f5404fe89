import {
  DEFAULT_RAG,
  createLogger,
  describeError,
  type ChunkType,
  type DocumentId,
  type RAGRequest,
  type RAGResult,
  type RagDefaults,
  type RetrievalMatch,
  type RoundSummary,
  type SessionId,
} from "@lexrag/core";
import type { LlmGateway } from "@lexrag/llm";
import type { HistoryStore } from "@lexrag/store";
import { AnswerSynthesizer } from "./answerSynthesizer.js";
import { toSourceCitation } from "./context.js";
import { QueryRewriter } from "./queryRewriter.js";
import { SufficiencyAssessor } from "./sufficiencyAssessor.js";

const log = createLogger("rag");

/** An assessment must be sufficient and above this confidence to stop early. */
export const CONFIDENCE_CUTOFF = 0.7;

export interface ChunkRetriever {
  retrieveRelevantChunks(
    query: string,
    limit: number,
    documentIds?: DocumentId[],
    chunkTypes?: ChunkType[]
  ): Promise<RetrievalMatch[]>;
}

export type OrchestratorDeps = {
  retriever: ChunkRetriever;
  gateway: LlmGateway;
  history?: HistoryStore;
  defaults?: RagDefaults;
};

function wholeAtLeastOne(n: number | undefined, fallback: number): number {
  if (n === undefined || !Number.isFinite(n)) return fallback;
  return Math.max(1, Math.floor(n));
}

/**
 * Rewrite → retrieve → assess, repeated until the evidence is judged sufficient,
 * the assessor has nothing more to search for, or the round cap is hit; then one
 * synthesis call over everything gathered.
 */
export class IterativeRagOrchestrator {
  private readonly retriever: ChunkRetriever;
  private readonly history: HistoryStore | undefined;
  private readonly defaults: RagDefaults;
  private readonly rewriter: QueryRewriter;
  private readonly assessor: SufficiencyAssessor;
  private readonly synthesizer: AnswerSynthesizer;
  private readonly pendingWrites = new Set<Promise<void>>();

  constructor(deps: OrchestratorDeps) {
    this.retriever = deps.retriever;
    this.history = deps.history;
    this.defaults = deps.defaults ?? DEFAULT_RAG;
    this.rewriter = new QueryRewriter(deps.gateway);
    this.assessor = new SufficiencyAssessor(deps.gateway);
    this.synthesizer = new AnswerSynthesizer(deps.gateway);
  }

  async generateResponse(request: RAGRequest): Promise<RAGResult> {
    const { question } = request;
    const maxIterations = wholeAtLeastOne(request.maxIterations, this.defaults.maxIterations);
    const maxChunks = wholeAtLeastOne(request.maxChunksPerIteration, this.defaults.maxChunksPerIteration);

    const rounds: RoundSummary[] = [];

    try {
      log.info("question received", { maxIterations, maxChunks });

      const rewrite = await this.rewriter.rewrite(question);
      let queries = rewrite.queries;

      const evidence: RetrievalMatch[] = [];
      const seen = new Set<string>();

      while (rounds.length < maxIterations) {
        const fresh = await this.retrieveRound(queries, maxChunks, seen, request.documentIds);
        evidence.push(...fresh);

        const { assessment } = await this.assessor.assess(question, evidence);
        rounds.push({ iteration: rounds.length + 1, queries, newChunks: fresh.length, assessment });

        log.info(`round ${rounds.length}: +${fresh.length} chunks (${evidence.length} total)`, {
          sufficient: assessment.sufficient,
          confidence: assessment.confidence,
        });

        if (assessment.sufficient && assessment.confidence > CONFIDENCE_CUTOFF) break;
        if (assessment.additionalQueries.length === 0) break;
        queries = assessment.additionalQueries;
      }

      const synthesis = await this.synthesizer.synthesize(question, evidence);

      const result: RAGResult = {
        content: synthesis.content,
        sources: evidence.map(toSourceCitation),
        query: question,
        ...(synthesis.kind === "answer" && { model: synthesis.model }),
        ...(synthesis.kind === "answer" && synthesis.usage !== undefined && { usage: synthesis.usage }),
        iterationsUsed: rounds.length,
        totalChunksFound: evidence.length,
        rounds,
        timestamp: new Date().toISOString(),
        error: false,
      };

      if (request.sessionId) this.saveConversation(request.sessionId, question, result);
      return result;
    } catch (err) {
      log.error("iterative RAG failed", { error: describeError(err) });
      return {
        content: `I apologize, but I encountered an error while processing your query: ${describeError(err)}`,
        sources: [],
        query: question,
        iterationsUsed: rounds.length,
        totalChunksFound: 0,
        rounds,
        timestamp: new Date().toISOString(),
        error: true,
      };
    }
  }

  /** Resolves once every history write started so far has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
  }

  /**
   * Runs every query concurrently with an even share of the round budget, drops chunks
   * already in the evidence set, and keeps the best `maxChunks` by score.
   */
  private async retrieveRound(
    queries: string[],
    maxChunks: number,
    seen: Set<string>,
    documentIds: DocumentId[] | undefined
  ): Promise<RetrievalMatch[]> {
    const perQuery = Math.max(1, Math.floor(maxChunks / Math.max(1, queries.length)));

    const settled = await Promise.allSettled(
      queries.map(async (q) => this.retriever.retrieveRelevantChunks(q, perQuery, documentIds))
    );

    const found: RetrievalMatch[] = [];
    const roundIds = new Set<string>();

    settled.forEach((s, i) => {
      if (s.status === "rejected") {
        log.warn("retrieval failed for query", { query: queries[i], error: describeError(s.reason) });
        return;
      }
      for (const m of s.value) {
        if (seen.has(m.chunk.id) || roundIds.has(m.chunk.id)) continue;
        roundIds.add(m.chunk.id);
        found.push(m);
      }
    });

    const kept = found.sort((a, b) => b.score - a.score).slice(0, maxChunks);
    for (const m of kept) seen.add(m.chunk.id);
    return kept;
  }

  private saveConversation(sessionId: SessionId, question: string, result: RAGResult): void {
    const history = this.history;
    if (!history) return;

    const write = (async () => {
      await history.appendMessage(sessionId, "user", question);
      await history.appendMessage(sessionId, "assistant", result.content, {
        sources: result.sources,
        iterations_used: result.iterationsUsed,
        total_chunks: result.totalChunksFound,
      });
    })().catch((err: unknown) => {
      log.error("failed to save conversation", { sessionId, error: describeError(err) });
    });

    this.pendingWrites.add(write);
    void write.finally(() => this.pendingWrites.delete(write));
  }
}
