import { describe, it, expect, vi } from "vitest";
import type { Chunk, ChunkType, DocumentInfo, StoredChunk } from "@lexrag/core";
import type { ChunkQuery, ChunkStore } from "@lexrag/store";
import { LexicalRetriever, lexicalSimilarity } from "./lexicalRetriever.js";

const doc: DocumentInfo = { id: "doc-1", filename: "employment.txt", fileType: "text" };

function row(id: string, text: string, chunkType: ChunkType = "general", createdAt?: string): StoredChunk {
  const chunk: Chunk = {
    id,
    documentId: doc.id,
    text,
    chunkType,
    startChar: 0,
    endChar: text.length,
    ...(createdAt !== undefined && { createdAt }),
  };
  return { chunk, document: doc };
}

class FakeStore implements ChunkStore {
  readonly queries: ChunkQuery[] = [];
  constructor(private readonly rows: StoredChunk[]) {}

  async getChunks(query: ChunkQuery): Promise<StoredChunk[]> {
    this.queries.push(query);
    return this.rows;
  }
}

const corpus = [
  row(
    "c1",
    "Confidentiality: Employee shall not disclose confidential information during or after employment.",
    "confidentiality"
  ),
  row(
    "c2",
    "Severance: If terminated without cause, Employee receives three (3) months base salary.",
    "termination"
  ),
  row(
    "c3",
    "Termination for cause: Employer may terminate immediately upon written notice for gross misconduct.",
    "termination"
  ),
  row("c4", "Vacation: Employee is entitled to 20 days of paid vacation per year."),
];

const question = "What is the severance if terminated without cause?";

describe("LexicalRetriever", () => {
  it("ranks the severance clause first and drops irrelevant chunks", async () => {
    const retriever = new LexicalRetriever(new FakeStore(corpus));
    const matches = await retriever.retrieveRelevantChunks(question, 5);

    expect(matches.map((m) => m.chunk.id)).toEqual(["c2", "c3"]);
    // 30 + 20 + 6 + 10.8 + 5
    expect(matches[0]?.score).toBeCloseTo(71.8, 10);
    // 2 + 10.8 + 1
    expect(matches[1]?.score).toBeCloseTo(13.8, 10);
    expect(matches[0]?.chunk.chunkType).toBe("termination");
    expect(matches[0]?.similarityScore).toBe(0.5);
    expect(matches[0]?.matchedTerms).toContain("severance");
  });

  it("returns scores above the gate in non-increasing order", async () => {
    const retriever = new LexicalRetriever(new FakeStore(corpus));
    const matches = await retriever.retrieveRelevantChunks(question, 10);
    for (const m of matches) expect(m.score).toBeGreaterThan(0.5);
    for (let i = 1; i < matches.length; i++) {
      expect(matches[i - 1]?.score ?? 0).toBeGreaterThanOrEqual(matches[i]?.score ?? 0);
    }
  });

  it("honours the limit", async () => {
    const retriever = new LexicalRetriever(new FakeStore(corpus));
    const matches = await retriever.retrieveRelevantChunks(question, 1);
    expect(matches.map((m) => m.chunk.id)).toEqual(["c2"]);
    expect(await retriever.retrieveRelevantChunks(question, 0)).toEqual([]);
  });

  it("passes filters through to the store", async () => {
    const store = new FakeStore(corpus);
    const retriever = new LexicalRetriever(store);
    await retriever.retrieveRelevantChunks("severance", 3, ["doc-1"], ["termination"]);

    expect(store.queries).toEqual([
      {
        documentIds: ["doc-1"],
        chunkTypes: ["termination"],
        textFilter: [
          "severance",
          "severance pay",
          "separation pay",
          "termination pay",
          "redundancy payment",
        ],
      },
    ]);
  });

  it("skips the store when the query has no usable terms", async () => {
    const store = new FakeStore(corpus);
    const retriever = new LexicalRetriever(store);
    expect(await retriever.retrieveRelevantChunks("What is it?", 5)).toEqual([]);
    expect(store.queries).toEqual([]);
  });

  it("returns [] when the store fails", async () => {
    const store: ChunkStore = { getChunks: vi.fn().mockRejectedValue(new Error("disk I/O error")) };
    const retriever = new LexicalRetriever(store);
    expect(await retriever.retrieveRelevantChunks(question, 5)).toEqual([]);
  });

  it("breaks score ties by recency, otherwise keeps input order", async () => {
    const dated = new LexicalRetriever(
      new FakeStore([
        row("old", "Severance is owed.", "termination", "2024-01-01T00:00:00.000Z"),
        row("new", "Severance is owed.", "termination", "2024-06-01T00:00:00.000Z"),
      ])
    );
    expect((await dated.retrieveRelevantChunks("severance", 5)).map((m) => m.chunk.id)).toEqual([
      "new",
      "old",
    ]);

    const undated = new LexicalRetriever(
      new FakeStore([row("u1", "Severance is owed."), row("u2", "Severance is owed.")])
    );
    expect((await undated.retrieveRelevantChunks("severance", 5)).map((m) => m.chunk.id)).toEqual([
      "u1",
      "u2",
    ]);
  });

  it("ranks undated chunks below dated ones on equal scores", async () => {
    const mixed = new LexicalRetriever(
      new FakeStore([
        row("u1", "Severance is owed."),
        row("old", "Severance is owed.", "termination", "2024-01-01T00:00:00.000Z"),
        row("u2", "Severance is owed."),
        row("new", "Severance is owed.", "termination", "2024-06-01T00:00:00.000Z"),
        row("u3", "Severance is owed."),
      ])
    );
    expect((await mixed.retrieveRelevantChunks("severance", 5)).map((m) => m.chunk.id)).toEqual([
      "new",
      "old",
      "u1",
      "u2",
      "u3",
    ]);
  });
});

describe("lexicalSimilarity", () => {
  it("grades full, leading-word and baseline matches", () => {
    expect(lexicalSimilarity("Base Salary", "Employee receives base salary.")).toBe(0.9);
    expect(lexicalSimilarity("three months base salary paid", "receives three months base pay")).toBe(
      0.7
    );
    expect(lexicalSimilarity("annual bonus", "receives base pay")).toBe(0.5);
  });
});
