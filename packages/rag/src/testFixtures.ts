import type { Chunk, ChunkType, DocumentInfo, RetrievalMatch } from "@lexrag/core";

export const employmentDoc: DocumentInfo = { id: "doc-emp", filename: "employment.txt", fileType: "text" };

export function makeChunk(id: string, text: string, chunkType: ChunkType = "general"): Chunk {
  return { id, documentId: employmentDoc.id, text, chunkType, startChar: 0, endChar: text.length };
}

export function makeMatch(id: string, score: number, text = `Clause ${id}.`): RetrievalMatch {
  return {
    chunk: makeChunk(id, text),
    document: employmentDoc,
    score,
    similarityScore: 0.5,
    matchedTerms: [],
  };
}
