import type { RetrievalMatch, SourceCitation } from "@lexrag/core";

export const EMPTY_CONTEXT = "No relevant documents found in the corpus.";
export const PREVIEW_CHARS = 200;

export function buildContext(evidence: readonly RetrievalMatch[]): string {
  if (evidence.length === 0) return EMPTY_CONTEXT;

  const blocks = evidence.map((m, i) =>
    [
      `Document ${i + 1}:`,
      `- Source: ${m.document.filename}`,
      `- Section: ${m.chunk.chunkType}`,
      `- Relevance: ${m.similarityScore.toFixed(3)}`,
      `- Content: ${m.chunk.text}`,
      "---",
    ].join("\n")
  );

  return ["RELEVANT DOCUMENT INFORMATION:", ...blocks].join("\n\n");
}

export function previewText(text: string): string {
  return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}...` : text;
}

export function toSourceCitation(m: RetrievalMatch): SourceCitation {
  return {
    documentName: m.document.filename,
    documentId: m.document.id,
    chunkId: m.chunk.id,
    chunkType: m.chunk.chunkType,
    similarityScore: m.similarityScore,
    relevanceScore: m.score,
    chunkPreview: previewText(m.chunk.text),
  };
}
