import type { Chunk, RawDocument } from "@lexrag/core";
import { loadDocuments } from "./documentLoader.js";
import { chunkLegalDocument } from "./sectionChunker.js";

export async function ingestDirectory(params: {
  dir: string;
  maxChars?: number;
}): Promise<{ documents: RawDocument[]; chunks: Chunk[] }> {
  const documents = await loadDocuments({ dir: params.dir });
  const opts = params.maxChars !== undefined ? { maxChars: params.maxChars } : undefined;

  const chunks: Chunk[] = [];
  for (const doc of documents) chunks.push(...chunkLegalDocument(doc, opts));

  return { documents, chunks };
}
