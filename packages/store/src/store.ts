import type {
  Chunk,
  ChunkType,
  DocumentId,
  DocumentInfo,
  HistoryMessage,
  MessageRole,
  SessionId,
  SessionSummary,
  StoredChunk,
} from "@lexrag/core";

export type ChunkQuery = {
  /** undefined = every document; [] = none */
  documentIds?: DocumentId[];
  chunkTypes?: ChunkType[];
  /** any-of, case-insensitive substring match; [] disables the filter */
  textFilter: string[];
};

export interface ChunkStore {
  getChunks(query: ChunkQuery): Promise<StoredChunk[]>;
}

export interface DocumentStore {
  upsertDocument(document: DocumentInfo, chunks: Chunk[]): Promise<void>;
  listDocuments(): Promise<Array<DocumentInfo & { chunkCount: number }>>;
}

export interface HistoryStore {
  appendMessage(
    sessionId: SessionId,
    role: MessageRole,
    content: string,
    metadata?: Record<string, unknown>
  ): Promise<void>;

  getMessages(sessionId: SessionId): Promise<HistoryMessage[]>;
  listSessions(): Promise<SessionSummary[]>;
  deleteSession(sessionId: SessionId): Promise<number>;
}
