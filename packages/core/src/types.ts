export type ChunkId = string;
export type DocumentId = string;
export type SessionId = string;

export const CHUNK_TYPES = [
  "definition",
  "termination",
  "compensation",
  "obligation",
  "permission",
  "confidentiality",
  "governing_law",
  "general",
] as const;

export type ChunkType = (typeof CHUNK_TYPES)[number];

export function isChunkType(value: string): value is ChunkType {
  return CHUNK_TYPES.some((t) => t === value);
}

export type FileType = "text" | "markdown";

export interface RawDocument {
  id: DocumentId;
  filename: string;
  fileType: FileType;
  content: string;
}

export interface DocumentInfo {
  id: DocumentId;
  filename: string;
  fileType: FileType;
  uploadedAt?: string;
}

export interface Chunk {
  id: ChunkId;
  documentId: DocumentId;
  text: string;
  chunkType: ChunkType;
  startChar: number;
  endChar: number;
  createdAt?: string;
}

/** A chunk row with its owning document joined in. */
export interface StoredChunk {
  chunk: Chunk;
  document: DocumentInfo;
}

// ─── Query analysis ───

export type IntentType =
  | "definition"
  | "conditions"
  | "permission"
  | "obligation"
  | "consequence"
  | "general";

export type TermCategory = "concept" | "action" | "entity" | "modifier" | "general";

export interface QueryIntent {
  type: IntentType;
  focus: string[];
}

export interface SearchTerm {
  term: string;
  weight: number;
  category: TermCategory;
  synonyms: string[];
}

export interface QueryAnalysis {
  originalQuery: string;
  intent: QueryIntent;
  keyTerms: string[];
  searchTerms: SearchTerm[];
  phrases: string[];
}

export type SearchPattern =
  | { kind: "exact_phrase"; weight: number; phrase: string }
  | { kind: "core_concepts"; weight: number; concepts: string[] }
  | { kind: "synonym_expansion"; weight: number; term: string; terms: string[] }
  | { kind: "intent_keywords"; weight: number; intent: IntentType; keywords: string[] }
  | { kind: "broad_keywords"; weight: number; keywords: string[] };

export type SearchPatternKind = SearchPattern["kind"];

// ─── Retrieval ───

export interface ChunkScore {
  score: number;
  matchedTerms: string[];
}

export interface RetrievalMatch {
  chunk: Chunk;
  document: DocumentInfo;
  /** cumulative pattern score, always above the relevance gate */
  score: number;
  /** lexical similarity in [0, 1] */
  similarityScore: number;
  matchedTerms: string[];
}

// ─── Iterative RAG ───

export interface Assessment {
  sufficient: boolean;
  confidence: number;
  missingInfo: string;
  additionalQueries: string[];
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface SourceCitation {
  documentName: string;
  documentId: DocumentId;
  chunkId: ChunkId;
  chunkType: ChunkType;
  similarityScore: number;
  relevanceScore: number;
  chunkPreview: string;
}

export interface RoundSummary {
  iteration: number;
  queries: string[];
  newChunks: number;
  assessment: Assessment;
}

export interface RAGResult {
  content: string;
  sources: SourceCitation[];
  query: string;
  model?: string;
  usage?: TokenUsage;
  iterationsUsed: number;
  totalChunksFound: number;
  rounds: RoundSummary[];
  timestamp: string;
  error: boolean;
}

export interface RAGRequest {
  question: string;
  sessionId?: SessionId;
  maxIterations?: number;
  maxChunksPerIteration?: number;
  documentIds?: DocumentId[];
}

// ─── Chat history ───

export type MessageRole = "user" | "assistant";

export interface HistoryMessage {
  id: number;
  sessionId: SessionId;
  role: MessageRole;
  content: string;
  metadata: Record<string, unknown>;
  createdAt: string;
}

export interface SessionSummary {
  sessionId: SessionId;
  messageCount: number;
  lastMessageAt: string;
}
