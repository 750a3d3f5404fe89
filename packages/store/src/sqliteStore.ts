// packages/store/src/sqliteStore.ts

import Database from "better-sqlite3";
import {
  createLogger,
  isChunkType,
  type Chunk,
  type DocumentInfo,
  type FileType,
  type HistoryMessage,
  type MessageRole,
  type SessionId,
  type SessionSummary,
  type StoredChunk,
} from "@lexrag/core";
import type { ChunkQuery, ChunkStore, DocumentStore, HistoryStore } from "./store.js";

const log = createLogger("store");

type ChunkRow = {
  chunk_id: string;
  document_id: string;
  text: string;
  chunk_type: string;
  start_char: number;
  end_char: number;
  created_at: string | null;
  filename: string;
  file_type: string;
  uploaded_at: string | null;
};

type DocumentRow = {
  id: string;
  filename: string;
  file_type: string;
  uploaded_at: string | null;
  chunk_count: number;
};

type MessageRow = {
  id: number;
  session_id: string;
  role: string;
  content: string;
  metadata_json: string;
  created_at: string;
};

type SessionRow = {
  session_id: string;
  message_count: number;
  last_message_at: string;
};

function escapeLike(s: string): string {
  return s.replace(/[\\%_]/g, (c) => `\\${c}`);
}

function toFileType(s: string): FileType {
  return s === "markdown" ? "markdown" : "text";
}

function toRole(s: string): MessageRole {
  return s === "assistant" ? "assistant" : "user";
}

function parseMetadata(json: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(json);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (err) {
    log.warn("unreadable message metadata", { error: String(err) });
  }
  return {};
}

function toStoredChunk(row: ChunkRow): StoredChunk {
  const chunk: Chunk = {
    id: row.chunk_id,
    documentId: row.document_id,
    text: row.text,
    chunkType: isChunkType(row.chunk_type) ? row.chunk_type : "general",
    startChar: row.start_char,
    endChar: row.end_char,
    ...(row.created_at !== null && { createdAt: row.created_at }),
  };

  const document: DocumentInfo = {
    id: row.document_id,
    filename: row.filename,
    fileType: toFileType(row.file_type),
    ...(row.uploaded_at !== null && { uploadedAt: row.uploaded_at }),
  };

  return { chunk, document };
}

export class SqliteStore implements ChunkStore, DocumentStore, HistoryStore {
  private db: Database.Database;

  constructor(private readonly dbPath: string) {
    this.db = new Database(dbPath);
  }

  init(): void {
    this.db.exec(`PRAGMA journal_mode = WAL;`);
    this.db.exec(`PRAGMA foreign_keys = ON;`);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        id TEXT PRIMARY KEY,
        filename TEXT NOT NULL,
        file_type TEXT NOT NULL,
        uploaded_at TEXT
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chunks (
        chunk_id TEXT PRIMARY KEY,
        document_id TEXT NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
        text TEXT NOT NULL,
        chunk_type TEXT NOT NULL,
        start_char INTEGER NOT NULL,
        end_char INTEGER NOT NULL,
        created_at TEXT
      );
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_chunks_document
      ON chunks(document_id);
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chat_messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        metadata_json TEXT NOT NULL,
        created_at TEXT NOT NULL
      );
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_chat_messages_session
      ON chat_messages(session_id);
    `);

    log.debug(`opened ${this.dbPath}`);
  }

  /** Replaces the document row and all of its chunks. */
  async upsertDocument(document: DocumentInfo, chunks: Chunk[]): Promise<void> {
    const upsertDoc = this.db.prepare<{
      id: string;
      filename: string;
      file_type: string;
      uploaded_at: string;
    }>(`
      INSERT INTO documents (id, filename, file_type, uploaded_at)
      VALUES (@id, @filename, @file_type, @uploaded_at)
      ON CONFLICT(id) DO UPDATE SET
        filename = excluded.filename,
        file_type = excluded.file_type,
        uploaded_at = excluded.uploaded_at;
    `);

    const deleteChunks = this.db.prepare<[string]>(`DELETE FROM chunks WHERE document_id = ?`);

    const insertChunk = this.db.prepare<{
      chunk_id: string;
      document_id: string;
      text: string;
      chunk_type: string;
      start_char: number;
      end_char: number;
      created_at: string;
    }>(`
      INSERT INTO chunks (chunk_id, document_id, text, chunk_type, start_char, end_char, created_at)
      VALUES (@chunk_id, @document_id, @text, @chunk_type, @start_char, @end_char, @created_at)
      ON CONFLICT(chunk_id) DO UPDATE SET
        document_id = excluded.document_id,
        text = excluded.text,
        chunk_type = excluded.chunk_type,
        start_char = excluded.start_char,
        end_char = excluded.end_char,
        created_at = excluded.created_at;
    `);

    const now = new Date().toISOString();

    const tx = this.db.transaction((items: Chunk[]) => {
      upsertDoc.run({
        id: document.id,
        filename: document.filename,
        file_type: document.fileType,
        uploaded_at: document.uploadedAt ?? now,
      });
      deleteChunks.run(document.id);
      for (const c of items) {
        insertChunk.run({
          chunk_id: c.id,
          document_id: document.id,
          text: c.text,
          chunk_type: c.chunkType,
          start_char: c.startChar,
          end_char: c.endChar,
          created_at: c.createdAt ?? now,
        });
      }
    });

    tx(chunks);
  }

  async listDocuments(): Promise<Array<DocumentInfo & { chunkCount: number }>> {
    const rows = this.db
      .prepare<[], DocumentRow>(
        `
        SELECT d.id, d.filename, d.file_type, d.uploaded_at, COUNT(c.chunk_id) AS chunk_count
        FROM documents d
        LEFT JOIN chunks c ON c.document_id = d.id
        GROUP BY d.id
        ORDER BY d.filename
      `
      )
      .all();

    return rows.map((r) => ({
      id: r.id,
      filename: r.filename,
      fileType: toFileType(r.file_type),
      ...(r.uploaded_at !== null && { uploadedAt: r.uploaded_at }),
      chunkCount: r.chunk_count,
    }));
  }

  async getChunks(query: ChunkQuery): Promise<StoredChunk[]> {
    if (query.documentIds && query.documentIds.length === 0) return [];

    const where: string[] = [];
    const params: unknown[] = [];

    if (query.documentIds) {
      where.push(`c.document_id IN (${query.documentIds.map(() => "?").join(",")})`);
      params.push(...query.documentIds);
    }

    if (query.chunkTypes?.length) {
      where.push(`c.chunk_type IN (${query.chunkTypes.map(() => "?").join(",")})`);
      params.push(...query.chunkTypes);
    }

    const terms = query.textFilter.map((t) => t.trim()).filter((t) => t.length > 0);
    if (terms.length > 0) {
      where.push(`(${terms.map(() => `c.text LIKE ? ESCAPE '\\'`).join(" OR ")})`);
      params.push(...terms.map((t) => `%${escapeLike(t)}%`));
    }

    const sql = `
      SELECT c.chunk_id, c.document_id, c.text, c.chunk_type, c.start_char, c.end_char, c.created_at,
             d.filename, d.file_type, d.uploaded_at
      FROM chunks c
      JOIN documents d ON d.id = c.document_id
      ${where.length > 0 ? `WHERE ${where.join(" AND ")}` : ""}
      ORDER BY c.rowid
    `;

    const rows = this.db.prepare<unknown[], ChunkRow>(sql).all(...params);
    return rows.map(toStoredChunk);
  }

  async appendMessage(
    sessionId: SessionId,
    role: MessageRole,
    content: string,
    metadata: Record<string, unknown> = {}
  ): Promise<void> {
    this.db
      .prepare<[string, string, string, string, string]>(
        `
        INSERT INTO chat_messages (session_id, role, content, metadata_json, created_at)
        VALUES (?, ?, ?, ?, ?)
      `
      )
      .run(sessionId, role, content, JSON.stringify(metadata), new Date().toISOString());
  }

  async getMessages(sessionId: SessionId): Promise<HistoryMessage[]> {
    const rows = this.db
      .prepare<[string], MessageRow>(
        `
        SELECT id, session_id, role, content, metadata_json, created_at
        FROM chat_messages
        WHERE session_id = ?
        ORDER BY id
      `
      )
      .all(sessionId);

    return rows.map((r) => ({
      id: r.id,
      sessionId: r.session_id,
      role: toRole(r.role),
      content: r.content,
      metadata: parseMetadata(r.metadata_json),
      createdAt: r.created_at,
    }));
  }

  async listSessions(): Promise<SessionSummary[]> {
    const rows = this.db
      .prepare<[], SessionRow>(
        `
        SELECT session_id, COUNT(*) AS message_count, MAX(created_at) AS last_message_at
        FROM chat_messages
        GROUP BY session_id
        ORDER BY MAX(id) DESC
      `
      )
      .all();

    return rows.map((r) => ({
      sessionId: r.session_id,
      messageCount: r.message_count,
      lastMessageAt: r.last_message_at,
    }));
  }

  async deleteSession(sessionId: SessionId): Promise<number> {
    const info = this.db
      .prepare<[string]>(`DELETE FROM chat_messages WHERE session_id = ?`)
      .run(sessionId);
    return info.changes;
  }

  close(): void {
    this.db.close();
  }
}
