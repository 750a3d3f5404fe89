import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { loadConfig, type ChunkType } from "@lexrag/core";
import { ingestDirectory } from "@lexrag/ingestion";
import { SqliteStore } from "@lexrag/store";
import { getArg, getArgNumber } from "./cliArgs.js";

function ensureDir(path: string) {
  mkdirSync(dirname(path), { recursive: true });
}

const config = loadConfig();
const dir = getArg("dir");
const dbPath = getArg("db") ?? config.dbPath;
const maxChars = getArgNumber("maxChars", 1500);

if (!dir) {
  console.error("Usage: npm run ingest -- --dir <path> [--db <sqlitePath>] [--maxChars 1500]");
  process.exit(1);
}

console.log("[ingest] start", { dir, dbPath, maxChars });

const result = await ingestDirectory({ dir, maxChars });

console.log("[ingest] extracted", {
  documents: result.documents.length,
  chunks: result.chunks.length,
});

ensureDir(dbPath);
const store = new SqliteStore(dbPath);
store.init();

for (const doc of result.documents) {
  const chunks = result.chunks.filter((c) => c.documentId === doc.id);
  await store.upsertDocument({ id: doc.id, filename: doc.filename, fileType: doc.fileType }, chunks);

  const byType = new Map<ChunkType, number>();
  for (const c of chunks) byType.set(c.chunkType, (byType.get(c.chunkType) ?? 0) + 1);
  console.log(`[ingest] ${doc.filename}: ${chunks.length} chunks`, Object.fromEntries(byType));
}

store.close();

console.log("[ingest] stored in sqlite OK", {
  dbPath,
  documents: result.documents.length,
  storedChunks: result.chunks.length,
});
