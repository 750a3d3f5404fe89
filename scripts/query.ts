import { isChunkType, loadConfig, type ChunkType } from "@lexrag/core";
import { LexicalRetriever } from "@lexrag/retrieval";
import { SqliteStore } from "@lexrag/store";
import { getArg, getArgList, getArgNumber } from "./cliArgs.js";

const config = loadConfig();
const q = getArg("q");
const dbPath = getArg("db") ?? config.dbPath;
const limit = getArgNumber("limit", 5);
const documentIds = getArgList("documentIds");
const rawTypes = getArgList("chunkTypes");

if (!q) {
  console.error(
    "Usage: npm run query -- --q <question> [--limit 5] [--db <sqlitePath>] [--chunkTypes termination,compensation] [--documentIds a,b]"
  );
  process.exit(1);
}

let chunkTypes: ChunkType[] | undefined;
if (rawTypes) {
  const unknown = rawTypes.filter((t) => !isChunkType(t));
  if (unknown.length > 0) {
    console.error(`[query] unknown chunk types: ${unknown.join(", ")}`);
    process.exit(1);
  }
  chunkTypes = rawTypes.filter(isChunkType);
}

console.log("[query] start", { dbPath, limit, documentIds, chunkTypes });

const store = new SqliteStore(dbPath);
store.init();

const retriever = new LexicalRetriever(store);
const results = await retriever.retrieveRelevantChunks(q, limit, documentIds, chunkTypes);

console.log("[query] results:", results.length);

for (const r of results) {
  console.log("—".repeat(80));
  console.log(`score: ${r.score.toFixed(2)}  similarity: ${r.similarityScore.toFixed(3)}`);
  console.log(`source: ${r.document.filename}  [${r.chunk.chunkType}]  chars ${r.chunk.startChar}-${r.chunk.endChar}`);
  console.log(`matched: ${r.matchedTerms.join(", ")}`);
  console.log("");
  console.log(r.chunk.text.slice(0, 600));
  if (r.chunk.text.length > 600) console.log("…");
}

console.log("—".repeat(80));
store.close();
