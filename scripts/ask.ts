import { loadConfig, setLogLevel } from "@lexrag/core";
import { checkLlmConnection, createLlmGateway } from "@lexrag/llm";
import { IterativeRagOrchestrator } from "@lexrag/rag";
import { LexicalRetriever } from "@lexrag/retrieval";
import { SqliteStore } from "@lexrag/store";
import { getArg, getArgList, getArgNumber, hasFlag } from "./cliArgs.js";

const config = loadConfig();
setLogLevel(hasFlag("debug") ? "debug" : config.logLevel);

const q = getArg("q");
const sessionId = getArg("session");
const dbPath = getArg("db") ?? config.dbPath;
const maxIterations = getArgNumber("maxIterations", config.rag.maxIterations);
const maxChunksPerIteration = getArgNumber("maxChunks", config.rag.maxChunksPerIteration);
const documentIds = getArgList("documentIds");

if (!q) {
  console.error(`Usage:
npm run ask -- --q "..." \\
  [--session <id>] \\
  [--db .data/lexrag.sqlite] \\
  [--maxIterations 3] \\
  [--maxChunks 5] \\
  [--documentIds a,b] \\
  [--check] \\
  [--debug]`);
  process.exit(1);
}

const gateway = createLlmGateway(config.llm);

console.log("[ask] start", {
  provider: gateway.provider,
  model: gateway.model,
  dbPath,
  maxIterations,
  maxChunksPerIteration,
  sessionId,
});

if (hasFlag("check")) {
  const status = await checkLlmConnection(gateway);
  console.log("[ask] llm connection", status);
  if (!status.ok) process.exit(1);
}

const store = new SqliteStore(dbPath);
store.init();

const rag = new IterativeRagOrchestrator({
  retriever: new LexicalRetriever(store),
  gateway,
  history: store,
  defaults: config.rag,
});

const result = await rag.generateResponse({
  question: q,
  maxIterations,
  maxChunksPerIteration,
  ...(sessionId !== null && { sessionId }),
  ...(documentIds !== undefined && { documentIds }),
});
await rag.flush();

console.log("\n=== ANSWER ===\n");
console.log(result.content);

console.log("\n=== ROUNDS ===\n");
for (const r of result.rounds) {
  console.log(
    `#${r.iteration} queries=${JSON.stringify(r.queries)} new=${r.newChunks} sufficient=${r.assessment.sufficient} confidence=${r.assessment.confidence.toFixed(2)}`
  );
}

console.log("\n=== SOURCES ===\n");
result.sources.forEach((s, i) => {
  console.log(
    `[S${i + 1}] ${s.documentName} [${s.chunkType}] (relevance=${s.relevanceScore.toFixed(2)}, similarity=${s.similarityScore.toFixed(3)})`
  );
  console.log(`     ${s.chunkPreview.replace(/\s+/g, " ")}`);
});

store.close();

console.log(`\n[ask] done ${result.error ? "with errors" : "✅"}`, {
  iterationsUsed: result.iterationsUsed,
  totalChunksFound: result.totalChunksFound,
  usage: result.usage,
});

if (result.error) process.exit(1);
