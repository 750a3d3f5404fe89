export * from "./chunkClassifier.js";
export * from "./sectionChunker.js";
export * from "./documentLoader.js";
export * from "./ingestDocuments.js";
