export * from "./lexicon.js";
export * from "./queryAnalyzer.js";
export * from "./scoring.js";
export * from "./searchPatterns.js";
export * from "./lexicalRetriever.js";
