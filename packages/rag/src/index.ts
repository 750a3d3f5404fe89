export * from "./prompts.js";
export * from "./structuredOutput.js";
export * from "./context.js";
export * from "./queryRewriter.js";
export * from "./sufficiencyAssessor.js";
export * from "./answerSynthesizer.js";
export * from "./orchestrator.js";
export * from "./planner.js";
