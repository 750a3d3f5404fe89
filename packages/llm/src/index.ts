export * from "./gateway.js";
export * from "./ollama.js";
export * from "./openai.js";
export * from "./mock.js";
export * from "./factory.js";
