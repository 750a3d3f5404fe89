/** Prompt templates for the three LLM roles. */

export const LLM_SETTINGS = {
  rewrite: { temperature: 0.3, maxTokens: 500 },
  assess: { temperature: 0.2, maxTokens: 300 },
  synthesize: { temperature: 0.3, maxTokens: 1500 },
} as const;

export function rewritePrompt(question: string): string {
  return [
    "You turn questions about legal documents into search queries for a keyword retriever.",
    "",
    "Write 1 to 3 queries that would find the passages needed to answer the question:",
    "- use the key legal terms, parties and concepts from the question",
    "- add a synonym or related term where the document may phrase it differently",
    "- order them from most specific to broadest",
    "",
    `Question: ${question}`,
    "",
    "Reply with a JSON array of strings only, for example:",
    "```json",
    '["severance without cause", "termination payment", "notice period termination"]',
    "```",
  ].join("\n");
}

export function assessmentPrompt(question: string, context: string): string {
  return [
    "You decide whether the retrieved passages below are enough to answer a question.",
    "",
    `Question: ${question}`,
    "",
    "Retrieved passages:",
    context,
    "",
    "Reply with a JSON object only:",
    "```json",
    "{",
    '  "sufficient": true,',
    '  "confidence": 0.8,',
    '  "missing_info": "what is still missing, or an empty string",',
    '  "additional_queries": ["follow-up search query"]',
    "}",
    "```",
    "confidence is between 0 and 1. Leave additional_queries empty when nothing else needs searching.",
  ].join("\n");
}

export const SYNTHESIS_SYSTEM_PROMPT = [
  "You are a legal document assistant.",
  "Answer only from the document context you are given.",
  "Say plainly what the context does not cover.",
  "Cite the document and section a statement comes from.",
  "Quote amounts, dates and deadlines exactly.",
  "For decisions with legal consequences, suggest consulting a qualified lawyer.",
].join(" ");

export function synthesisPrompt(question: string, context: string): string {
  return [`Question: ${question}`, "", "Document context:", context, "", "Answer the question."].join(
    "\n"
  );
}
