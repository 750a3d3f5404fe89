/**
 * Runtime configuration, read from environment variables.
 *
 *   LLM_PROVIDER                  ollama | openai | groq | mock   (default: ollama)
 *   LLM_MODEL                     backend model name              (default: backend's own)
 *   OPENAI_API_KEY / GROQ_API_KEY API keys for the hosted backends
 *   OLLAMA_BASE_URL               default http://localhost:11434
 *   LEXRAG_DB_PATH                default .data/lexrag.sqlite
 *   RAG_MAX_ITERATIONS            default 3
 *   RAG_MAX_CHUNKS_PER_ITERATION  default 5
 *   LOG_LEVEL                     debug | info | warn | error | silent
 */

import { parseLogLevel, type LogLevel } from "./logger.js";

export type LlmProvider = "ollama" | "openai" | "groq" | "mock";

export interface LlmConfig {
  provider: LlmProvider;
  model?: string;
  apiKey?: string;
  baseUrl?: string;
}

export interface RagDefaults {
  maxIterations: number;
  maxChunksPerIteration: number;
}

export interface AppConfig {
  llm: LlmConfig;
  dbPath: string;
  rag: RagDefaults;
  logLevel: LogLevel;
}

export const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434";
export const DEFAULT_DB_PATH = ".data/lexrag.sqlite";
export const DEFAULT_RAG: RagDefaults = { maxIterations: 3, maxChunksPerIteration: 5 };

type Env = Record<string, string | undefined>;

export function parseProvider(value: string | undefined): LlmProvider {
  const v = (value ?? "ollama").trim().toLowerCase();
  if (v === "ollama" || v === "openai" || v === "groq" || v === "mock") return v;
  throw new Error(`Unknown LLM provider: ${value}`);
}

function positiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function nonEmpty(value: string | undefined): string | undefined {
  const v = value?.trim();
  return v ? v : undefined;
}

export function loadLlmConfig(env: Env = process.env): LlmConfig {
  const provider = parseProvider(env.LLM_PROVIDER);
  const model = nonEmpty(env.LLM_MODEL);

  const apiKey =
    provider === "openai"
      ? nonEmpty(env.OPENAI_API_KEY)
      : provider === "groq"
        ? nonEmpty(env.GROQ_API_KEY)
        : undefined;

  const baseUrl =
    provider === "ollama" ? (nonEmpty(env.OLLAMA_BASE_URL) ?? DEFAULT_OLLAMA_BASE_URL) : undefined;

  return {
    provider,
    ...(model !== undefined && { model }),
    ...(apiKey !== undefined && { apiKey }),
    ...(baseUrl !== undefined && { baseUrl }),
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    llm: loadLlmConfig(env),
    dbPath: nonEmpty(env.LEXRAG_DB_PATH) ?? DEFAULT_DB_PATH,
    rag: {
      maxIterations: positiveInt(env.RAG_MAX_ITERATIONS, DEFAULT_RAG.maxIterations),
      maxChunksPerIteration: positiveInt(
        env.RAG_MAX_CHUNKS_PER_ITERATION,
        DEFAULT_RAG.maxChunksPerIteration
      ),
    },
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
