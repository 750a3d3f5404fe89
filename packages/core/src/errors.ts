/**
 * Raised by LLM backends when the provider cannot be reached or answers with a
 * non-success status. The orchestrator turns it into a failed RAGResult.
 */
export class LlmTransportError extends Error {
  readonly provider: string;
  readonly status: number | undefined;

  constructor(provider: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "LlmTransportError";
    this.provider = provider;
    this.status = options?.status;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
