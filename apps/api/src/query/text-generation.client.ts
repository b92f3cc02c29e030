/** Injection token for the {@link TextGenerationClient} used by the SQL generator. */
export const TEXT_GENERATION_CLIENT = Symbol('TEXT_GENERATION_CLIENT');

export interface CompletionRequest {
  system: string;
  user: string;
  temperature?: number;
}

export interface CompletionOptions {
  timeoutMs: number;
  /** Aborts the outstanding request. */
  signal?: AbortSignal;
}

/**
 * External text-generation capability. Implementations return the raw
 * completion text or throw one of the upstream errors
 * (`UpstreamTimeoutError`, `UpstreamRateLimitedError`, `UpstreamError`).
 */
export interface TextGenerationClient {
  complete(request: CompletionRequest, options: CompletionOptions): Promise<string>;
}
