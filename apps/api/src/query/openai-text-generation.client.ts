import { Logger } from '@nestjs/common';
import OpenAI from 'openai';
import {
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
  RateLimitError,
} from 'openai/error';
import {
  type AppError,
  UpstreamError,
  UpstreamRateLimitedError,
  UpstreamTimeoutError,
  errorMessage,
} from '../common/errors';
import type { AppConfig } from '../config/app.config';
import type {
  CompletionOptions,
  CompletionRequest,
  TextGenerationClient,
} from './text-generation.client';

function retryAfterSeconds(err: APIError): number | undefined {
  const raw = err.headers?.['retry-after'];
  if (!raw) return undefined;
  const n = parseInt(raw, 10);
  return Number.isFinite(n) && n >= 0 ? n : undefined;
}

/** Maps SDK failures onto the upstream error kinds. */
export function toUpstreamError(err: unknown): AppError {
  if (err instanceof UpstreamError || err instanceof UpstreamTimeoutError || err instanceof UpstreamRateLimitedError) {
    return err;
  }
  if (err instanceof APIConnectionTimeoutError || err instanceof APIUserAbortError) {
    return new UpstreamTimeoutError('Text-generation request timed out.', { cause: err });
  }
  if (err instanceof RateLimitError || (err instanceof APIError && err.status === 429)) {
    return new UpstreamRateLimitedError(
      'Text-generation provider rate limit or quota exceeded.',
      retryAfterSeconds(err),
      { cause: err },
    );
  }
  if (err instanceof APIError) {
    return new UpstreamError(`Text-generation request failed: ${err.message}`, err.status, { cause: err });
  }
  return new UpstreamError(`Text-generation request failed: ${errorMessage(err)}`, undefined, { cause: err });
}

/**
 * Chat-completions client for OpenAI or any OpenAI-compatible endpoint
 * (OPENAI_BASE_URL, e.g. a local Ollama). SDK retries are off: failures go
 * straight back to the caller.
 */
export class OpenAiTextGenerationClient implements TextGenerationClient {
  private readonly logger = new Logger(OpenAiTextGenerationClient.name);
  private readonly openai: OpenAI | null = null;

  constructor(private readonly config: AppConfig['openai']) {
    const { apiKey, baseURL } = config;
    if (apiKey || baseURL) {
      this.openai = new OpenAI({
        apiKey: apiKey || 'ollama',
        baseURL: baseURL || undefined,
        maxRetries: 0,
      });
    }
  }

  async complete(request: CompletionRequest, options: CompletionOptions): Promise<string> {
    if (!this.openai) {
      throw new UpstreamError('OPENAI_API_KEY or OPENAI_BASE_URL is not set. Set them in .env.');
    }
    try {
      const response = await this.openai.chat.completions.create(
        {
          model: this.config.model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.user },
          ],
          temperature: request.temperature ?? 0,
        },
        { timeout: options.timeoutMs, signal: options.signal },
      );
      const content = response.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new UpstreamError('LLM did not return any content.');
      }
      return content;
    } catch (err) {
      const upstream = toUpstreamError(err);
      this.logger.warn(`Completion failed (${upstream.kind}): ${upstream.message}`);
      throw upstream;
    }
  }
}
