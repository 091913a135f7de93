import OpenAI from 'openai';
import type { AppConfig } from '../config';
import { logger } from '../utils/logger';
import { sleep } from '../utils/rateLimiter';

/** Structured prompt in, free text out. The only thing the CLI needs from a model. */
export type TextGenerator = (systemPrompt: string, userPrompt: string) => Promise<string>;

interface ChatCompletionOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
  retries?: number;
  initialRetryDelayMs?: number;
}

const DEFAULT_OPTIONS = {
  temperature: 0.8,
  maxTokens: 2000,
  retries: 3,
  initialRetryDelayMs: 5000,
};

const RETRYABLE_STATUS = new Set([408, 429, 500, 502, 503, 504]);

export function createOpenRouterClient(settings: AppConfig['openRouter'], apiKey: string): OpenAI {
  const defaultHeaders: Record<string, string> = { 'X-Title': settings.appName };
  if (settings.httpReferer) defaultHeaders['HTTP-Referer'] = settings.httpReferer;

  return new OpenAI({
    apiKey,
    baseURL: settings.baseURL,
    defaultHeaders,
    // retries are handled below so they show up in the log
    maxRetries: 0,
  });
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) return true;
  if (error instanceof OpenAI.APIError) {
    return error.status !== undefined && RETRYABLE_STATUS.has(error.status);
  }
  return false;
}

/**
 * Wrap a client in a TextGenerator with exponential backoff on rate limits
 * and server errors. Anything else fails on the first attempt.
 */
export function createTextGenerator(
  client: OpenAI,
  options: ChatCompletionOptions,
  pause: (ms: number) => Promise<void> = sleep
): TextGenerator {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return async (systemPrompt, userPrompt) => {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= opts.retries; attempt++) {
      try {
        logger.info(`[OpenRouter] API call (attempt ${attempt}/${opts.retries}) - ${opts.model}`);

        const response = await client.chat.completions.create({
          model: opts.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
          temperature: opts.temperature,
          max_tokens: opts.maxTokens,
        });

        const content = response.choices[0]?.message?.content;
        if (!content) {
          throw new Error('Empty response from model');
        }
        return content;
      } catch (error) {
        lastError = error;
        if (!isRetryableError(error) || attempt === opts.retries) break;

        const backoffMs = opts.initialRetryDelayMs * Math.pow(2, attempt - 1);
        logger.warn(`[OpenRouter] Retryable error (attempt ${attempt}), backing off ${Math.round(backoffMs / 1000)}s`);
        await pause(backoffMs);
      }
    }

    logger.error(`[OpenRouter] Model call failed (${opts.model})`);
    throw lastError instanceof Error ? lastError : new Error('Model call failed');
  };
}
