import { GoogleGenerativeAI } from '@google/generative-ai';
import type { TextGenerator } from '../types.js';
import { retryWithBackoff, DEFAULT_RETRY_CONFIG, type RetryConfig } from '../utils/retry.js';

/**
 * The part of a Gemini model the generator calls.
 */
export interface ContentModel {
  generateContent(prompt: string): Promise<{ response: { text(): string } }>;
}

export interface GeminiOptions {
  apiKey: string;
  model: string;
  retry?: RetryConfig;
}

function statusOf(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'status' in error ? error.status : undefined;
}

/**
 * Text generator backed by Google Gemini, with retry on overload.
 */
export class GeminiTextGenerator implements TextGenerator {
  private readonly retry: RetryConfig;

  constructor(
    private readonly model: ContentModel,
    retry: RetryConfig = DEFAULT_RETRY_CONFIG
  ) {
    this.retry = retry;
  }

  static create(options: GeminiOptions): GeminiTextGenerator {
    const genAI = new GoogleGenerativeAI(options.apiKey);
    return new GeminiTextGenerator(genAI.getGenerativeModel({ model: options.model }), options.retry);
  }

  async generate(prompt: string, schemaContext: string): Promise<string> {
    const fullPrompt = schemaContext ? `Database Schema:\n${schemaContext}\n${prompt}` : prompt;

    try {
      // Wrap the LLM call with retry logic for handling API overload
      const result = await retryWithBackoff(() => this.model.generateContent(fullPrompt), this.retry, {
        label: 'Gemini',
      });
      return result.response.text().trim();
    } catch (error) {
      const status = statusOf(error);
      if (status === 503 || status === 429) {
        throw new Error(
          `Google Gemini API is currently overloaded. Please try again in a few minutes.\n\n` +
            `Suggestions:\n` +
            `  1. Wait 2-3 minutes and retry your request\n` +
            `  2. Switch to GEMINI_MODEL=gemini-2.5-pro in .env (less traffic)\n` +
            `  3. Enable billing for higher rate limits: https://console.cloud.google.com/billing`,
          { cause: error }
        );
      }
      throw error;
    }
  }
}
