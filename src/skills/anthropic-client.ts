/**
 * Completion client backed by the Anthropic Messages API.
 *
 * The SDK is loaded lazily on first use, and the client is only created
 * when ANTHROPIC_API_KEY is set. SDK errors are mapped to
 * CompletionError kinds so skills never depend on the SDK directly.
 *
 * @module skills/anthropic-client
 */

import { CompletionError } from './types.js';
import type { CompletionClient, CompletionRequest } from './types.js';

export interface LlmSettings {
  model: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Create an Anthropic-backed client, or null when no API key is set.
 *
 * @example
 * ```typescript
 * const client = createAnthropicCompletionClient({ model: 'claude-sonnet-4-20250514', maxTokens: 700, temperature: 0.7 });
 * if (client) {
 *   const text = await client.complete({ system: 'Be brief.', prompt: 'Summarize...' });
 * }
 * ```
 */
export function createAnthropicCompletionClient(
  settings: LlmSettings,
  env: NodeJS.ProcessEnv = process.env,
): CompletionClient | null {
  if (!env.ANTHROPIC_API_KEY) {
    return null;
  }
  const apiKey = env.ANTHROPIC_API_KEY;

  return {
    async complete(request: CompletionRequest): Promise<string> {
      const sdk = await import('@anthropic-ai/sdk');
      const client = new sdk.default({ apiKey });

      try {
        const response = await client.messages.create({
          model: settings.model,
          max_tokens: settings.maxTokens,
          temperature: settings.temperature,
          system: request.system,
          messages: [{ role: 'user', content: request.prompt }],
        });

        let text = '';
        for (const block of response.content) {
          if (block.type === 'text') {
            text += block.text;
          }
        }
        return text;
      } catch (err) {
        // Subclass checks first: every SDK error extends APIError.
        if (err instanceof sdk.AuthenticationError) {
          throw new CompletionError(err.message, 'authentication', err.status);
        }
        if (err instanceof sdk.RateLimitError) {
          throw new CompletionError(err.message, 'rate-limit', err.status);
        }
        if (err instanceof sdk.APIConnectionError) {
          throw new CompletionError(err.message, 'connection');
        }
        if (err instanceof sdk.APIError) {
          if (typeof err.status === 'number') {
            throw new CompletionError(err.message, 'status', err.status);
          }
          throw new CompletionError(err.message, 'api');
        }
        throw err;
      }
    },
  };
}
