/**
 * Tests for the Anthropic completion client. The SDK is mocked; no
 * requests leave the process.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

class FakeAPIError extends Error {
  constructor(
    readonly status: number | undefined,
    message: string,
  ) {
    super(message);
  }
}
class FakeAuthenticationError extends FakeAPIError {}
class FakeRateLimitError extends FakeAPIError {}
class FakeAPIConnectionError extends FakeAPIError {}

const create = vi.fn();
const constructed: unknown[] = [];

class FakeAnthropic {
  messages = { create };
  constructor(options: unknown) {
    constructed.push(options);
  }
}

const SETTINGS = { model: 'claude-sonnet-4-20250514', maxTokens: 700, temperature: 0.7 };

async function loadClientModule() {
  vi.doMock('@anthropic-ai/sdk', () => ({
    default: FakeAnthropic,
    APIError: FakeAPIError,
    AuthenticationError: FakeAuthenticationError,
    RateLimitError: FakeRateLimitError,
    APIConnectionError: FakeAPIConnectionError,
  }));
  const clientModule = await import('./anthropic-client.js');
  // Same module registry as the client, so instanceof holds
  const { CompletionError } = await import('./types.js');
  return { ...clientModule, CompletionError };
}

describe('createAnthropicCompletionClient', () => {
  beforeEach(() => {
    vi.resetModules();
    create.mockReset();
    constructed.length = 0;
  });

  it('returns null without an API key', async () => {
    const { createAnthropicCompletionClient } = await loadClientModule();
    expect(createAnthropicCompletionClient(SETTINGS, {})).toBeNull();
  });

  it('sends the configured request and joins text blocks', async () => {
    create.mockResolvedValue({
      content: [
        { type: 'text', text: 'First part. ' },
        { type: 'tool_use', id: 'x', name: 'noop', input: {} },
        { type: 'text', text: 'Second part.' },
      ],
    });
    const { createAnthropicCompletionClient } = await loadClientModule();
    const client = createAnthropicCompletionClient(SETTINGS, { ANTHROPIC_API_KEY: 'test-key' });

    const text = await client?.complete({ system: 'Be brief.', prompt: 'Summarize this.' });

    expect(text).toBe('First part. Second part.');
    expect(constructed).toEqual([{ apiKey: 'test-key' }]);
    expect(create).toHaveBeenCalledWith({
      model: 'claude-sonnet-4-20250514',
      max_tokens: 700,
      temperature: 0.7,
      system: 'Be brief.',
      messages: [{ role: 'user', content: 'Summarize this.' }],
    });
  });

  it.each([
    [new FakeAuthenticationError(401, 'invalid x-api-key'), 'authentication', 401],
    [new FakeRateLimitError(429, 'rate limited'), 'rate-limit', 429],
    [new FakeAPIConnectionError(undefined, 'Connection error.'), 'connection', undefined],
    [new FakeAPIError(500, 'Internal server error'), 'status', 500],
    [new FakeAPIError(undefined, 'malformed'), 'api', undefined],
  ] as const)('maps SDK errors to completion errors (%#)', async (error, kind, status) => {
    create.mockRejectedValue(error);
    const { createAnthropicCompletionClient, CompletionError } = await loadClientModule();
    const client = createAnthropicCompletionClient(SETTINGS, { ANTHROPIC_API_KEY: 'test-key' });

    const caught = await client?.complete({ system: '', prompt: 'x' }).catch((e: unknown) => e);

    expect(caught).toBeInstanceOf(CompletionError);
    if (caught instanceof CompletionError) {
      expect(caught.kind).toBe(kind);
      expect(caught.status).toBe(status);
      expect(caught.message).toBe(error.message);
    }
  });

  it('rethrows errors that are not from the SDK', async () => {
    create.mockRejectedValue(new TypeError('socket closed'));
    const { createAnthropicCompletionClient } = await loadClientModule();
    const client = createAnthropicCompletionClient(SETTINGS, { ANTHROPIC_API_KEY: 'test-key' });

    await expect(client?.complete({ system: '', prompt: 'x' })).rejects.toThrow(TypeError);
  });
});
