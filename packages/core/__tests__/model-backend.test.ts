import { describe, it, expect, vi, beforeEach } from 'vitest';

const sdk = vi.hoisted(() => ({
  anthropicCreate: vi.fn(),
  anthropicOptions: vi.fn(),
  openaiCreate: vi.fn(),
  openaiOptions: vi.fn(),
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: sdk.anthropicCreate };
    constructor(options: unknown) {
      sdk.anthropicOptions(options);
    }
  },
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: sdk.openaiCreate } };
    constructor(options: unknown) {
      sdk.openaiOptions(options);
    }
  },
}));

import { createModelBackend, DEFAULT_OLLAMA_BASE_URL } from '../src/ai/model-backend.js';
import { BackendError, ConfigError } from '../src/errors.js';

beforeEach(() => {
  vi.clearAllMocks();
});

// ── Provider selection ──────────────────────────────────────────────────────

describe('createModelBackend', () => {
  it('builds the Anthropic backend with defaults', () => {
    const backend = createModelBackend({ provider: 'anthropic', apiKey: 'test-secret' });

    expect(backend.provider).toBe('anthropic');
    expect(backend.model).toBe('claude-3-5-sonnet-latest');
    expect(sdk.anthropicOptions).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: undefined,
      timeout: 60_000,
      maxRetries: 1,
    });
  });

  it('builds the OpenAI backend with explicit settings', () => {
    const backend = createModelBackend({
      provider: 'openai',
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
      timeoutMs: 5000,
      maxRetries: 3,
    });

    expect(backend.provider).toBe('openai');
    expect(backend.model).toBe('gpt-4o-mini');
    expect(sdk.openaiOptions).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: undefined,
      timeout: 5000,
      maxRetries: 3,
    });
  });

  it('builds the Ollama backend against the local endpoint without a key', () => {
    const backend = createModelBackend({ provider: 'ollama' });

    expect(backend.provider).toBe('ollama');
    expect(backend.model).toBe('llama3.2:latest');
    expect(sdk.openaiOptions).toHaveBeenCalledWith(
      expect.objectContaining({ baseURL: DEFAULT_OLLAMA_BASE_URL, apiKey: 'ollama' }),
    );
  });

  it('rejects a hosted provider without an API key', () => {
    expect(() => createModelBackend({ provider: 'openai' })).toThrow(
      'Missing API key for provider "openai" (set OPENAI_API_KEY)',
    );

    try {
      createModelBackend({ provider: 'anthropic', apiKey: '' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ settings: ['ANTHROPIC_API_KEY'] });
    }
  });
});

// ── Anthropic ───────────────────────────────────────────────────────────────

describe('Anthropic backend', () => {
  it('sends one user message and joins the text blocks', async () => {
    sdk.anthropicCreate.mockResolvedValue({
      content: [
        { type: 'text', text: '{"fulfilled":' },
        { type: 'tool_use', id: 't1', name: 'x', input: {} },
        { type: 'text', text: 'true}' },
      ],
    });
    const backend = createModelBackend({ provider: 'anthropic', apiKey: 'test-secret', maxTokens: 500 });

    await expect(backend.complete('Evaluate this')).resolves.toBe('{"fulfilled":\ntrue}');
    expect(sdk.anthropicCreate).toHaveBeenCalledWith({
      model: 'claude-3-5-sonnet-latest',
      max_tokens: 500,
      messages: [{ role: 'user', content: 'Evaluate this' }],
      temperature: 0,
    });
  });

  it('wraps SDK failures in a BackendError', async () => {
    sdk.anthropicCreate.mockRejectedValue(new Error('401 invalid x-api-key'));
    const backend = createModelBackend({ provider: 'anthropic', apiKey: 'test-secret' });

    const error = await backend.complete('p').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendError);
    expect(error).toMatchObject({ provider: 'anthropic', message: 'Anthropic request failed: 401 invalid x-api-key' });
  });

  it('treats an empty answer as a failure', async () => {
    sdk.anthropicCreate.mockResolvedValue({ content: [] });
    const backend = createModelBackend({ provider: 'anthropic', apiKey: 'test-secret' });

    await expect(backend.complete('p')).rejects.toThrow('Anthropic returned an empty response');
  });
});

// ── OpenAI-compatible ───────────────────────────────────────────────────────

describe('OpenAI-compatible backend', () => {
  it('returns the first choice content', async () => {
    sdk.openaiCreate.mockResolvedValue({ choices: [{ message: { content: 'ok' } }] });
    const backend = createModelBackend({ provider: 'openai', apiKey: 'test-secret' });

    await expect(backend.complete('p')).resolves.toBe('ok');
    expect(sdk.openaiCreate).toHaveBeenCalledWith({
      model: 'gpt-4o',
      max_tokens: 2000,
      messages: [{ role: 'user', content: 'p' }],
      temperature: 0,
    });
  });

  it('names the local provider in failures', async () => {
    sdk.openaiCreate.mockRejectedValue(new Error('connect ECONNREFUSED'));
    const backend = createModelBackend({ provider: 'ollama' });

    await expect(backend.complete('p')).rejects.toThrow('ollama request failed: connect ECONNREFUSED');
  });

  it('treats a missing choice as an empty answer', async () => {
    sdk.openaiCreate.mockResolvedValue({ choices: [] });
    const backend = createModelBackend({ provider: 'openai', apiKey: 'test-secret' });

    await expect(backend.complete('p')).rejects.toThrow('openai returned an empty response');
  });
});
