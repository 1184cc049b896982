import { ModelBackend, ProviderId } from '../types.js';
import { ConfigError } from '../errors.js';
import { AnthropicBackend } from './providers/anthropic-backend.js';
import { OpenAIBackend } from './providers/openai-backend.js';

export const PROVIDERS = ['anthropic', 'openai', 'ollama'] as const satisfies readonly ProviderId[];

export const DEFAULT_MODELS: Record<ProviderId, string> = {
  anthropic: 'claude-3-5-sonnet-latest',
  openai: 'gpt-4o',
  ollama: 'llama3.2:latest',
};

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

/** Environment variable holding each hosted provider's key. */
export const API_KEY_ENV: Record<Exclude<ProviderId, 'ollama'>, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
};

export interface BackendConfig {
  provider: ProviderId;
  model?: string;
  baseUrl?: string;
  /** Not used by the local variant. */
  apiKey?: string;
  maxTokens?: number;
  timeoutMs?: number;
  /** Bounded retries with backoff, performed by the provider SDK. */
  maxRetries?: number;
}

export interface ResolvedBackendConfig {
  model: string;
  baseUrl?: string;
  apiKey: string;
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
}

const DEFAULT_MAX_TOKENS = 2000;
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RETRIES = 1;

function requireApiKey(provider: Exclude<ProviderId, 'ollama'>, apiKey: string | undefined): string {
  if (!apiKey) {
    const variable = API_KEY_ENV[provider];
    throw new ConfigError(`Missing API key for provider "${provider}" (set ${variable})`, [variable]);
  }
  return apiKey;
}

/**
 * Build the backend for the configured provider. The provider is resolved
 * here, once; callers only ever see the `complete` capability.
 */
export function createModelBackend(config: BackendConfig): ModelBackend {
  const common = {
    model: config.model || DEFAULT_MODELS[config.provider],
    maxTokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
    timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    maxRetries: config.maxRetries ?? DEFAULT_MAX_RETRIES,
  };

  switch (config.provider) {
    case 'anthropic':
      return new AnthropicBackend({
        ...common,
        baseUrl: config.baseUrl,
        apiKey: requireApiKey('anthropic', config.apiKey),
      });
    case 'openai':
      return new OpenAIBackend('openai', {
        ...common,
        baseUrl: config.baseUrl,
        apiKey: requireApiKey('openai', config.apiKey),
      });
    case 'ollama':
      // Ollama ignores the key but the SDK insists on one.
      return new OpenAIBackend('ollama', {
        ...common,
        baseUrl: config.baseUrl || DEFAULT_OLLAMA_BASE_URL,
        apiKey: 'ollama',
      });
  }
}
