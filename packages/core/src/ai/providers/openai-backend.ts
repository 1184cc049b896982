import OpenAI from 'openai';
import { ModelBackend } from '../../types.js';
import { BackendError, errorMessage } from '../../errors.js';
import type { ResolvedBackendConfig } from '../model-backend.js';

/**
 * Chat-completions backend. Serves both the hosted OpenAI API and locally
 * served OpenAI-compatible endpoints such as Ollama.
 */
export class OpenAIBackend implements ModelBackend {
  readonly provider: 'openai' | 'ollama';
  readonly model: string;
  private readonly client: OpenAI;
  private readonly maxTokens: number;

  constructor(provider: 'openai' | 'ollama', config: ResolvedBackendConfig) {
    this.provider = provider;
    this.model = config.model;
    this.maxTokens = config.maxTokens;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: config.maxRetries,
    });
  }

  async complete(prompt: string): Promise<string> {
    let completion: OpenAI.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [{ role: 'user', content: prompt }],
        temperature: 0,
      });
    } catch (error) {
      throw new BackendError(this.provider, `${this.provider} request failed: ${errorMessage(error)}`, { cause: error });
    }

    const text = completion.choices[0]?.message.content ?? '';
    if (!text.trim()) {
      throw new BackendError(this.provider, `${this.provider} returned an empty response`);
    }
    return text;
  }
}
