import Anthropic from '@anthropic-ai/sdk';
import { ModelBackend } from '../../types.js';
import { BackendError, errorMessage } from '../../errors.js';
import type { ResolvedBackendConfig } from '../model-backend.js';

export class AnthropicBackend implements ModelBackend {
  readonly provider = 'anthropic' as const;
  readonly model: string;
  private readonly client: Anthropic;
  private readonly maxTokens: number;

  constructor(config: ResolvedBackendConfig) {
    this.model = config.model;
    this.maxTokens = config.maxTokens;
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: config.maxRetries,
    });
  }

  async complete(prompt: string): Promise<string> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [{ role: 'user', content: prompt }],
        temperature: 0,
      });
    } catch (error) {
      throw new BackendError(this.provider, `Anthropic request failed: ${errorMessage(error)}`, { cause: error });
    }

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('\n');

    if (!text.trim()) {
      throw new BackendError(this.provider, 'Anthropic returned an empty response');
    }
    return text;
  }
}
