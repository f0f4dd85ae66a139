import Anthropic from '@anthropic-ai/sdk';
import {
  LLMProvider,
  LLMProviderConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
} from '../types';
import { logger } from '../../observability/logger';
import { alternateRoles, splitSystemMessages } from './message-mapping';

const JSON_ONLY_INSTRUCTION =
  'Respond with a single JSON object only: no markdown fences and no text before or after it.';

/**
 * Anthropic Claude provider adapter.
 *
 * System messages go in the separate `system` parameter and turns must
 * alternate starting with the user. There is no JSON mode, so the system
 * prompt asks for bare JSON and a dropped leading `{` is restored.
 */
export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic' as const;
  readonly model: string;
  private client: Anthropic;
  private log = logger.child({ component: 'anthropic-provider' });

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.client = new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();
    const { system, turns } = splitSystemMessages(request.messages);
    const systemPrompt = request.jsonMode
      ? [system, JSON_ONLY_INSTRUCTION].filter(Boolean).join('\n\n')
      : system;

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: systemPrompt || undefined,
        messages: alternateRoles(turns),
      },
      { signal: request.signal },
    );

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');
    if (!text) {
      throw new Error('Anthropic returned no text content');
    }
    const content = request.jsonMode && !text.trimStart().startsWith('{') && text.includes('}')
      ? `{${text}`
      : text;

    const { input_tokens: promptTokens, output_tokens: completionTokens } = response.usage;
    return {
      content,
      model: response.model,
      provider: 'anthropic',
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      latencyMs: Date.now() - start,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: 1,
        messages: [{ role: 'user', content: 'ping' }],
      });
      return response.content.length > 0;
    } catch (err) {
      this.log.warn({ err }, 'Anthropic health check failed');
      return false;
    }
  }
}
