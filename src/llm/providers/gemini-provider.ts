import { Content, GoogleGenerativeAI } from '@google/generative-ai';
import {
  LLMProvider,
  LLMProviderConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
} from '../types';
import { logger } from '../../observability/logger';
import { alternateRoles, splitSystemMessages } from './message-mapping';

/**
 * Google Gemini provider adapter.
 *
 * System messages become `systemInstruction`; `assistant` turns map to the
 * `model` role. JSON mode uses `responseMimeType: 'application/json'`.
 */
export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  readonly model: string;
  private genAI: GoogleGenerativeAI;
  private timeoutMs: number;
  private log = logger.child({ component: 'gemini-provider' });

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
    this.genAI = new GoogleGenerativeAI(config.apiKey);
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();
    const { system, turns } = splitSystemMessages(request.messages);
    const contents: Content[] = alternateRoles(turns).map((turn) => ({
      role: turn.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: turn.content }],
    }));

    const model = this.genAI.getGenerativeModel(
      {
        model: this.model,
        systemInstruction: system || undefined,
        generationConfig: {
          temperature: request.temperature,
          maxOutputTokens: request.maxTokens,
          ...(request.jsonMode ? { responseMimeType: 'application/json' } : {}),
        },
      },
      { timeout: this.timeoutMs },
    );

    const { response } = await model.generateContent({ contents }, { signal: request.signal });
    const content = response.text();
    if (!content) {
      throw new Error('Gemini returned empty response');
    }

    const usage = response.usageMetadata;
    return {
      content,
      model: this.model,
      provider: 'gemini',
      usage: {
        promptTokens: usage?.promptTokenCount ?? 0,
        completionTokens: usage?.candidatesTokenCount ?? 0,
        totalTokens: usage?.totalTokenCount ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const model = this.genAI.getGenerativeModel({ model: this.model }, { timeout: this.timeoutMs });
      const result = await model.generateContent('ping');
      return result.response.text().length > 0;
    } catch (err) {
      this.log.warn({ err }, 'Gemini health check failed');
      return false;
    }
  }
}
