import { PromptManager } from '../agent/prompt-manager';
import { TRANSLATION_CODES } from '../config/languages';
import { CompletionRouter } from '../llm/types';
import { logger } from '../observability/logger';
import { TranslationUnavailableError, errorMessage } from '../resilience/errors';
import { withTimeout } from '../resilience/timeout';

export interface Translator {
  /**
   * Translate `text` from `source` to `target`.
   * Identity when the languages match or the text is blank.
   * @throws TranslationUnavailableError on an unsupported pair, upstream failure or timeout
   */
  translate(text: string, source: string, target: string): Promise<string>;
}

function isIdentity(text: string, source: string, target: string): boolean {
  return source === target || text.trim() === '';
}

function wrapFailure(err: unknown, source: string, target: string): TranslationUnavailableError {
  if (err instanceof TranslationUnavailableError) return err;
  return new TranslationUnavailableError(
    `Translation ${source}→${target} failed: ${errorMessage(err)}`,
    source,
    target,
    err,
  );
}

export interface LLMTranslatorOptions {
  supportedLanguages: readonly string[];
  timeoutMs: number;
  maxTokens: number;
}

/**
 * Translates with the chat model through the provider router.
 */
export class LLMTranslator implements Translator {
  private readonly supported: Set<string>;

  constructor(
    private readonly router: CompletionRouter,
    private readonly prompts: PromptManager,
    private readonly options: LLMTranslatorOptions,
  ) {
    this.supported = new Set(options.supportedLanguages);
  }

  async translate(text: string, source: string, target: string): Promise<string> {
    if (isIdentity(text, source, target)) return text;
    if (!this.supported.has(source) || !this.supported.has(target)) {
      throw new TranslationUnavailableError(`Unsupported language pair ${source}→${target}`, source, target);
    }

    try {
      const response = await withTimeout(
        (signal) => this.router.complete(
          {
            messages: [
              { role: 'system', content: this.prompts.translation(source, target) },
              { role: 'user', content: text },
            ],
            temperature: 0,
            maxTokens: this.options.maxTokens,
            jsonMode: false,
            signal,
          },
          { purpose: 'translation' },
        ),
        this.options.timeoutMs,
        () => new TranslationUnavailableError(
          `Translation ${source}→${target} timed out after ${this.options.timeoutMs}ms`,
          source,
          target,
        ),
      );
      const translated = response.content.trim();
      if (!translated) {
        throw new TranslationUnavailableError('Model returned an empty translation', source, target);
      }
      return translated;
    } catch (err) {
      throw wrapFailure(err, source, target);
    }
  }
}

export interface GoogleTranslatorOptions {
  apiKey: string;
  timeoutMs: number;
  baseUrl?: string;
}

interface GoogleTranslateBody {
  data: { translations: Array<{ translatedText: string }> };
}

function isGoogleTranslateBody(value: unknown): value is GoogleTranslateBody {
  if (typeof value !== 'object' || value === null || !('data' in value)) return false;
  const data = value.data;
  return typeof data === 'object' && data !== null && 'translations' in data && Array.isArray(data.translations);
}

/**
 * Google Cloud Translation v2 over REST.
 * Language codes without a model of their own are mapped through TRANSLATION_CODES.
 */
export class GoogleTranslator implements Translator {
  private readonly baseUrl: string;
  private log = logger.child({ component: 'google-translator' });

  constructor(private readonly options: GoogleTranslatorOptions) {
    this.baseUrl = options.baseUrl ?? 'https://translation.googleapis.com/language/translate/v2';
  }

  async translate(text: string, source: string, target: string): Promise<string> {
    if (isIdentity(text, source, target)) return text;

    const from = TRANSLATION_CODES[source];
    const to = TRANSLATION_CODES[target];
    if (!from || !to) {
      throw new TranslationUnavailableError(`Unsupported language pair ${source}→${target}`, source, target);
    }
    if (from === to) return text;

    try {
      return await withTimeout(
        async (signal) => {
          const response = await fetch(`${this.baseUrl}?key=${encodeURIComponent(this.options.apiKey)}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ q: text, source: from, target: to, format: 'text' }),
            signal,
          });

          if (!response.ok) {
            const errorBody = await response.text();
            this.log.error({ status: response.status, body: errorBody }, 'Google Translate API error');
            throw new Error(`Translate API error: ${response.status}`);
          }

          const body: unknown = await response.json();
          const translated = isGoogleTranslateBody(body) ? body.data.translations[0]?.translatedText : undefined;
          if (!translated) {
            throw new Error('Translate API returned no translation');
          }
          return translated;
        },
        this.options.timeoutMs,
        () => new TranslationUnavailableError(
          `Translation ${source}→${target} timed out after ${this.options.timeoutMs}ms`,
          source,
          target,
        ),
      );
    } catch (err) {
      throw wrapFailure(err, source, target);
    }
  }
}

/**
 * Tries each translator in order and returns the first success.
 */
export class ChainedTranslator implements Translator {
  private log = logger.child({ component: 'chained-translator' });

  constructor(private readonly translators: Translator[]) {
    if (translators.length === 0) {
      throw new Error('ChainedTranslator needs at least one translator');
    }
  }

  async translate(text: string, source: string, target: string): Promise<string> {
    if (isIdentity(text, source, target)) return text;

    let lastError: unknown;
    for (const translator of this.translators) {
      try {
        return await translator.translate(text, source, target);
      } catch (err) {
        lastError = err;
        this.log.warn({ err: errorMessage(err), source, target }, 'Translator failed, trying next');
      }
    }
    throw wrapFailure(lastError, source, target);
  }
}
