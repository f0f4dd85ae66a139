import { CompletionRouter } from '../llm/types';
import { AllProvidersFailedError } from '../llm/model-router';
import { logger } from '../observability/logger';
import { generationRetries } from '../observability/metrics';
import { GenerationFatalError, GenerationTransientError, errorMessage } from '../resilience/errors';
import { backoffDelay, delay, withTimeout } from '../resilience/timeout';
import { PromptManager } from './prompt-manager';
import { parseGenerationReply } from './response-contract';
import { GenerationReply } from './types';

export interface GenerationOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Per attempt */
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
  fallbackText: string;
  /** Injected in tests to skip real backoff */
  sleep?: (ms: number) => Promise<void>;
}

export interface GenerationOutcome extends GenerationReply {
  /** True when `answer` is the canned fallback */
  degraded: boolean;
  attempts: number;
  failure?: GenerationTransientError | GenerationFatalError;
}

export interface GenerationContext {
  sessionId: string;
  requestId?: string;
}

const FATAL_STATUSES = new Set([400, 401, 403, 404, 422]);

function statusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  return typeof err.status === 'number' ? err.status : undefined;
}

function isFatal(err: unknown): boolean {
  if (err instanceof GenerationFatalError) return true;
  if (err instanceof GenerationTransientError) return false;
  if (err instanceof AllProvidersFailedError) {
    // Open circuits or any retryable provider failure make the whole attempt retryable
    return err.errors.length > 0 && err.skippedOpenCircuits.length === 0 && err.errors.every(isFatal);
  }
  // Connection errors carry no status and fall through as transient
  const status = statusOf(err);
  return status !== undefined && FATAL_STATUSES.has(status);
}

/**
 * Sort a generation failure into retryable or not.
 * Timeouts, 408, 429, 5xx and connection errors are transient; 400, 401,
 * 403, 404 and 422 are fatal; anything unrecognised is treated as transient.
 */
export function classifyGenerationError(err: unknown): GenerationTransientError | GenerationFatalError {
  if (err instanceof GenerationTransientError || err instanceof GenerationFatalError) return err;
  return isFatal(err)
    ? new GenerationFatalError(errorMessage(err), err)
    : new GenerationTransientError(errorMessage(err), err);
}

/**
 * Calls the chat model with retry, exponential backoff and a per-attempt
 * timeout. Never throws: after the last failed attempt, or any fatal one,
 * the outcome carries the configured fallback text and `degraded: true`.
 */
export class GenerationClient {
  private log = logger.child({ component: 'generation-client' });
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly router: CompletionRouter,
    private readonly prompts: PromptManager,
    private readonly options: GenerationOptions,
  ) {
    this.sleep = options.sleep ?? delay;
  }

  async generate(prompt: string, context: GenerationContext): Promise<GenerationOutcome> {
    const maxAttempts = Math.max(0, this.options.maxRetries) + 1;
    let failure: GenerationTransientError | GenerationFatalError | undefined;
    let attempt = 0;

    while (attempt < maxAttempts) {
      attempt++;
      try {
        const response = await withTimeout(
          (signal) => this.router.complete(
            {
              messages: [
                { role: 'system', content: this.prompts.system },
                { role: 'user', content: prompt },
              ],
              temperature: this.options.temperature,
              maxTokens: this.options.maxTokens,
              jsonMode: true,
              signal,
            },
            { ...context, purpose: 'generation' },
          ),
          this.options.timeoutMs,
          () => new GenerationTransientError(`Generation timed out after ${this.options.timeoutMs}ms`),
        );

        const reply = parseGenerationReply(response.content);
        if (!reply.answer) {
          throw new GenerationTransientError('Model returned an empty answer');
        }
        return { ...reply, degraded: false, attempts: attempt };
      } catch (err) {
        failure = classifyGenerationError(err);
        this.log.warn(
          { attempt, maxAttempts, fatal: failure instanceof GenerationFatalError, err: failure.message, ...context },
          'Generation attempt failed',
        );
        if (failure instanceof GenerationFatalError) break;
        if (attempt < maxAttempts) {
          generationRetries.inc();
          await this.sleep(backoffDelay(attempt, this.options.baseDelayMs, this.options.maxDelayMs));
        }
      }
    }

    this.log.error({ attempts: attempt, err: failure?.message, ...context }, 'Generation failed, using fallback response');
    return {
      answer: this.options.fallbackText,
      intent: null,
      suggestedQuestions: [],
      degraded: true,
      attempts: attempt,
      failure,
    };
  }
}
