import {
  CompletionRouter,
  LLMProvider,
  LLMProviderName,
  LLMCompletionRequest,
  LLMCompletionResponse,
  ModelRouterConfig,
  ModelRoutingContext,
} from './types';
import { logger } from '../observability/logger';
import { llmRequestDuration, llmProviderFailovers, llmTokenUsage } from '../observability/metrics';

const CIRCUIT_BREAKER_THRESHOLD = 5;
const CIRCUIT_BREAKER_RESET_MS = 60_000;

interface CircuitBreakerState {
  failures: number;
  openUntil: number;
}

/**
 * Raised when every provider in the chain failed or was circuit-broken.
 * `errors` keeps each provider's failure so callers can classify it.
 */
export class AllProvidersFailedError extends Error {
  constructor(
    readonly errors: Error[],
    readonly skippedOpenCircuits: LLMProviderName[],
  ) {
    const last = errors[errors.length - 1];
    super(`All LLM providers failed. Last error: ${last?.message ?? 'all circuits open'}`);
    this.name = 'AllProvidersFailedError';
  }
}

/**
 * Model Router: sends each request down the provider priority chain
 * (primary → secondary → tertiary) with per-provider circuit breakers.
 */
export class ModelRouter implements CompletionRouter {
  private providers: Map<LLMProviderName, LLMProvider>;
  private config: ModelRouterConfig;
  private circuitBreakers: Map<LLMProviderName, CircuitBreakerState>;
  private log = logger.child({ component: 'model-router' });

  constructor(config: ModelRouterConfig, providers: Map<LLMProviderName, LLMProvider>) {
    this.config = config;
    this.providers = providers;
    this.circuitBreakers = new Map();

    if (!providers.has(config.primaryProvider)) {
      throw new Error(
        `Primary provider "${config.primaryProvider}" not available. ` +
        `Configured providers: ${Array.from(providers.keys()).join(', ')}`,
      );
    }

    this.log.info({
      primary: config.primaryProvider,
      secondary: config.secondaryProvider,
      tertiary: config.tertiaryProvider,
      availableProviders: Array.from(providers.keys()),
    }, 'Model router initialized');
  }

  /**
   * Route a completion request to the first healthy provider, failing over on error.
   */
  async complete(
    request: LLMCompletionRequest,
    context: ModelRoutingContext,
  ): Promise<LLMCompletionResponse> {
    const providerOrder = this.resolveProviderOrder();
    const errors: Error[] = [];
    const skipped: LLMProviderName[] = [];
    let lastAttempted: LLMProviderName | undefined;

    for (const providerName of providerOrder) {
      const provider = this.providers.get(providerName);
      if (!provider) continue;

      const cb = this.circuitBreakers.get(providerName);
      if (cb && Date.now() < cb.openUntil) {
        this.log.debug({ provider: providerName }, 'Circuit breaker open, skipping');
        skipped.push(providerName);
        continue;
      }

      const timer = llmRequestDuration.startTimer({
        provider: providerName,
        model: provider.model,
      });

      try {
        const response = await provider.complete(request);

        this.resetCircuitBreaker(providerName);
        timer({ status: 'success' });

        llmTokenUsage.inc(
          { provider: providerName, model: response.model, token_type: 'prompt' },
          response.usage.promptTokens,
        );
        llmTokenUsage.inc(
          { provider: providerName, model: response.model, token_type: 'completion' },
          response.usage.completionTokens,
        );

        if (lastAttempted) {
          llmProviderFailovers.inc({ from_provider: lastAttempted, to_provider: providerName });
          this.log.info(
            { from: lastAttempted, to: providerName, purpose: context.purpose, requestId: context.requestId },
            'Successful failover to secondary provider',
          );
        }

        return response;
      } catch (err) {
        timer({ status: 'error' });
        const error = err instanceof Error ? err : new Error(String(err));
        errors.push(error);
        lastAttempted = providerName;

        // An aborted request says nothing about provider health
        if (!request.signal?.aborted) {
          this.recordFailure(providerName);
        }

        this.log.warn(
          { provider: providerName, err: error.message, purpose: context.purpose, sessionId: context.sessionId },
          'Provider failed, trying next',
        );

        if (request.signal?.aborted) break;
      }
    }

    throw new AllProvidersFailedError(errors, skipped);
  }

  /**
   * Health check across all configured providers.
   */
  async healthCheck(): Promise<Record<string, { status: string; latencyMs: number }>> {
    const results: Record<string, { status: string; latencyMs: number }> = {};

    for (const [name, provider] of this.providers) {
      const start = Date.now();
      try {
        const healthy = await provider.healthCheck();
        results[name] = {
          status: healthy ? 'ok' : 'error',
          latencyMs: Date.now() - start,
        };
      } catch {
        results[name] = {
          status: 'error',
          latencyMs: Date.now() - start,
        };
      }
    }

    return results;
  }

  /**
   * Check if the circuit breaker is open for ALL providers (complete outage).
   */
  isFullyOpen(): boolean {
    const now = Date.now();
    for (const [name] of this.providers) {
      const cb = this.circuitBreakers.get(name);
      if (!cb || now >= cb.openUntil) return false;
    }
    return true;
  }

  // ─── Private ──────────────────────────────────────────────────

  private resolveProviderOrder(): LLMProviderName[] {
    const order: LLMProviderName[] = [this.config.primaryProvider];
    if (this.config.secondaryProvider && !order.includes(this.config.secondaryProvider)) {
      order.push(this.config.secondaryProvider);
    }
    if (this.config.tertiaryProvider && !order.includes(this.config.tertiaryProvider)) {
      order.push(this.config.tertiaryProvider);
    }
    return order;
  }

  private recordFailure(provider: LLMProviderName): void {
    const cb = this.circuitBreakers.get(provider) ?? { failures: 0, openUntil: 0 };
    cb.failures++;

    if (cb.failures >= CIRCUIT_BREAKER_THRESHOLD) {
      cb.openUntil = Date.now() + CIRCUIT_BREAKER_RESET_MS;
      this.log.error(
        { provider, failures: cb.failures, resetMs: CIRCUIT_BREAKER_RESET_MS },
        'Circuit breaker opened for provider',
      );
    }

    this.circuitBreakers.set(provider, cb);
  }

  private resetCircuitBreaker(provider: LLMProviderName): void {
    const cb = this.circuitBreakers.get(provider);
    if (cb) {
      cb.failures = 0;
      cb.openUntil = 0;
    }
  }
}
