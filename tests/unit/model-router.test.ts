import { AllProvidersFailedError, ModelRouter } from '../../src/llm/model-router';
import { LLMCompletionRequest, LLMCompletionResponse, LLMProvider, LLMProviderName } from '../../src/llm/types';
import { HttpStatusError, completion } from '../helpers/fakes';

class FakeProvider implements LLMProvider {
  readonly model = 'fake-model';
  calls = 0;

  constructor(
    readonly name: LLMProviderName,
    private readonly behaviour: () => Promise<LLMCompletionResponse>,
    private readonly healthy = true,
  ) {}

  async complete(_request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    this.calls++;
    return this.behaviour();
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}

const ok = (name: LLMProviderName, content = 'ok') =>
  new FakeProvider(name, async () => ({ ...completion(content), provider: name }));
const failing = (name: LLMProviderName, status = 503) =>
  new FakeProvider(name, async () => {
    throw new HttpStatusError(status);
  });

const request: LLMCompletionRequest = {
  messages: [{ role: 'user', content: 'hello' }],
  temperature: 0,
  maxTokens: 16,
  jsonMode: false,
};
const context = { purpose: 'generation' };

function router(...providers: FakeProvider[]): ModelRouter {
  const [primary, secondary, tertiary] = providers.map((p) => p.name);
  return new ModelRouter(
    { primaryProvider: primary, secondaryProvider: secondary, tertiaryProvider: tertiary },
    new Map(providers.map((p): [LLMProviderName, LLMProvider] => [p.name, p])),
  );
}

describe('ModelRouter', () => {
  it('should refuse a primary provider that is not configured', () => {
    expect(() => new ModelRouter(
      { primaryProvider: 'gemini' },
      new Map<LLMProviderName, LLMProvider>([['openai', ok('openai')]]),
    )).toThrow(
      'Primary provider "gemini" not available',
    );
  });

  it('should serve from the primary provider', async () => {
    const primary = ok('openai', 'from openai');
    const secondary = ok('anthropic');
    const response = await router(primary, secondary).complete(request, context);

    expect(response.content).toBe('from openai');
    expect(secondary.calls).toBe(0);
  });

  it('should fail over down the chain', async () => {
    const secondary = failing('anthropic');
    const tertiary = ok('gemini', 'from gemini');
    const response = await router(failing('openai'), secondary, tertiary).complete(request, context);

    expect(response.provider).toBe('gemini');
    expect(secondary.calls).toBe(1);
  });

  it('should report every provider error when all fail', async () => {
    const err = await router(failing('openai', 401), failing('anthropic', 500))
      .complete(request, context)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AllProvidersFailedError);
    expect(err).toMatchObject({ skippedOpenCircuits: [] });
    expect(err instanceof AllProvidersFailedError ? err.errors.map((e) => e.message) : []).toEqual([
      'HTTP 401',
      'HTTP 500',
    ]);
  });

  it('should skip a provider whose circuit is open', async () => {
    const primary = failing('openai');
    const r = router(primary, ok('anthropic'));
    for (let i = 0; i < 5; i++) {
      await r.complete(request, context);
    }
    expect(primary.calls).toBe(5);

    await r.complete(request, context);
    expect(primary.calls).toBe(5);
    expect(r.isFullyOpen()).toBe(false);
  });

  it('should report a full outage once every circuit is open', async () => {
    const r = router(failing('openai'), failing('anthropic'));
    for (let i = 0; i < 5; i++) {
      await expect(r.complete(request, context)).rejects.toBeInstanceOf(AllProvidersFailedError);
    }

    expect(r.isFullyOpen()).toBe(true);
    await expect(r.complete(request, context)).rejects.toMatchObject({ errors: [], skippedOpenCircuits: ['openai', 'anthropic'] });
  });

  it('should stop failing over once the caller has aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const secondary = ok('anthropic');

    await expect(
      router(failing('openai'), secondary).complete({ ...request, signal: controller.signal }, context),
    ).rejects.toBeInstanceOf(AllProvidersFailedError);
    expect(secondary.calls).toBe(0);
  });

  it('should health-check every provider', async () => {
    const r = router(ok('openai'), new FakeProvider('anthropic', async () => completion('x'), false));
    const checks = await r.healthCheck();

    expect(checks.openai.status).toBe('ok');
    expect(checks.anthropic.status).toBe('error');
  });
});
