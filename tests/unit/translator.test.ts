import { ChainedTranslator, GoogleTranslator, LLMTranslator, Translator } from '../../src/language/translator';
import { PromptManager } from '../../src/agent/prompt-manager';
import { TranslationUnavailableError } from '../../src/resilience/errors';
import { ScriptedRouter } from '../helpers/fakes';

const SUPPORTED = ['en', 'hi', 'raj', 'gu', 'mr', 'pa', 'ta'];

describe('LLMTranslator', () => {
  const prompts = new PromptManager();

  const makeTranslator = (router: ScriptedRouter, timeoutMs = 1000) =>
    new LLMTranslator(router, prompts, { supportedLanguages: SUPPORTED, timeoutMs, maxTokens: 256 });

  it('should return the text unchanged when source equals target', async () => {
    const router = ScriptedRouter.replying('unused');
    await expect(makeTranslator(router).translate('Hello', 'en', 'en')).resolves.toBe('Hello');
    expect(router.calls).toHaveLength(0);
  });

  it('should return blank text unchanged', async () => {
    const router = ScriptedRouter.replying('unused');
    await expect(makeTranslator(router).translate('   ', 'hi', 'en')).resolves.toBe('   ');
    expect(router.calls).toHaveLength(0);
  });

  it('should translate through the router with the translation prompt', async () => {
    const router = ScriptedRouter.replying('  When does the library open?  ');
    const result = await makeTranslator(router).translate('पुस्तकालय कब खुलता है?', 'hi', 'en');

    expect(result).toBe('When does the library open?');
    expect(router.calls).toHaveLength(1);
    const { request, context } = router.calls[0];
    expect(request.jsonMode).toBe(false);
    expect(request.temperature).toBe(0);
    expect(request.messages[0].role).toBe('system');
    expect(request.messages[0].content).toContain('from Hindi to English');
    expect(request.messages[1]).toEqual({ role: 'user', content: 'पुस्तकालय कब खुलता है?' });
    expect(context.purpose).toBe('translation');
  });

  it('should reject unsupported language pairs without calling the model', async () => {
    const router = ScriptedRouter.replying('unused');
    await expect(makeTranslator(router).translate('Hola', 'es', 'en')).rejects.toBeInstanceOf(TranslationUnavailableError);
    expect(router.calls).toHaveLength(0);
  });

  it('should wrap upstream failures in TranslationUnavailableError', async () => {
    const router = ScriptedRouter.failing(new Error('boom'));
    const err = await makeTranslator(router).translate('Hello', 'en', 'hi').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TranslationUnavailableError);
    expect(err).toMatchObject({ source: 'en', target: 'hi', code: 'TRANSLATION_UNAVAILABLE' });
  });

  it('should fail with TranslationUnavailableError when the model does not answer in time', async () => {
    const router = new ScriptedRouter([{ hang: true }]);
    await expect(makeTranslator(router, 20).translate('Hello', 'en', 'ta')).rejects.toThrow(/timed out after 20ms/);
    expect(router.calls[0].request.signal?.aborted).toBe(true);
  });
});

describe('GoogleTranslator', () => {
  const translator = new GoogleTranslator({ apiKey: 'test-key', timeoutMs: 1000, baseUrl: 'https://translate.test/v2' });
  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should call the v2 REST API and return the translated text', async () => {
    fetchSpy.mockResolvedValue(
      new Response(JSON.stringify({ data: { translations: [{ translatedText: 'Hello' }] } }), { status: 200 }),
    );

    await expect(translator.translate('नमस्ते', 'hi', 'en')).resolves.toBe('Hello');

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://translate.test/v2?key=test-key');
    expect(JSON.parse(String(init.body))).toEqual({ q: 'नमस्ते', source: 'hi', target: 'en', format: 'text' });
  });

  it('should map Rajasthani to the Hindi model', async () => {
    fetchSpy.mockResolvedValue(
      new Response(JSON.stringify({ data: { translations: [{ translatedText: 'Hello' }] } }), { status: 200 }),
    );

    await translator.translate('राम राम सा', 'raj', 'en');

    const [, init] = fetchSpy.mock.calls[0];
    expect(JSON.parse(String(init.body)).source).toBe('hi');
  });

  it('should skip the API when both codes map to the same model', async () => {
    await expect(translator.translate('राम राम सा', 'raj', 'hi')).resolves.toBe('राम राम सा');
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should throw TranslationUnavailableError on an API error', async () => {
    fetchSpy.mockResolvedValue(new Response('quota exceeded', { status: 403 }));
    await expect(translator.translate('Hello', 'en', 'hi')).rejects.toBeInstanceOf(TranslationUnavailableError);
  });

  it('should throw TranslationUnavailableError for unknown language codes', async () => {
    await expect(translator.translate('Hello', 'en', 'xx')).rejects.toBeInstanceOf(TranslationUnavailableError);
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});

describe('ChainedTranslator', () => {
  const failing: Translator = {
    translate: jest.fn().mockRejectedValue(new TranslationUnavailableError('down', 'hi', 'en')),
  };

  it('should fall back to the next translator when one fails', async () => {
    const working: Translator = { translate: jest.fn().mockResolvedValue('Hello') };
    const chained = new ChainedTranslator([failing, working]);

    await expect(chained.translate('नमस्ते', 'hi', 'en')).resolves.toBe('Hello');
    expect(working.translate).toHaveBeenCalledWith('नमस्ते', 'hi', 'en');
  });

  it('should throw TranslationUnavailableError when every translator fails', async () => {
    const alsoFailing: Translator = { translate: jest.fn().mockRejectedValue(new Error('timeout')) };
    const chained = new ChainedTranslator([failing, alsoFailing]);

    const err = await chained.translate('नमस्ते', 'hi', 'en').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TranslationUnavailableError);
    expect(err).toMatchObject({ source: 'hi', target: 'en' });
  });

  it('should refuse an empty chain', () => {
    expect(() => new ChainedTranslator([])).toThrow('at least one translator');
  });
});
