import { FastifyInstance } from 'fastify';
import { createServer } from '../../src/app';
import { RateLimiter } from '../../src/security/rate-limiter';
import { UnreachableSessions, harness } from '../helpers/pipeline';

describe('Chat API', () => {
  let app: FastifyInstance;
  let indexed = 1;

  beforeAll(async () => {
    const { orchestrator } = harness();
    app = await createServer({
      orchestrator,
      indexedChunks: () => indexed,
      corsOrigins: ['http://localhost:3000'],
      maxMessageLength: 50,
      defaultLanguage: 'en',
      enableMetrics: true,
    });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('POST /api/v1/chat', () => {
    it('should answer a message', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/chat',
        payload: { message: '  What are the library hours?  ', session_id: 'web-1' },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body).toMatchObject({
        session_id: 'web-1',
        response_text: 'The library is open from 8 AM to 10 PM.',
        detected_language: 'en',
        response_language: 'en',
        intent: 'library',
        needs_escalation: false,
        suggested_questions: ['Is the library open on Sunday?'],
      });
      expect(body.sources).toEqual([
        { title: 'When does the library open?', content: 'The library is open 8 AM to 10 PM on weekdays.', score: 0.91 },
      ]);
      expect(body.confidence).toBeCloseTo(0.928);
    });

    it('should reject a missing message', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/v1/chat', payload: { session_id: 'web-1' } });

      expect(res.statusCode).toBe(422);
      expect(res.json().error).toBe('validation_error');
    });

    it('should reject a blank message', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/v1/chat', payload: { message: '   ' } });
      expect(res.statusCode).toBe(422);
    });

    it('should reject a message over the length limit', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/v1/chat', payload: { message: 'a'.repeat(51) } });

      expect(res.statusCode).toBe(422);
      expect(res.json().details).toEqual([
        { field: '/message', message: 'must NOT have more than 50 characters' },
      ]);
    });

    it('should reject unknown fields', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/chat',
        payload: { message: 'hello there', channel: 'whatsapp' },
      });
      expect(res.statusCode).toBe(422);
    });

    it('should return 503 with an error turn when the session store is down', async () => {
      const { orchestrator } = harness({ sessions: new UnreachableSessions() });
      const failing = await createServer({
        orchestrator,
        corsOrigins: [],
        maxMessageLength: 50,
        defaultLanguage: 'en',
        enableMetrics: false,
      });

      const res = await failing.inject({
        method: 'POST',
        url: '/api/v1/chat',
        payload: { message: 'What are the library hours?', session_id: 'web-2' },
      });
      await failing.close();

      expect(res.statusCode).toBe(503);
      expect(res.json()).toMatchObject({
        error: 'orchestration_fatal',
        session_id: 'web-2',
        response_text: 'Sorry, I could not load our conversation just now. Please try again in a minute.',
      });
    });
  });

  describe('GET /api/v1/chat/languages', () => {
    it('should list supported languages with display names', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/chat/languages' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        languages: [
          { code: 'en', name: 'English' },
          { code: 'hi', name: 'Hindi' },
          { code: 'mr', name: 'Marathi' },
          { code: 'ta', name: 'Tamil' },
        ],
      });
    });
  });

  describe('GET /api/v1/chat/welcome', () => {
    it('should return the welcome message in the requested language', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/chat/welcome?language=mr' });

      expect(res.json()).toEqual({
        message: 'नमस्कार! मी कॅम्पस असिस्टंट आहे. प्रवेश, फी, परीक्षा, वसतिगृह किंवा ग्रंथालयाबद्दल मला विचारा.',
        language: 'mr',
      });
    });

    it('should fall back to English', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/chat/welcome?language=xx' });
      expect(res.json().language).toBe('en');
    });
  });

  describe('health', () => {
    it('should report liveness', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });
      expect(res.statusCode).toBe(200);
      expect(res.json().status).toBe('ok');
    });

    it('should report ready with an indexed knowledge base', async () => {
      indexed = 1;
      const res = await app.inject({ method: 'GET', url: '/ready' });

      expect(res.statusCode).toBe(200);
      expect(res.json().checks).toEqual({
        redis: { status: 'skipped' },
        llm: { status: 'skipped' },
        knowledge: { status: 'ok', detail: '1 chunks' },
      });
    });

    it('should report not ready with an empty knowledge base', async () => {
      indexed = 0;
      const res = await app.inject({ method: 'GET', url: '/ready' });

      expect(res.statusCode).toBe(503);
      expect(res.json().status).toBe('not_ready');
    });

    it('should expose Prometheus metrics', async () => {
      const res = await app.inject({ method: 'GET', url: '/metrics' });

      expect(res.statusCode).toBe(200);
      expect(res.body).toContain('chat_messages_total');
    });
  });

  describe('response headers', () => {
    it('should echo the caller request id and report the response time', async () => {
      const res = await app.inject({ method: 'GET', url: '/health', headers: { 'x-request-id': 'req-test-1' } });

      expect(res.headers['x-request-id']).toBe('req-test-1');
      expect(res.headers['x-response-time']).toMatch(/^\d+\.\d{3}s$/);
    });

    it('should generate a request id when none is sent', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/chat/languages' });

      expect(res.headers['x-request-id']).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    });
  });
});

describe('Chat API rate limiting', () => {
  let app: FastifyInstance;
  const limiter = new RateLimiter(2, 60, () => 1_000);

  beforeAll(async () => {
    const { orchestrator } = harness();
    app = await createServer({
      orchestrator,
      indexedChunks: () => 1,
      corsOrigins: ['http://localhost:3000'],
      maxMessageLength: 50,
      defaultLanguage: 'en',
      enableMetrics: false,
      rateLimiter: limiter,
    });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  const send = () =>
    app.inject({ method: 'POST', url: '/api/v1/chat', payload: { message: 'What are the library hours?', session_id: 'web-9' } });

  it('should answer 429 with retry_after once a client passes the limit', async () => {
    expect((await send()).statusCode).toBe(200);
    expect((await send()).statusCode).toBe(200);

    const res = await send();

    expect(res.statusCode).toBe(429);
    expect(res.json()).toEqual({ error: 'rate_limited', retry_after: 60 });
    expect(res.headers['retry-after']).toBe('60');
    expect(res.headers['x-request-id']).toEqual(expect.any(String));
  });

  it('should not limit the other chat endpoints', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/chat/languages' });
    expect(res.statusCode).toBe(200);
  });
});
