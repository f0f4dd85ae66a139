import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import Ajv, { JSONSchemaType } from 'ajv';
import { ChatResult } from '../config/types';
import { languageName } from '../config/languages';
import { Orchestrator } from '../orchestrator/orchestrator';
import { logger } from '../observability/logger';
import { createTraceContext } from '../observability/trace';
import { OrchestrationFatalError } from '../resilience/errors';
import { getWelcomeMessage } from '../resilience/static-fallbacks';
import { RateLimiter } from '../security/rate-limiter';

const ajv = new Ajv({ allErrors: true });

/** POST /api/v1/chat */
export interface ChatRequestBody {
  message: string;
  session_id?: string;
  language?: string;
}

export interface ChatResponseBody {
  session_id: string;
  response_text: string;
  detected_language: string;
  response_language: string;
  intent: string | null;
  confidence: number;
  sources: Array<{ title: string; content: string; score: number }>;
  needs_escalation: boolean;
  suggested_questions: string[];
}

export interface ChatRouteOptions {
  maxMessageLength: number;
  defaultLanguage: string;
  rateLimiter?: RateLimiter;
}

export function chatRequestSchema(maxMessageLength: number): JSONSchemaType<ChatRequestBody> {
  return {
    type: 'object',
    properties: {
      message: { type: 'string', minLength: 1, maxLength: maxMessageLength, pattern: '\\S' },
      session_id: { type: 'string', nullable: true, minLength: 1, maxLength: 128 },
      language: { type: 'string', nullable: true, minLength: 2, maxLength: 8 },
    },
    required: ['message'],
    additionalProperties: false,
  };
}

export function toChatResponse(result: ChatResult): ChatResponseBody {
  return {
    session_id: result.sessionId,
    response_text: result.responseText,
    detected_language: result.detectedLanguage,
    response_language: result.responseLanguage,
    intent: result.intent,
    confidence: result.confidence,
    sources: result.sources.map((s) => ({ title: s.title, content: s.content, score: s.score })),
    needs_escalation: result.needsEscalation,
    suggested_questions: result.suggestedQuestions,
  };
}

/**
 * Register the public chat API: send a message, list languages, fetch the welcome message.
 */
export function registerChatRoutes(
  app: FastifyInstance,
  orchestrator: Orchestrator,
  options: ChatRouteOptions,
): void {
  const log = logger.child({ component: 'chat-routes' });
  const validateChatRequest = ajv.compile(chatRequestSchema(options.maxMessageLength));

  // ─────────────────────────────────────────────
  // POST /api/v1/chat: Process a chat message
  // ─────────────────────────────────────────────
  app.post('/api/v1/chat', async (req: FastifyRequest, reply: FastifyReply) => {
    // Rate limiting per client address
    const limit = options.rateLimiter?.check(`client:${req.ip}`);
    if (limit && !limit.allowed) {
      const retryAfter = Math.ceil(limit.retryAfterMs / 1000);
      return reply.status(429).header('Retry-After', String(retryAfter)).send({
        error: 'rate_limited',
        retry_after: retryAfter,
      });
    }

    const body: unknown = req.body;
    if (!validateChatRequest(body)) {
      return reply.status(422).send({
        error: 'validation_error',
        details: (validateChatRequest.errors ?? []).map((e) => ({
          field: e.instancePath || '/',
          message: e.message ?? 'invalid',
        })),
      });
    }

    const trace = createTraceContext({ requestId: req.id });
    try {
      const result = await orchestrator.handleMessage(
        {
          message: body.message.trim(),
          sessionId: body.session_id ?? undefined,
          language: body.language ?? undefined,
        },
        trace,
      );
      return reply.status(200).send(toChatResponse(result));
    } catch (err) {
      if (err instanceof OrchestrationFatalError) {
        return reply.status(503).send({
          error: 'orchestration_fatal',
          session_id: err.sessionId,
          response_text: err.errorTurn.content,
          request_id: trace.requestId,
        });
      }
      log.error({ err, requestId: trace.requestId }, 'Chat request failed');
      return reply.status(500).send({ error: 'internal_error', request_id: trace.requestId });
    }
  });

  // ─────────────────────────────────────────────
  // GET /api/v1/chat/languages: Supported languages
  // ─────────────────────────────────────────────
  app.get('/api/v1/chat/languages', async (_req, reply) => {
    const languages = orchestrator.supportedLanguages.map((code) => ({ code, name: languageName(code) }));
    return reply.send({ languages });
  });

  // ─────────────────────────────────────────────
  // GET /api/v1/chat/welcome: Localized welcome message
  // ─────────────────────────────────────────────
  app.get('/api/v1/chat/welcome', async (req: FastifyRequest<{ Querystring: { language?: string } }>, reply) => {
    const language = req.query.language || options.defaultLanguage;
    return reply.send(getWelcomeMessage(language));
  });
}
