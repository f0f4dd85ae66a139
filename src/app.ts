import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { env } from './config/env';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { buildProviders } from './llm/provider-factory';
import { ModelRouter } from './llm/model-router';
import { LLMProvider, LLMProviderName, ModelRouterConfig, isProviderName } from './llm/types';
import { PromptManager } from './agent/prompt-manager';
import { ContextBuilder } from './agent/context-builder';
import { GenerationClient } from './agent/generation-client';
import { LanguageDetector } from './language/language-detector';
import { ChainedTranslator, GoogleTranslator, LLMTranslator, Translator } from './language/translator';
import { OpenAIEmbeddingProvider } from './knowledge/embedding-service';
import { VectorStore } from './knowledge/vector-store';
import { KeywordStore } from './knowledge/keyword-store';
import { KnowledgeIndexer } from './knowledge/knowledge-indexer';
import { KnowledgeRetriever } from './knowledge/retriever';
import { RetrievalStore } from './knowledge/types';
import { createSessionHistory } from './session/session-store';
import { SessionLock } from './session/session-lock';
import { EscalationPolicy } from './escalation/escalation-policy';
import { createEscalationSink } from './escalation/escalation-sink';
import { Orchestrator } from './orchestrator/orchestrator';
import { registerChatRoutes } from './channels/chat-routes';
import { registerHealthRoutes } from './health/health-routes';
import { RateLimiter } from './security/rate-limiter';

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
}

export interface ServerDeps {
  orchestrator: Orchestrator;
  redis?: Redis;
  router?: ModelRouter;
  indexedChunks?: () => number;
  corsOrigins: string[];
  maxMessageLength: number;
  defaultLanguage: string;
  enableMetrics: boolean;
  /** Per-client limit on POST /api/v1/chat; unlimited when absent */
  rateLimiter?: RateLimiter;
}

/**
 * Fastify instance with CORS, request ids, request timing and all routes registered.
 * Takes fully built dependencies so tests can hand in fakes.
 */
export async function createServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
    requestIdHeader: 'x-request-id',
    genReqId: () => uuidv4(),
  });

  await app.register(cors, {
    origin: deps.corsOrigins,
    methods: ['GET', 'POST'],
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  app.addHook('onSend', (req, reply, payload, done) => {
    reply.header('X-Request-ID', req.id);
    reply.header('X-Response-Time', `${(reply.elapsedTime / 1000).toFixed(3)}s`);
    done(null, payload);
  });

  const limiter = deps.rateLimiter;
  if (limiter) {
    app.addHook('onClose', (_instance, done) => {
      limiter.stop();
      done();
    });
  }

  registerHealthRoutes(app, {
    redis: deps.redis,
    router: deps.router,
    indexedChunks: deps.indexedChunks,
    enableMetrics: deps.enableMetrics,
  });
  registerChatRoutes(app, deps.orchestrator, {
    maxMessageLength: deps.maxMessageLength,
    defaultLanguage: deps.defaultLanguage,
    rateLimiter: deps.rateLimiter,
  });

  return app;
}

async function connectRedis(): Promise<Redis | undefined> {
  if (!env.redis.enabled) {
    logger.info('Redis disabled; using in-memory stores');
    return undefined;
  }
  try {
    const redisInstance = new Redis(env.redis.url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

function optionalProvider(name: string): LLMProviderName | undefined {
  return isProviderName(name) ? name : undefined;
}

/** Routing chain from env; an unset or unconfigured primary falls back to the first configured provider. */
function resolveRouterConfig(providers: Map<LLMProviderName, LLMProvider>): ModelRouterConfig {
  const configured = optionalProvider(env.llm.primaryProvider);
  const [firstAvailable] = providers.keys();
  const primaryProvider = configured && providers.has(configured) ? configured : firstAvailable;
  if (primaryProvider !== configured) {
    logger.warn(
      { requested: env.llm.primaryProvider, using: primaryProvider },
      'Primary LLM provider not configured; using first available',
    );
  }
  return {
    primaryProvider,
    secondaryProvider: optionalProvider(env.llm.secondaryProvider),
    tertiaryProvider: optionalProvider(env.llm.tertiaryProvider),
  };
}

export async function buildApp(): Promise<AppContext> {
  const redis = await connectRedis();

  // ───── Build Multi-LLM Provider Stack ─────
  const providers = buildProviders(env);
  const routerConfig = resolveRouterConfig(providers);
  const modelRouter = new ModelRouter(routerConfig, providers);
  const prompts = new PromptManager();

  logger.info({
    primary: routerConfig.primaryProvider,
    secondary: routerConfig.secondaryProvider,
    providerCount: providers.size,
  }, 'Multi-LLM stack initialized');

  // ───── Translation ─────
  const translators: Translator[] = [];
  if (env.language.googleTranslateApiKey) {
    translators.push(new GoogleTranslator({
      apiKey: env.language.googleTranslateApiKey,
      timeoutMs: env.language.translateTimeoutMs,
    }));
  }
  translators.push(new LLMTranslator(modelRouter, prompts, {
    supportedLanguages: env.language.supported,
    timeoutMs: env.language.translateTimeoutMs,
    maxTokens: env.generation.maxTokens,
  }));
  const translator = translators.length === 1 ? translators[0] : new ChainedTranslator(translators);

  // ───── Knowledge base ─────
  let store: RetrievalStore;
  let embeddings: OpenAIEmbeddingProvider | undefined;
  if (env.openai.apiKey) {
    embeddings = new OpenAIEmbeddingProvider({ apiKey: env.openai.apiKey, model: env.rag.embeddingModel });
    store = new VectorStore(embeddings);
  } else {
    logger.warn('No embedding provider configured; using keyword retrieval');
    store = new KeywordStore();
  }
  const indexer = new KnowledgeIndexer(
    store,
    { chunkSize: env.rag.chunkSize, overlap: env.rag.chunkOverlap },
    embeddings,
  );
  try {
    await indexer.loadFromDirectory(env.rag.knowledgeDir);
  } catch (err) {
    logger.error({ err }, 'Knowledge indexing failed; answers will be ungrounded');
  }
  const retriever = new KnowledgeRetriever(store, {
    scoreThreshold: env.rag.scoreThreshold,
    timeoutMs: env.rag.timeoutMs,
  });

  // ───── Chat pipeline ─────
  const orchestrator = new Orchestrator(
    {
      sessions: createSessionHistory(redis, {
        keyPrefix: env.redis.keyPrefix,
        ttlSeconds: env.chat.sessionTtlHours * 60 * 60,
      }),
      lock: new SessionLock(),
      detector: new LanguageDetector({
        confidenceFloor: env.language.detectionConfidenceFloor,
        minLetters: env.language.detectionMinLetters,
      }),
      translator,
      retriever,
      contextBuilder: new ContextBuilder({ maxHistoryTurns: env.context.maxHistoryTurns }),
      generator: new GenerationClient(modelRouter, prompts, {
        maxRetries: env.generation.maxRetries,
        baseDelayMs: env.generation.backoffBaseMs,
        maxDelayMs: env.generation.backoffMaxMs,
        timeoutMs: env.generation.timeoutMs,
        temperature: env.generation.temperature,
        maxTokens: env.generation.maxTokens,
        fallbackText: env.generation.fallbackResponse,
      }),
      escalationPolicy: new EscalationPolicy(env.escalation.confidenceThreshold, env.escalation.patterns),
      escalationSink: createEscalationSink(redis, env.redis.keyPrefix),
    },
    {
      pivotLanguage: env.language.pivot,
      defaultLanguage: env.language.default,
      supportedLanguages: env.language.supported,
      topK: env.rag.topK,
      contextBudget: env.context.budgetChars,
      historyLimit: env.context.maxHistoryTurns,
    },
  );

  const app = await createServer({
    orchestrator,
    redis,
    router: modelRouter,
    indexedChunks: () => retriever.indexedChunks,
    corsOrigins: env.corsOrigins,
    maxMessageLength: env.chat.maxMessageLength,
    defaultLanguage: env.language.default,
    enableMetrics: env.observability.enableMetrics,
    rateLimiter: new RateLimiter(env.security.rateLimitPerClient, env.security.rateLimitWindowSeconds),
  });

  return { app, redis };
}
