import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseFloat(val) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

function optionalList(key: string, fallback: string[]): string[] {
  const val = process.env[key];
  if (!val) return fallback;
  return val.split(',').map((s) => s.trim()).filter(Boolean);
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 8000),
  corsOrigins: optionalList('CORS_ORIGINS', ['http://localhost:3000', 'http://localhost:8000']),

  // ───── LLM Providers ─────
  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
    timeoutMs: optionalInt('OPENAI_TIMEOUT_MS', 30000),
  },

  anthropic: {
    apiKey: optional('ANTHROPIC_API_KEY', ''),
    model: optional('ANTHROPIC_MODEL', 'claude-3-5-haiku-latest'),
    timeoutMs: optionalInt('ANTHROPIC_TIMEOUT_MS', 30000),
  },

  gemini: {
    apiKey: optional('GEMINI_API_KEY', ''),
    model: optional('GEMINI_MODEL', 'gemini-2.0-flash'),
    timeoutMs: optionalInt('GEMINI_TIMEOUT_MS', 30000),
  },

  // ───── LLM Routing ─────
  llm: {
    primaryProvider: optional('LLM_PRIMARY_PROVIDER', 'gemini'),
    secondaryProvider: optional('LLM_SECONDARY_PROVIDER', ''),
    tertiaryProvider: optional('LLM_TERTIARY_PROVIDER', ''),
  },

  redis: {
    url: optional('REDIS_URL', 'redis://localhost:6379'),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'campus:'),
    enabled: optionalBool('REDIS_ENABLED', true),
  },

  // ───── Languages ─────
  language: {
    pivot: optional('PIVOT_LANGUAGE', 'en'),
    default: optional('DEFAULT_LANGUAGE', 'en'),
    supported: optionalList('SUPPORTED_LANGUAGES', ['en', 'hi', 'raj', 'gu', 'mr', 'pa', 'ta']),
    detectionConfidenceFloor: optionalFloat('DETECTION_CONFIDENCE_FLOOR', 0.6),
    detectionMinLetters: optionalInt('DETECTION_MIN_LETTERS', 2),
    googleTranslateApiKey: optional('GOOGLE_TRANSLATE_API_KEY', ''),
    translateTimeoutMs: optionalInt('TRANSLATE_TIMEOUT_MS', 8000),
  },

  // ───── Retrieval ─────
  rag: {
    embeddingModel: optional('RAG_EMBEDDING_MODEL', 'text-embedding-3-small'),
    topK: optionalInt('RAG_TOP_K', 5),
    scoreThreshold: optionalFloat('RAG_SCORE_THRESHOLD', 0.3),
    timeoutMs: optionalInt('RAG_TIMEOUT_MS', 5000),
    knowledgeDir: optional('KNOWLEDGE_DIR', path.join(projectRoot, 'knowledge')),
    chunkSize: optionalInt('RAG_CHUNK_SIZE', 800),
    chunkOverlap: optionalInt('RAG_CHUNK_OVERLAP', 100),
  },

  // ───── Generation ─────
  generation: {
    maxRetries: optionalInt('GENERATION_MAX_RETRIES', 3),
    backoffBaseMs: optionalInt('GENERATION_BACKOFF_BASE_MS', 500),
    backoffMaxMs: optionalInt('GENERATION_BACKOFF_MAX_MS', 8000),
    timeoutMs: optionalInt('GENERATION_TIMEOUT_MS', 30000),
    temperature: optionalFloat('GENERATION_TEMPERATURE', 0.3),
    maxTokens: optionalInt('GENERATION_MAX_TOKENS', 1024),
    fallbackResponse: optional(
      'GENERATION_FALLBACK_RESPONSE',
      "I'm sorry, I can't answer that right now. A member of staff will follow up with you shortly.",
    ),
  },

  // ───── Context ─────
  context: {
    budgetChars: optionalInt('CONTEXT_BUDGET_CHARS', 6000),
    maxHistoryTurns: optionalInt('MAX_CONVERSATION_HISTORY', 10),
  },

  // ───── Escalation ─────
  escalation: {
    confidenceThreshold: optionalFloat('ESCALATION_CONFIDENCE_THRESHOLD', 0.5),
    patterns: optionalList('ESCALATION_PATTERNS', []),
  },

  // ───── Sessions ─────
  chat: {
    sessionTtlHours: optionalInt('SESSION_TIMEOUT_HOURS', 24),
    maxMessageLength: optionalInt('CHAT_MAX_MESSAGE_LENGTH', 2000),
  },

  // ───── Security ─────
  security: {
    rateLimitPerClient: optionalInt('RATE_LIMIT_PER_CLIENT', 60),
    rateLimitWindowSeconds: optionalInt('RATE_LIMIT_WINDOW_SECONDS', 60),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },
} as const;

export type Env = typeof env;
