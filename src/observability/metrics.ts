import client from 'prom-client';

export const register = new client.Registry();
client.collectDefaultMetrics({ register });

// ───── HTTP ─────
export const httpRequestDuration = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request latency',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [register],
});

// ───── Chat pipeline ─────
/** Topics the system prompt asks the model to pick from */
export const INTENT_LABELS = ['library', 'fees', 'admissions', 'hostel', 'exams', 'scholarships', 'greeting'] as const;

/** Model-chosen intents mapped onto a fixed label set; anything else is `other`. */
export function intentLabel(intent: string | null | undefined): string {
  const normalized = intent?.trim().toLowerCase() ?? '';
  return INTENT_LABELS.find((label) => label === normalized) ?? 'other';
}

export const chatMessages = new client.Counter({
  name: 'chat_messages_total',
  help: 'Total chat messages processed',
  labelNames: ['language', 'intent'] as const,
  registers: [register],
});

export const pipelineStageDuration = new client.Histogram({
  name: 'chat_pipeline_stage_duration_seconds',
  help: 'Duration of each chat pipeline stage',
  labelNames: ['stage'] as const,
  buckets: [0.005, 0.025, 0.1, 0.25, 0.5, 1, 2.5, 5, 15, 30],
  registers: [register],
});

export const pipelineTransitions = new client.Counter({
  name: 'chat_pipeline_transitions_total',
  help: 'Pipeline state transitions',
  labelNames: ['from', 'to'] as const,
  registers: [register],
});

export const degradedTurns = new client.Counter({
  name: 'chat_degraded_turns_total',
  help: 'Turns produced through a fallback path',
  labelNames: ['flag'] as const,
  registers: [register],
});

export const escalations = new client.Counter({
  name: 'chat_escalations_total',
  help: 'Escalations to human staff',
  labelNames: ['reason'] as const,
  registers: [register],
});

export const orchestrationFailures = new client.Counter({
  name: 'chat_orchestration_failures_total',
  help: 'Requests aborted before completion',
  registers: [register],
});

// ───── LLM ─────
export const llmRequestDuration = new client.Histogram({
  name: 'llm_request_duration_seconds',
  help: 'LLM provider request latency',
  labelNames: ['provider', 'model', 'status'] as const,
  buckets: [0.25, 0.5, 1, 2, 5, 10, 20, 40],
  registers: [register],
});

export const llmTokenUsage = new client.Counter({
  name: 'llm_tokens_total',
  help: 'LLM token usage',
  labelNames: ['provider', 'model', 'token_type'] as const,
  registers: [register],
});

export const llmProviderFailovers = new client.Counter({
  name: 'llm_provider_failovers_total',
  help: 'Successful failovers between LLM providers',
  labelNames: ['from_provider', 'to_provider'] as const,
  registers: [register],
});

export const generationRetries = new client.Counter({
  name: 'llm_generation_retries_total',
  help: 'Generation retries after transient failures',
  registers: [register],
});

// ───── Retrieval ─────
export const retrievalResults = new client.Histogram({
  name: 'retrieval_result_count',
  help: 'Chunks returned per retrieval query',
  buckets: [0, 1, 2, 3, 5, 8, 13, 20],
  registers: [register],
});

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getContentType(): string {
  return register.contentType;
}
