import { v4 as uuidv4 } from 'uuid';
import pino from 'pino';
import {
  ChatRequest,
  ChatResult,
  DegradationFlag,
  RetrievedChunk,
  Session,
  SourceSummary,
  Turn,
} from '../config/types';
import { ContextBuilder } from '../agent/context-builder';
import { GenerationClient, GenerationOutcome } from '../agent/generation-client';
import { LanguageDetector } from '../language/language-detector';
import { Translator } from '../language/translator';
import { Retriever } from '../knowledge/retriever';
import { FAQ_SOURCE_PREFIX } from '../knowledge/knowledge-indexer';
import { SessionHistory } from '../session/types';
import { SessionLock } from '../session/session-lock';
import { ConfidenceOptions, DEFAULT_CONFIDENCE_OPTIONS, scoreConfidence } from '../escalation/confidence-scorer';
import { EscalationPolicy } from '../escalation/escalation-policy';
import { EscalationSink } from '../escalation/escalation-sink';
import { pipelineStateMachine } from './state-machine';
import { PipelineState } from './types';
import { logger } from '../observability/logger';
import { TraceContext, startSpan, endSpan, spanDuration } from '../observability/trace';
import {
  chatMessages,
  degradedTurns,
  escalations,
  intentLabel,
  orchestrationFailures,
  pipelineStageDuration,
} from '../observability/metrics';
import {
  DetectionAmbiguousError,
  OrchestrationFatalError,
  PersistenceUnavailableError,
  errorMessage,
} from '../resilience/errors';
import { getOrchestrationErrorMessage } from '../resilience/static-fallbacks';

/** Characters of chunk text returned with each source */
const SOURCE_PREVIEW_CHARS = 300;
const MAX_FALLBACK_SUGGESTIONS = 3;

export interface OrchestratorDeps {
  sessions: SessionHistory;
  lock: SessionLock;
  detector: LanguageDetector;
  translator: Translator;
  retriever: Retriever;
  contextBuilder: ContextBuilder;
  generator: GenerationClient;
  escalationPolicy: EscalationPolicy;
  escalationSink: EscalationSink;
}

export interface OrchestratorOptions {
  pivotLanguage: string;
  defaultLanguage: string;
  supportedLanguages: readonly string[];
  topK: number;
  /** Character budget for the assembled context */
  contextBudget: number;
  /** Most recent turns read from the session store */
  historyLimit: number;
  confidence?: ConfidenceOptions;
}

interface ResolvedLanguage {
  detected: string;
  response: string;
}

function preview(text: string): string {
  return text.length <= SOURCE_PREVIEW_CHARS ? text : `${text.slice(0, SOURCE_PREVIEW_CHARS)}...`;
}

function toSourceSummary(chunk: RetrievedChunk): SourceSummary {
  return { title: chunk.title, content: preview(chunk.text), score: chunk.score };
}

/** Titles of retrieved FAQ chunks other than the question just asked. */
function faqSuggestions(chunks: readonly RetrievedChunk[], pivotText: string): string[] {
  const asked = pivotText.trim().toLowerCase();
  const titles: string[] = [];
  for (const chunk of chunks) {
    if (!chunk.sourceId.startsWith(FAQ_SOURCE_PREFIX)) continue;
    const title = chunk.title.trim();
    if (!title || title.toLowerCase() === asked || titles.includes(title)) continue;
    titles.push(title);
    if (titles.length === MAX_FALLBACK_SUGGESTIONS) break;
  }
  return titles;
}

/**
 * Runs one chat message through the pipeline:
 * detect → translate to pivot → retrieve → build context → generate →
 * translate back → score → persist.
 *
 * Every stage after the session read has a fallback, so a request that gets
 * past loading the session always completes with a ChatResult. Requests for
 * the same session run one at a time.
 */
export class Orchestrator {
  private readonly supported: Set<string>;
  private readonly confidenceOptions: ConfidenceOptions;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {
    this.supported = new Set(options.supportedLanguages);
    this.confidenceOptions = options.confidence ?? DEFAULT_CONFIDENCE_OPTIONS;
  }

  get supportedLanguages(): string[] {
    return [...this.supported];
  }

  /**
   * @throws OrchestrationFatalError when the session or its history cannot be read
   */
  async handleMessage(request: ChatRequest, trace: TraceContext): Promise<ChatResult> {
    const sessionId = request.sessionId ?? uuidv4();
    trace.sessionId = sessionId;
    const log = logger.child({ requestId: trace.requestId, sessionId });

    return this.deps.lock.runExclusive(sessionId, () => this.process(sessionId, request, trace, log));
  }

  private async process(
    sessionId: string,
    request: ChatRequest,
    trace: TraceContext,
    log: pino.Logger,
  ): Promise<ChatResult> {
    const spanOrch = startSpan(trace, 'orchestrator.handleMessage');
    let state: PipelineState = 'RECEIVED';
    const advance = (target: PipelineState, reason: string): void => {
      state = pipelineStateMachine.transition(trace.requestId, state, target, reason).newState;
    };
    const degraded = new Set<DegradationFlag>();
    const message = request.message;

    // 1. Load session + history (the only fatal stage)
    let session: Session | null;
    let history: Turn[];
    try {
      [session, history] = await this.stage(trace, 'session.load', async () => [
        await this.deps.sessions.getSession(sessionId),
        await this.deps.sessions.loadHistory(sessionId, this.options.historyLimit),
      ] as const);
    } catch (err) {
      endSpan(spanOrch, 'error');
      orchestrationFailures.inc();
      log.error({ err }, 'Session store unreachable, aborting request');
      throw new OrchestrationFatalError(
        `Session history unavailable: ${errorMessage(err)}`,
        sessionId,
        { role: 'assistant', content: getOrchestrationErrorMessage(), timestamp: Date.now() },
        err,
      );
    }

    // 2. Language
    const language = this.resolveLanguage(message, request.language, session, degraded, log);
    let pivotText = message;
    if (language.detected !== this.options.pivotLanguage) {
      try {
        pivotText = await this.stage(trace, 'translate.inbound', () =>
          this.deps.translator.translate(message, language.detected, this.options.pivotLanguage),
        );
      } catch (err) {
        degraded.add('translation_degraded');
        log.warn({ err: errorMessage(err), from: language.detected }, 'Inbound translation failed, using original text');
      }
    }
    advance('LANGUAGE_RESOLVED', language.detected);

    // 3. Retrieve
    let chunks: RetrievedChunk[] = [];
    try {
      chunks = await this.stage(trace, 'retrieve', () => this.deps.retriever.query(pivotText, this.options.topK));
    } catch (err) {
      degraded.add('retrieval_degraded');
      log.warn({ err: errorMessage(err) }, 'Retrieval unavailable, continuing without grounding');
    }
    advance('RETRIEVED', `${chunks.length} chunks`);

    // 4. Context
    const built = this.deps.contextBuilder.build(chunks, history, pivotText, this.options.contextBudget);
    if (built.droppedTurns > 0 || built.droppedChunks > 0) {
      log.debug({ droppedTurns: built.droppedTurns, droppedChunks: built.droppedChunks }, 'Context trimmed to budget');
    }
    advance('CONTEXT_BUILT', `${built.prompt.length} chars`);

    // 5. Generate (never throws)
    const outcome = await this.stage(trace, 'generate', () =>
      this.deps.generator.generate(built.prompt, { sessionId, requestId: trace.requestId }),
    );
    if (outcome.degraded) degraded.add('generation_degraded');
    advance('GENERATED', outcome.degraded ? 'fallback' : `attempts=${outcome.attempts}`);

    // 6. Translate back
    const suggestions = outcome.suggestedQuestions.length > 0
      ? outcome.suggestedQuestions
      : faqSuggestions(chunks, pivotText);
    const rendered = await this.renderResponse(outcome, suggestions, language.response, trace, degraded, log);
    advance('TRANSLATED', rendered.language);

    // 7. Score
    const confidence = scoreConfidence(chunks, outcome, this.confidenceOptions);
    const decision = this.deps.escalationPolicy.decide({
      confidence,
      messageText: message,
      pivotText,
      generationDegraded: outcome.degraded,
    });
    advance('SCORED', decision.reason ?? 'no_escalation');

    // 8. Persist
    const sources = chunks.map(toSourceSummary);
    const now = Date.now();
    const turnFlags = [...degraded];
    const userTurn: Turn = {
      role: 'user',
      content: message,
      ...(pivotText !== message ? { pivotContent: pivotText } : {}),
      language: language.detected,
      timestamp: now,
    };
    const assistantTurn: Turn = {
      role: 'assistant',
      content: rendered.text,
      ...(rendered.text !== outcome.answer ? { pivotContent: outcome.answer } : {}),
      language: rendered.language,
      ...(outcome.intent ? { intent: outcome.intent } : {}),
      confidence,
      sources,
      needsEscalation: decision.escalate,
      ...(turnFlags.length > 0 ? { degraded: turnFlags } : {}),
      timestamp: now,
    };
    const nextSession: Session = session
      ? { ...session, language: language.detected, turnCount: session.turnCount + 2, lastActivityAt: now }
      : { sessionId, language: language.detected, turnCount: 2, createdAt: now, lastActivityAt: now };

    await this.persist(sessionId, nextSession, userTurn, assistantTurn, decision.reason, trace, degraded, log);
    advance('PERSISTED', degraded.has('persistence_degraded') ? 'degraded' : 'ok');

    // 9. Complete
    chatMessages.inc({ language: language.detected, intent: intentLabel(outcome.intent) });
    for (const flag of degraded) degradedTurns.inc({ flag });
    advance('COMPLETED', 'response ready');
    endSpan(spanOrch);

    log.info(
      {
        detectedLanguage: language.detected,
        responseLanguage: rendered.language,
        chunks: chunks.length,
        confidence,
        escalation: decision.reason,
        degraded: [...degraded],
        state,
      },
      'Chat message processed',
    );

    return {
      sessionId,
      responseText: rendered.text,
      detectedLanguage: language.detected,
      responseLanguage: rendered.language,
      intent: outcome.intent,
      confidence,
      sources,
      needsEscalation: decision.escalate,
      escalationReason: decision.reason,
      suggestedQuestions: rendered.suggestions,
      degraded: [...degraded],
    };
  }

  /**
   * Detected language, falling back to the session's last language and then the
   * default when detection is ambiguous or yields an unsupported language.
   * The response goes out in the requested language when it is supported.
   */
  private resolveLanguage(
    message: string,
    requested: string | undefined,
    session: Session | null,
    degraded: Set<DegradationFlag>,
    log: pino.Logger,
  ): ResolvedLanguage {
    let detected: string | undefined;
    try {
      const result = this.deps.detector.detect(message);
      if (this.supported.has(result.language)) {
        detected = result.language;
      } else {
        log.info({ language: result.language }, 'Detected language not supported');
      }
    } catch (err) {
      if (!(err instanceof DetectionAmbiguousError)) throw err;
      log.debug({ err: err.message }, 'Language detection ambiguous');
    }

    if (!detected) {
      degraded.add('detection_fallback');
      detected = session?.language && this.supported.has(session.language)
        ? session.language
        : this.options.defaultLanguage;
    }

    const response = requested && this.supported.has(requested) ? requested : detected;
    return { detected, response };
  }

  /** Translate the answer and suggestions out of the pivot language; on failure keep the pivot text. */
  private async renderResponse(
    outcome: GenerationOutcome,
    suggestions: string[],
    target: string,
    trace: TraceContext,
    degraded: Set<DegradationFlag>,
    log: pino.Logger,
  ): Promise<{ text: string; language: string; suggestions: string[] }> {
    const pivot = this.options.pivotLanguage;
    if (target === pivot) {
      return { text: outcome.answer, language: pivot, suggestions };
    }

    let text: string;
    try {
      text = await this.stage(trace, 'translate.outbound', () =>
        this.deps.translator.translate(outcome.answer, pivot, target),
      );
    } catch (err) {
      degraded.add('translation_degraded');
      log.warn({ err: errorMessage(err), to: target }, 'Outbound translation failed, answering in pivot language');
      return { text: outcome.answer, language: pivot, suggestions };
    }

    if (suggestions.length === 0) {
      return { text, language: target, suggestions };
    }

    // Suggestions go in one call, one per line
    try {
      const joined = await this.deps.translator.translate(suggestions.join('\n'), pivot, target);
      const lines = joined.split('\n').map((l) => l.trim()).filter(Boolean);
      if (lines.length === suggestions.length) {
        return { text, language: target, suggestions: lines };
      }
      log.warn({ expected: suggestions.length, got: lines.length }, 'Suggestion translation changed line count');
    } catch (err) {
      log.warn({ err: errorMessage(err) }, 'Suggestion translation failed');
    }
    degraded.add('translation_degraded');
    return { text, language: target, suggestions };
  }

  /** Write session and turns, then the escalation record. Failures are logged, never thrown. */
  private async persist(
    sessionId: string,
    session: Session,
    userTurn: Turn,
    assistantTurn: Turn,
    escalationReason: ChatResult['escalationReason'],
    trace: TraceContext,
    degraded: Set<DegradationFlag>,
    log: pino.Logger,
  ): Promise<void> {
    try {
      await this.stage(trace, 'session.persist', () =>
        this.deps.sessions.appendTurns(sessionId, session, [userTurn, assistantTurn]),
      );
    } catch (err) {
      degraded.add('persistence_degraded');
      const failure = new PersistenceUnavailableError(`Failed to persist turns: ${errorMessage(err)}`, err);
      log.error({ err: failure, userTurn, assistantTurn }, 'Session persistence failed; needs reconciliation');
    }

    if (!escalationReason) return;
    escalations.inc({ reason: escalationReason });
    try {
      const record = await this.deps.escalationSink.create(sessionId, escalationReason, 'pending');
      log.info({ escalationId: record.id, reason: escalationReason }, 'Escalation created');
    } catch (err) {
      degraded.add('persistence_degraded');
      const failure = new PersistenceUnavailableError(`Failed to create escalation: ${errorMessage(err)}`, err);
      log.error({ err: failure, reason: escalationReason }, 'Escalation persistence failed; needs reconciliation');
    }
  }

  /** Run a stage inside a span and record its duration. */
  private async stage<T>(trace: TraceContext, name: string, fn: () => Promise<T>): Promise<T> {
    const span = startSpan(trace, name);
    try {
      const result = await fn();
      endSpan(span);
      return result;
    } catch (err) {
      endSpan(span, 'error');
      throw err;
    } finally {
      const ms = spanDuration(span);
      if (ms !== undefined) pipelineStageDuration.observe({ stage: name }, ms / 1000);
    }
  }
}
