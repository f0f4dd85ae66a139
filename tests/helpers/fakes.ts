import {
  CompletionRouter,
  LLMCompletionRequest,
  LLMCompletionResponse,
  ModelRoutingContext,
} from '../../src/llm/types';
import { RetrievedChunk } from '../../src/config/types';
import { KnowledgeChunk, RetrievalStore } from '../../src/knowledge/types';
import { Translator } from '../../src/language/translator';
import { TranslationUnavailableError } from '../../src/resilience/errors';
import { ExecReply, SessionRedisClient, SessionTransaction } from '../../src/session/session-store';
import { EscalationRedisClient, EscalationTransaction } from '../../src/escalation/escalation-sink';

export function completion(content: string): LLMCompletionResponse {
  return {
    content,
    model: 'test-model',
    provider: 'openai',
    usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    latencyMs: 1,
  };
}

type Step = { content: string } | { error: Error } | { hang: true };

/**
 * Router stand-in that plays back scripted steps in order.
 * The last step repeats once the script runs out.
 */
export class ScriptedRouter implements CompletionRouter {
  readonly calls: Array<{ request: LLMCompletionRequest; context: ModelRoutingContext }> = [];

  constructor(private readonly steps: Step[]) {}

  static replying(...contents: string[]): ScriptedRouter {
    return new ScriptedRouter(contents.map((content) => ({ content })));
  }

  static failing(...errors: Error[]): ScriptedRouter {
    return new ScriptedRouter(errors.map((error) => ({ error })));
  }

  async complete(request: LLMCompletionRequest, context: ModelRoutingContext): Promise<LLMCompletionResponse> {
    const step = this.steps[Math.min(this.calls.length, this.steps.length - 1)];
    this.calls.push({ request, context });
    if ('error' in step) throw step.error;
    if ('hang' in step) return new Promise<LLMCompletionResponse>(() => undefined);
    return completion(step.content);
  }
}

/** Error shaped like the provider SDKs' HTTP errors. */
export class HttpStatusError extends Error {
  constructor(readonly status: number) {
    super(`HTTP ${status}`);
    this.name = 'HttpStatusError';
  }
}

/** Store stand-in returning fixed chunks, or failing. */
export class StaticStore implements RetrievalStore {
  queries: string[] = [];

  constructor(private readonly chunks: RetrievedChunk[] = [], private readonly failure?: Error) {}

  async index(_documentId: string, _chunks: KnowledgeChunk[]): Promise<void> {
    return undefined;
  }

  async query(pivotText: string, k: number): Promise<RetrievedChunk[]> {
    this.queries.push(pivotText);
    if (this.failure) throw this.failure;
    return this.chunks.slice(0, k);
  }

  get size(): number {
    return this.chunks.length;
  }
}

/** Translator stand-in: prefixes the target code, or fails when told to. */
export class PrefixTranslator implements Translator {
  readonly calls: Array<{ text: string; source: string; target: string }> = [];

  constructor(private readonly failFor: Set<string> = new Set()) {}

  async translate(text: string, source: string, target: string): Promise<string> {
    this.calls.push({ text, source, target });
    if (source === target) return text;
    if (this.failFor.has(target)) {
      throw new TranslationUnavailableError(`no model for ${target}`, source, target);
    }
    return text
      .split('\n')
      .map((line) => `[${target}] ${line}`)
      .join('\n');
  }
}

export function chunk(sourceId: string, title: string, score: number, text = `${title} text`): RetrievedChunk {
  return { sourceId, title, text, score };
}

/** Transaction stand-in that records queued commands and returns a fixed exec reply. */
export class RecordingTransaction implements SessionTransaction, EscalationTransaction {
  readonly commands: Array<Array<string | number>> = [];

  constructor(private readonly reply: ExecReply) {}

  set(key: string, value: string, ...options: Array<string | number>): this {
    this.commands.push(['set', key, value, ...options]);
    return this;
  }

  rpush(key: string, ...values: string[]): this {
    this.commands.push(['rpush', key, ...values]);
    return this;
  }

  expire(key: string, seconds: number): this {
    this.commands.push(['expire', key, seconds]);
    return this;
  }

  zadd(key: string, score: number, member: string): this {
    this.commands.push(['zadd', key, score, member]);
    return this;
  }

  async exec(): Promise<ExecReply> {
    return this.reply;
  }
}

/** Redis stand-in: plain key/list reads, and transactions that record instead of writing. */
export class RecordingRedis implements SessionRedisClient, EscalationRedisClient {
  readonly values = new Map<string, string>();
  readonly lists = new Map<string, string[]>();
  readonly transactions: RecordingTransaction[] = [];

  constructor(private readonly execReply: ExecReply = []) {}

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, _mode: 'EX', _seconds: number): Promise<'OK'> {
    this.values.set(key, value);
    return 'OK';
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.lists.get(key) ?? [];
    const from = start < 0 ? Math.max(list.length + start, 0) : start;
    const to = stop < 0 ? list.length + stop + 1 : stop + 1;
    return list.slice(from, to);
  }

  multi(): RecordingTransaction {
    const tx = new RecordingTransaction(this.execReply);
    this.transactions.push(tx);
    return tx;
  }
}
