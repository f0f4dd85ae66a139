import Redis from 'ioredis';
import { Session, Turn } from '../config/types';
import { logger } from '../observability/logger';
import { SessionHistory } from './types';

/** Per-command `[error, result]` pairs; null when the transaction was discarded */
export type ExecReply = [error: Error | null, result: unknown][] | null;

export interface SessionTransaction {
  set(key: string, value: string, mode: 'EX', seconds: number): SessionTransaction;
  rpush(key: string, ...values: string[]): SessionTransaction;
  expire(key: string, seconds: number): SessionTransaction;
  exec(): Promise<ExecReply>;
}

/** The slice of the ioredis client the session store uses */
export interface SessionRedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  multi(): SessionTransaction;
}

export interface RedisSessionHistoryOptions {
  keyPrefix: string;
  ttlSeconds: number;
}

function isSession(value: unknown): value is Session {
  if (typeof value !== 'object' || value === null) return false;
  return 'sessionId' in value && typeof value.sessionId === 'string'
    && 'turnCount' in value && typeof value.turnCount === 'number';
}

function isTurn(value: unknown): value is Turn {
  if (typeof value !== 'object' || value === null) return false;
  return 'role' in value && (value.role === 'user' || value.role === 'assistant')
    && 'content' in value && typeof value.content === 'string'
    && 'timestamp' in value && typeof value.timestamp === 'number';
}

/**
 * Redis-backed session history.
 * The session summary is a JSON string; turns are a list appended with RPUSH.
 * Both keys expire `ttlSeconds` after the last write. Redis errors propagate.
 */
export class RedisSessionHistory implements SessionHistory {
  private log = logger.child({ component: 'session-store' });

  constructor(
    private readonly redis: SessionRedisClient,
    private readonly options: RedisSessionHistoryOptions,
  ) {}

  private sessionKey(sessionId: string): string {
    return `${this.options.keyPrefix}session:${sessionId}`;
  }

  private turnsKey(sessionId: string): string {
    return `${this.options.keyPrefix}session:${sessionId}:turns`;
  }

  async getSession(sessionId: string): Promise<Session | null> {
    const raw = await this.redis.get(this.sessionKey(sessionId));
    if (!raw) return null;
    const parsed: unknown = JSON.parse(raw);
    if (!isSession(parsed)) {
      this.log.warn({ sessionId }, 'Discarding malformed session record');
      return null;
    }
    return parsed;
  }

  async saveSession(session: Session): Promise<void> {
    await this.redis.set(
      this.sessionKey(session.sessionId),
      JSON.stringify(session),
      'EX',
      this.options.ttlSeconds,
    );
  }

  async loadHistory(sessionId: string, limit?: number): Promise<Turn[]> {
    if (limit !== undefined && limit <= 0) return [];
    const start = limit === undefined ? 0 : -limit;
    const raw = await this.redis.lrange(this.turnsKey(sessionId), start, -1);

    const turns: Turn[] = [];
    for (const item of raw) {
      const parsed: unknown = JSON.parse(item);
      if (isTurn(parsed)) {
        turns.push(parsed);
      } else {
        this.log.warn({ sessionId }, 'Skipping malformed turn in history');
      }
    }
    return turns;
  }

  async appendTurn(sessionId: string, turn: Turn): Promise<void> {
    const key = this.turnsKey(sessionId);
    const results = await this.redis
      .multi()
      .rpush(key, JSON.stringify(turn))
      .expire(key, this.options.ttlSeconds)
      .exec();
    this.assertCommitted(sessionId, results);
  }

  async appendTurns(sessionId: string, session: Session, turns: Turn[]): Promise<void> {
    const key = this.turnsKey(sessionId);
    let tx = this.redis
      .multi()
      .set(this.sessionKey(sessionId), JSON.stringify(session), 'EX', this.options.ttlSeconds);
    if (turns.length > 0) {
      tx = tx.rpush(key, ...turns.map((t) => JSON.stringify(t))).expire(key, this.options.ttlSeconds);
    }

    this.assertCommitted(sessionId, await tx.exec());
  }

  private assertCommitted(sessionId: string, results: ExecReply): void {
    if (!results) {
      throw new Error(`Session write for ${sessionId} was discarded`);
    }
    for (const [err] of results) {
      if (err) throw err;
    }
  }
}

/**
 * In-memory session history (dev/test fallback).
 */
export class InMemorySessionHistory implements SessionHistory {
  private sessions = new Map<string, Session>();
  private turns = new Map<string, Turn[]>();

  async getSession(sessionId: string): Promise<Session | null> {
    const session = this.sessions.get(sessionId);
    return session ? { ...session } : null;
  }

  async saveSession(session: Session): Promise<void> {
    this.sessions.set(session.sessionId, { ...session });
  }

  async loadHistory(sessionId: string, limit?: number): Promise<Turn[]> {
    const all = this.turns.get(sessionId) ?? [];
    if (limit === undefined) return [...all];
    if (limit <= 0) return [];
    return all.slice(-limit);
  }

  async appendTurn(sessionId: string, turn: Turn): Promise<void> {
    const list = this.turns.get(sessionId) ?? [];
    list.push(turn);
    this.turns.set(sessionId, list);
  }

  async appendTurns(sessionId: string, session: Session, turns: Turn[]): Promise<void> {
    const list = [...(this.turns.get(sessionId) ?? []), ...turns];
    this.sessions.set(sessionId, { ...session });
    this.turns.set(sessionId, list);
  }
}

/**
 * Factory: create the appropriate session history based on environment.
 */
export function createSessionHistory(redis: Redis | undefined, options: RedisSessionHistoryOptions): SessionHistory {
  if (redis) {
    return new RedisSessionHistory(redis, options);
  }
  logger.warn('Using in-memory session history (no Redis)');
  return new InMemorySessionHistory();
}
