import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { EscalationReason, EscalationRecord, EscalationStatus } from '../config/types';
import { logger } from '../observability/logger';

export interface EscalationSink {
  create(sessionId: string, reason: EscalationReason, status?: EscalationStatus): Promise<EscalationRecord>;
}

export interface EscalationTransaction {
  set(key: string, value: string): EscalationTransaction;
  zadd(key: string, score: number, member: string): EscalationTransaction;
  exec(): Promise<[error: Error | null, result: unknown][] | null>;
}

/** The slice of the ioredis client the escalation queue uses */
export interface EscalationRedisClient {
  multi(): EscalationTransaction;
}

function newRecord(sessionId: string, reason: EscalationReason, status: EscalationStatus): EscalationRecord {
  return { id: uuidv4(), sessionId, reason, status, createdAt: Date.now() };
}

/**
 * Redis-backed escalation queue.
 * Records live under their own key; pending ids are kept in a sorted set by creation time.
 */
export class RedisEscalationSink implements EscalationSink {
  constructor(
    private readonly redis: EscalationRedisClient,
    private readonly keyPrefix: string,
  ) {}

  async create(
    sessionId: string,
    reason: EscalationReason,
    status: EscalationStatus = 'pending',
  ): Promise<EscalationRecord> {
    const record = newRecord(sessionId, reason, status);
    const results = await this.redis
      .multi()
      .set(`${this.keyPrefix}escalation:${record.id}`, JSON.stringify(record))
      .zadd(`${this.keyPrefix}escalations:${status}`, record.createdAt, record.id)
      .exec();

    if (!results) {
      throw new Error(`Escalation write for ${sessionId} was discarded`);
    }
    for (const [err] of results) {
      if (err) throw err;
    }
    return record;
  }
}

/**
 * In-memory escalation sink (dev/test fallback).
 */
export class InMemoryEscalationSink implements EscalationSink {
  private records: EscalationRecord[] = [];

  async create(
    sessionId: string,
    reason: EscalationReason,
    status: EscalationStatus = 'pending',
  ): Promise<EscalationRecord> {
    const record = newRecord(sessionId, reason, status);
    this.records.push(record);
    return record;
  }

  getAll(): EscalationRecord[] {
    return [...this.records];
  }
}

export function createEscalationSink(redis: Redis | undefined, keyPrefix: string): EscalationSink {
  if (redis) {
    return new RedisEscalationSink(redis, keyPrefix);
  }
  logger.warn('Using in-memory escalation sink (no Redis)');
  return new InMemoryEscalationSink();
}
