import { RetrievedChunk } from '../config/types';
import { logger } from '../observability/logger';
import { retrievalResults } from '../observability/metrics';
import { RetrievalUnavailableError, errorMessage } from '../resilience/errors';
import { withTimeout } from '../resilience/timeout';
import { RetrievalStore } from './types';

export interface RetrieverOptions {
  /** Chunks scoring below this are dropped */
  scoreThreshold: number;
  timeoutMs: number;
}

export interface Retriever {
  query(pivotText: string, k: number): Promise<RetrievedChunk[]>;
}

/**
 * Top-k retrieval over a RetrievalStore.
 * Zero matches is an empty list; only a store outage or timeout throws.
 */
export class KnowledgeRetriever implements Retriever {
  private log = logger.child({ component: 'retriever' });

  constructor(
    private readonly store: RetrievalStore,
    private readonly options: RetrieverOptions,
  ) {}

  async query(pivotText: string, k: number): Promise<RetrievedChunk[]> {
    if (k <= 0) return [];

    let raw: RetrievedChunk[];
    try {
      raw = await withTimeout(
        () => this.store.query(pivotText, k),
        this.options.timeoutMs,
        () => new RetrievalUnavailableError(`Retrieval timed out after ${this.options.timeoutMs}ms`),
      );
    } catch (err) {
      if (err instanceof RetrievalUnavailableError) throw err;
      throw new RetrievalUnavailableError(`Retrieval store failed: ${errorMessage(err)}`, err);
    }

    // Stable sort: ties keep the store's order
    const chunks = raw
      .filter((c) => c.score >= this.options.scoreThreshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, k);

    retrievalResults.observe(chunks.length);
    this.log.debug({ requested: k, returned: chunks.length, topScore: chunks[0]?.score }, 'Retrieval complete');
    return chunks;
  }

  get indexedChunks(): number {
    return this.store.size;
  }
}
