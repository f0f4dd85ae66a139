/**
 * Embedding Service: Abstraction for text embedding providers.
 *
 * Uses OpenAI text-embedding-3-small by default.
 * Provides batch embedding for indexing and single-query embedding for search.
 */

import { logger } from '../observability/logger';

export interface EmbeddingProvider {
  /** Embed a single text string */
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  /** Batch embed multiple text strings */
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
  batchSize?: number;
}

interface EmbeddingResponseBody {
  data: Array<{ embedding: number[]; index: number }>;
}

function isEmbeddingResponse(value: unknown): value is EmbeddingResponseBody {
  if (typeof value !== 'object' || value === null || !('data' in value)) return false;
  return Array.isArray(value.data);
}

/**
 * OpenAI-compatible embedding provider over the REST API.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly batchSize: number;
  private log = logger.child({ component: 'embedding-service' });

  constructor(config: OpenAIEmbeddingConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = config.baseUrl ?? 'https://api.openai.com/v1';
    this.batchSize = config.batchSize ?? 100;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.embedBatch([text], signal);
    if (!embedding) {
      throw new Error('Embedding API returned no vectors');
    }
    return embedding;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (!this.apiKey) {
      throw new Error('OpenAI API key not configured for embeddings');
    }

    const allEmbeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);

      const response = await fetch(`${this.baseUrl}/embeddings`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          input: batch,
        }),
        signal,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        this.log.error({ status: response.status, body: errorBody }, 'OpenAI embedding API error');
        throw new Error(`Embedding API error: ${response.status}`);
      }

      const data: unknown = await response.json();
      if (!isEmbeddingResponse(data)) {
        throw new Error('Embedding API returned an unexpected body');
      }

      // Sort by index to maintain order
      const sorted = [...data.data].sort((a, b) => a.index - b.index);
      for (const item of sorted) {
        allEmbeddings.push(item.embedding);
      }
    }

    return allEmbeddings;
  }
}
