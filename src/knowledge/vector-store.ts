/**
 * In-Memory Vector Store: Cosine similarity search over the knowledge base.
 *
 * Designed for small campus knowledge bases (a few thousand chunks).
 * Stores pre-computed embeddings and performs brute-force cosine similarity.
 */

import { RetrievedChunk } from '../config/types';
import { EmbeddingProvider } from './embedding-service';
import { KnowledgeChunk, RetrievalStore } from './types';

interface VectorEntry {
  chunk: KnowledgeChunk;
  embedding: number[];
}

export class VectorStore implements RetrievalStore {
  private documents = new Map<string, VectorEntry[]>();

  constructor(private readonly embeddings: EmbeddingProvider) {}

  async index(documentId: string, chunks: KnowledgeChunk[]): Promise<void> {
    const missing = chunks.filter((c) => !c.embedding);
    const computed = missing.length > 0
      ? await this.embeddings.embedBatch(missing.map((c) => c.text))
      : [];

    let next = 0;
    const entries: VectorEntry[] = [];
    for (const chunk of chunks) {
      const embedding = chunk.embedding ?? computed[next++];
      if (!embedding) {
        throw new Error(`No embedding produced for chunk ${chunk.id}`);
      }
      entries.push({ chunk, embedding });
    }

    // Map keeps first-insertion order, so re-indexing a document keeps its position
    this.documents.set(documentId, entries);
  }

  /** Get entry count */
  get size(): number {
    let total = 0;
    for (const entries of this.documents.values()) total += entries.length;
    return total;
  }

  async query(pivotText: string, k: number): Promise<RetrievedChunk[]> {
    if (k <= 0 || this.size === 0) return [];

    const queryEmbedding = await this.embeddings.embed(pivotText);
    const scored: RetrievedChunk[] = [];

    for (const entries of this.documents.values()) {
      for (const { chunk, embedding } of entries) {
        scored.push({
          sourceId: chunk.id,
          title: chunk.title,
          text: chunk.text,
          score: cosineSimilarity(queryEmbedding, embedding),
        });
      }
    }

    // Array.prototype.sort is stable: ties keep insertion order
    return scored.sort((a, b) => b.score - a.score).slice(0, k);
  }
}

/** Compute cosine similarity between two vectors */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}
