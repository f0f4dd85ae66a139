import { RetrievedChunk } from '../config/types';

/** FAQ entry as stored in knowledge/faqs.yaml */
export interface FAQEntry {
  question: string;
  answer: string;
  tags?: string[];
  category?: string;
}

/** A unit of indexed text handed to a retrieval store. */
export interface KnowledgeChunk {
  id: string;
  documentId: string;
  title: string;
  text: string;
  /** Precomputed by the indexer; stores that need one embed on demand otherwise */
  embedding?: number[];
}

/**
 * Narrow contract every retrieval store implements.
 * `query` results are ordered by non-increasing score; equal scores keep insertion order.
 */
export interface RetrievalStore {
  /** Replace all chunks previously indexed under `documentId`. */
  index(documentId: string, chunks: KnowledgeChunk[]): Promise<void>;
  query(pivotText: string, k: number): Promise<RetrievedChunk[]>;
  readonly size: number;
}
