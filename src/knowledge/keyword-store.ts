import * as fs from 'fs';
import * as path from 'path';
import { RetrievedChunk } from '../config/types';
import { logger } from '../observability/logger';
import { KnowledgeChunk, RetrievalStore } from './types';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const STOP_WORDS_FILE = path.join(PROJECT_ROOT, 'data', 'stop-words.json');

/** Bonus for a query term that also appears in the chunk title */
const TITLE_BONUS = 0.5;

/**
 * Load stop words that dilute search relevance.
 * These common words match almost every knowledge entry and are
 * filtered out before scoring.
 */
export function loadStopWords(file: string = STOP_WORDS_FILE): Set<string> {
  if (!fs.existsSync(file)) {
    logger.warn({ file }, 'Stop-word list not found, keyword search will score every term');
    return new Set();
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  const words = new Set<string>();
  if (typeof parsed === 'object' && parsed !== null) {
    for (const list of Object.values(parsed)) {
      if (!Array.isArray(list)) continue;
      for (const word of list) {
        if (typeof word === 'string') words.add(word.toLowerCase());
      }
    }
  }
  return words;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^\p{L}\p{M}\p{N}]+/u).filter(Boolean);
}

/**
 * Keyword Store: term-overlap search used when no embedding provider is configured.
 *
 * Score is the share of meaningful query terms found in the chunk, with a bonus
 * for title matches, capped at 1.
 */
export class KeywordStore implements RetrievalStore {
  private documents = new Map<string, KnowledgeChunk[]>();
  private readonly stopWords: Set<string>;

  constructor(stopWords?: Set<string>) {
    this.stopWords = stopWords ?? loadStopWords();
  }

  async index(documentId: string, chunks: KnowledgeChunk[]): Promise<void> {
    this.documents.set(documentId, [...chunks]);
  }

  get size(): number {
    let total = 0;
    for (const chunks of this.documents.values()) total += chunks.length;
    return total;
  }

  async query(pivotText: string, k: number): Promise<RetrievedChunk[]> {
    if (k <= 0) return [];
    const terms = this.filterStopWords(tokenize(pivotText));
    if (terms.length === 0) return [];

    const scored: RetrievedChunk[] = [];
    for (const chunks of this.documents.values()) {
      for (const chunk of chunks) {
        const score = this.scoreText(
          `${chunk.title} ${chunk.text}`.toLowerCase(),
          terms,
          chunk.title.toLowerCase(),
        );
        if (score > 0) {
          scored.push({ sourceId: chunk.id, title: chunk.title, text: chunk.text, score });
        }
      }
    }

    return scored.sort((a, b) => b.score - a.score).slice(0, k);
  }

  /**
   * Filter stop words from query terms while preserving meaningful words.
   * If ALL terms are stop words (e.g. "what is it"), fall back to original terms.
   */
  private filterStopWords(terms: string[]): string[] {
    const meaningful = terms.filter((t) => !this.stopWords.has(t) && t.length > 1);
    return meaningful.length > 0 ? meaningful : terms;
  }

  private scoreText(text: string, terms: string[], titleText: string): number {
    let score = 0;
    for (const term of terms) {
      if (text.includes(term)) {
        score += 1;
        if (titleText.includes(term)) {
          score += TITLE_BONUS;
        }
      }
    }
    return Math.min(1, score / terms.length);
  }
}
