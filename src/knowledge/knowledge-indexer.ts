import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import { logger } from '../observability/logger';
import { EmbeddingProvider } from './embedding-service';
import { FAQEntry, KnowledgeChunk, RetrievalStore } from './types';

export const FAQ_SOURCE_PREFIX = 'faq:';
const DOCUMENT_EXTENSIONS = new Set(['.md', '.txt']);

export interface ChunkOptions {
  chunkSize: number;
  overlap: number;
}

export interface IndexSummary {
  documents: number;
  chunks: number;
}

/**
 * Split text into overlapping windows of at most `chunkSize` characters,
 * breaking on whitespace where one falls in the second half of the window.
 */
export function chunkText(text: string, options: ChunkOptions): string[] {
  const { chunkSize, overlap } = options;
  if (chunkSize <= 0) throw new Error('chunkSize must be positive');
  if (overlap < 0 || overlap >= chunkSize) throw new Error('overlap must be in [0, chunkSize)');

  const clean = text.replace(/\s+/g, ' ').trim();
  if (!clean) return [];
  if (clean.length <= chunkSize) return [clean];

  const chunks: string[] = [];
  let start = 0;
  while (start < clean.length) {
    let end = Math.min(start + chunkSize, clean.length);
    if (end < clean.length) {
      const space = clean.lastIndexOf(' ', end);
      if (space > start + chunkSize / 2) end = space;
    }
    const piece = clean.slice(start, end).trim();
    if (piece) chunks.push(piece);
    if (end >= clean.length) break;
    start = Math.max(end - overlap, start + 1);
  }
  return chunks;
}

function isFaqEntry(value: unknown): value is FAQEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('question' in value) || !('answer' in value)) return false;
  return typeof value.question === 'string' && typeof value.answer === 'string';
}

function categoryOf(entry: FAQEntry): string {
  return typeof entry.category === 'string' && entry.category ? entry.category : 'general';
}

/** First markdown heading, else the file name without extension. */
function documentTitle(content: string, filename: string): string {
  const heading = content.match(/^#\s+(.+)$/m);
  return heading ? heading[1].trim() : path.basename(filename, path.extname(filename));
}

/**
 * Knowledge Indexer: loads FAQ YAML files and text documents, chunks them,
 * optionally embeds them up front and hands them to the retrieval store.
 */
export class KnowledgeIndexer {
  private log = logger.child({ component: 'knowledge-indexer' });

  constructor(
    private readonly store: RetrievalStore,
    private readonly options: ChunkOptions,
    private readonly embeddings?: EmbeddingProvider,
  ) {}

  /** One chunk per FAQ; the question is the chunk title. */
  async indexFaqs(documentId: string, entries: FAQEntry[]): Promise<number> {
    const chunks: KnowledgeChunk[] = entries.map((entry, i) => ({
      id: `${FAQ_SOURCE_PREFIX}${documentId}:${i + 1}`,
      documentId,
      title: entry.question,
      text: `Q: ${entry.question}\nA: ${entry.answer}\nCategory: ${categoryOf(entry)}`,
    }));
    await this.store.index(documentId, await this.embed(chunks));
    return chunks.length;
  }

  async indexDocument(documentId: string, title: string, content: string): Promise<number> {
    const chunks: KnowledgeChunk[] = chunkText(content, this.options).map((text, i) => ({
      id: `${documentId}#${i + 1}`,
      documentId,
      title,
      text,
    }));
    await this.store.index(documentId, await this.embed(chunks));
    return chunks.length;
  }

  /**
   * Index every `*.yaml`/`*.yml` FAQ file in `dir` and every `.md`/`.txt`
   * file in `dir/documents`. A malformed file is logged and skipped.
   */
  async loadFromDirectory(dir: string): Promise<IndexSummary> {
    const summary: IndexSummary = { documents: 0, chunks: 0 };
    if (!fs.existsSync(dir)) {
      this.log.warn({ dir }, 'Knowledge directory not found');
      return summary;
    }

    for (const file of fs.readdirSync(dir).sort()) {
      const ext = path.extname(file);
      if (ext !== '.yaml' && ext !== '.yml') continue;
      const filepath = path.join(dir, file);
      try {
        const parsed: unknown = yaml.load(fs.readFileSync(filepath, 'utf-8'));
        const entries = Array.isArray(parsed) ? parsed.filter(isFaqEntry) : [];
        if (entries.length === 0) {
          this.log.warn({ filepath }, 'No FAQ entries in knowledge file');
          continue;
        }
        summary.chunks += await this.indexFaqs(path.basename(file, ext), entries);
        summary.documents++;
      } catch (err) {
        this.log.error({ err, filepath }, 'Failed to load knowledge file');
      }
    }

    const docsDir = path.join(dir, 'documents');
    if (fs.existsSync(docsDir)) {
      for (const file of fs.readdirSync(docsDir).sort()) {
        if (!DOCUMENT_EXTENSIONS.has(path.extname(file))) continue;
        const filepath = path.join(docsDir, file);
        try {
          const content = fs.readFileSync(filepath, 'utf-8');
          summary.chunks += await this.indexDocument(`doc:${file}`, documentTitle(content, file), content);
          summary.documents++;
        } catch (err) {
          this.log.error({ err, filepath }, 'Failed to index document');
        }
      }
    }

    this.log.info({ ...summary, storeSize: this.store.size }, 'Knowledge base indexed');
    return summary;
  }

  private async embed(chunks: KnowledgeChunk[]): Promise<KnowledgeChunk[]> {
    if (!this.embeddings || chunks.length === 0) return chunks;
    const vectors = await this.embeddings.embedBatch(chunks.map((c) => c.text));
    return chunks.map((chunk, i) => ({ ...chunk, embedding: vectors[i] }));
  }
}
