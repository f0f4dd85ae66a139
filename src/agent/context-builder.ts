import { RetrievedChunk, Turn } from '../config/types';

export interface BuiltContext {
  prompt: string;
  includedChunks: RetrievedChunk[];
  includedTurns: Turn[];
  /** History turns dropped to fit the budget */
  droppedTurns: number;
  droppedChunks: number;
}

export interface ContextBuilderOptions {
  /** Only the most recent turns are candidates */
  maxHistoryTurns: number;
}

function renderChunks(chunks: readonly RetrievedChunk[]): string {
  const parts = chunks.map((chunk, i) =>
    `[Source ${i + 1}: ${chunk.title} | Relevance: ${Math.round(chunk.score * 100)}%]\n${chunk.text}`,
  );
  return `--- KNOWLEDGE BASE ---\n${parts.join('\n\n')}`;
}

function renderTurns(turns: readonly Turn[]): string {
  const lines = turns.map((turn) =>
    `${turn.role === 'user' ? 'Student' : 'Assistant'}: ${turn.pivotContent ?? turn.content}`,
  );
  return `--- CONVERSATION HISTORY ---\n${lines.join('\n')}`;
}

export function renderPrompt(
  chunks: readonly RetrievedChunk[],
  turns: readonly Turn[],
  currentMessage: string,
): string {
  const sections: string[] = [];
  if (chunks.length > 0) sections.push(renderChunks(chunks));
  if (turns.length > 0) sections.push(renderTurns(turns));
  sections.push(`--- CURRENT QUESTION ---\n${currentMessage}`);
  return sections.join('\n\n');
}

/** Index of the lowest-scoring chunk; on ties the later one. */
function lowestScoreIndex(chunks: readonly RetrievedChunk[]): number {
  let index = 0;
  for (let i = 1; i < chunks.length; i++) {
    if (chunks[i].score <= chunks[index].score) index = i;
  }
  return index;
}

/**
 * Assembles the user prompt from retrieved chunks, recent history and the
 * current message, dropping content until the rendered prompt fits `budget`
 * characters: oldest history turns first, then the lowest-scoring chunks.
 * The current message is always kept, even when it alone exceeds the budget.
 */
export class ContextBuilder {
  constructor(private readonly options: ContextBuilderOptions) {}

  build(
    chunks: readonly RetrievedChunk[],
    history: readonly Turn[],
    currentMessage: string,
    budget: number,
  ): BuiltContext {
    const includedChunks = [...chunks];
    const includedTurns = this.options.maxHistoryTurns > 0
      ? history.slice(-this.options.maxHistoryTurns)
      : [];
    let droppedTurns = 0;
    let droppedChunks = 0;

    let prompt = renderPrompt(includedChunks, includedTurns, currentMessage);
    while (prompt.length > budget) {
      if (includedTurns.length > 0) {
        includedTurns.shift();
        droppedTurns++;
      } else if (includedChunks.length > 0) {
        includedChunks.splice(lowestScoreIndex(includedChunks), 1);
        droppedChunks++;
      } else {
        break;
      }
      prompt = renderPrompt(includedChunks, includedTurns, currentMessage);
    }

    return { prompt, includedChunks, includedTurns, droppedTurns, droppedChunks };
  }
}
