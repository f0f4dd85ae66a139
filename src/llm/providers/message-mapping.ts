import { LLMMessage } from '../../agent/types';

/** Placeholder user turn for APIs that must open with a user message. */
export const CONVERSATION_START = '(conversation start)';

export interface SplitMessages {
  /** All system messages joined by a blank line; empty when there are none */
  system: string;
  turns: Array<LLMMessage & { role: 'user' | 'assistant' }>;
}

/** Pull system messages out for APIs that take them as a separate parameter. */
export function splitSystemMessages(messages: readonly LLMMessage[]): SplitMessages {
  const system: string[] = [];
  const turns: SplitMessages['turns'] = [];
  for (const msg of messages) {
    if (msg.role === 'system') {
      system.push(msg.content);
    } else {
      turns.push({ role: msg.role, content: msg.content });
    }
  }
  return { system: system.join('\n\n'), turns };
}

/**
 * Merge consecutive same-role turns and make sure the first turn is from
 * the user. Anthropic and Gemini both reject anything else.
 */
export function alternateRoles(turns: SplitMessages['turns']): SplitMessages['turns'] {
  const merged: SplitMessages['turns'] = [];
  for (const turn of turns) {
    const prev = merged[merged.length - 1];
    if (prev && prev.role === turn.role) {
      prev.content += `\n\n${turn.content}`;
    } else {
      merged.push({ ...turn });
    }
  }
  if (merged.length > 0 && merged[0].role !== 'user') {
    merged.unshift({ role: 'user', content: CONVERSATION_START });
  }
  return merged;
}
