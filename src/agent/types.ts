export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/** Structured reply the model is asked to produce for a student question. */
export interface GenerationReply {
  answer: string;
  intent: string | null;
  suggestedQuestions: string[];
}
