import Ajv from 'ajv';
import { GenerationReply } from './types';

const ajv = new Ajv({ allErrors: true });

/** Maximum follow-up suggestions kept from a reply. */
export const MAX_SUGGESTED_QUESTIONS = 3;

interface RawReply {
  answer: string;
  intent?: string | null;
  suggested_questions?: string[];
}

/**
 * JSON Schema for the generation reply.
 * The model is instructed to return JSON matching this schema.
 */
export const RESPONSE_CONTRACT_SCHEMA = {
  type: 'object',
  properties: {
    answer: {
      type: 'string',
      minLength: 1,
      description: 'The answer shown to the student, in English.',
    },
    intent: {
      type: ['string', 'null'],
      description: 'Short label for what the student asked about (e.g. library, fees, admissions, hostel, exams, greeting).',
    },
    suggested_questions: {
      type: 'array',
      items: { type: 'string' },
      description: 'Up to three follow-up questions the student might ask next.',
    },
  },
  required: ['answer'],
} as const;

const validateReply = ajv.compile<RawReply>(RESPONSE_CONTRACT_SCHEMA);

/**
 * Parse the model output into a GenerationReply.
 * Handles clean JSON and markdown-wrapped JSON; anything that is not a valid
 * reply object is taken verbatim as the answer.
 */
export function parseGenerationReply(raw: string): GenerationReply {
  const text = raw.trim();
  let jsonStr = text;

  // Strip markdown code fences if present
  if (jsonStr.startsWith('```')) {
    jsonStr = jsonStr.replace(/^```(?:json)?\s*/, '').replace(/\s*```$/, '');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonStr);
  } catch {
    return { answer: text, intent: null, suggestedQuestions: [] };
  }

  if (!validateReply(parsed)) {
    return { answer: text, intent: null, suggestedQuestions: [] };
  }

  const intent = parsed.intent?.trim();
  return {
    answer: parsed.answer.trim(),
    intent: intent ? intent : null,
    suggestedQuestions: (parsed.suggested_questions ?? [])
      .map((q) => q.trim())
      .filter(Boolean)
      .slice(0, MAX_SUGGESTED_QUESTIONS),
  };
}
