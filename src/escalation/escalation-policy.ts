import { EscalationReason } from '../config/types';

export interface EscalationInput {
  confidence: number;
  /** Message as the student wrote it */
  messageText: string;
  /** Pivot-language rendering of the message */
  pivotText: string;
  generationDegraded: boolean;
}

export interface EscalationDecision {
  escalate: boolean;
  reason: EscalationReason | null;
}

/** Explicit requests for a person, in English and romanized/Devanagari Hindi. */
export const DEFAULT_ESCALATION_PATTERNS: RegExp[] = [
  /\b(talk|speak|chat)\s+(to|with)\s+(a\s+)?(human|person|someone|staff|agent|counsell?or|representative)\b/i,
  /\b(want|need|get|connect|transfer|talk|speak)\b.{0,20}\b(human|real person|live agent|customer care)\b/i,
  /\b(contact|call)\s+(the\s+)?(office|admin|administration|helpdesk|help desk)\b/i,
  /\binsaan\s+se\s+baat\b/i,
  /किसी\s+(व्यक्ति|इंसान)\s+से\s+बात/,
];

/**
 * Decides whether a turn needs a human. First match wins:
 * generation failure, then low confidence, then an explicit request.
 */
export class EscalationPolicy {
  private readonly patterns: RegExp[];

  constructor(
    private readonly confidenceThreshold: number,
    patterns: Array<string | RegExp> = [],
  ) {
    const configured = patterns.map((p) => (typeof p === 'string' ? new RegExp(p, 'i') : p));
    this.patterns = configured.length > 0 ? configured : DEFAULT_ESCALATION_PATTERNS;
  }

  decide(input: EscalationInput): EscalationDecision {
    if (input.generationDegraded) {
      return { escalate: true, reason: 'generation_failure' };
    }
    if (input.confidence < this.confidenceThreshold) {
      return { escalate: true, reason: 'low_confidence' };
    }
    if (this.isExplicitRequest(input.messageText) || this.isExplicitRequest(input.pivotText)) {
      return { escalate: true, reason: 'explicit_request' };
    }
    return { escalate: false, reason: null };
  }

  private isExplicitRequest(text: string): boolean {
    return this.patterns.some((p) => p.test(text));
  }
}
