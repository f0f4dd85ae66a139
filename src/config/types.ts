// ───── Conversation ─────────────────────────────────────────────

export type TurnRole = 'user' | 'assistant';

/** Marks a turn produced through a fallback path after a recoverable failure. */
export type DegradationFlag =
  | 'detection_fallback'
  | 'translation_degraded'
  | 'retrieval_degraded'
  | 'generation_degraded'
  | 'persistence_degraded';

export interface SourceSummary {
  title: string;
  content: string;
  score: number;
}

export interface Turn {
  role: TurnRole;
  /** Text in the language the student saw or wrote */
  content: string;
  /** Pivot-language rendering, when it differs from `content` */
  pivotContent?: string;
  language?: string;
  intent?: string;
  confidence?: number;
  sources?: SourceSummary[];
  needsEscalation?: boolean;
  degraded?: DegradationFlag[];
  timestamp: number;
}

export interface Session {
  sessionId: string;
  /** Last detected or preferred language */
  language?: string;
  turnCount: number;
  createdAt: number;
  lastActivityAt: number;
}

// ───── Retrieval ────────────────────────────────────────────────

export interface RetrievedChunk {
  sourceId: string;
  title: string;
  text: string;
  /** Higher = more relevant */
  score: number;
}

// ───── Escalation ───────────────────────────────────────────────

export type EscalationReason = 'generation_failure' | 'low_confidence' | 'explicit_request';

export type EscalationStatus = 'pending' | 'resolved';

export interface EscalationRecord {
  id: string;
  sessionId: string;
  reason: EscalationReason;
  status: EscalationStatus;
  assignee?: string;
  createdAt: number;
}

// ───── Chat Pipeline I/O ────────────────────────────────────────

export interface ChatRequest {
  message: string;
  sessionId?: string;
  /** Preferred response language */
  language?: string;
}

export interface ChatResult {
  sessionId: string;
  responseText: string;
  detectedLanguage: string;
  responseLanguage: string;
  intent: string | null;
  confidence: number;
  sources: SourceSummary[];
  needsEscalation: boolean;
  escalationReason: EscalationReason | null;
  suggestedQuestions: string[];
  degraded: DegradationFlag[];
}
