import { Session, Turn } from '../config/types';

/**
 * Session persistence contract.
 * History is append-only; readers bound what they take with `limit`.
 */
export interface SessionHistory {
  getSession(sessionId: string): Promise<Session | null>;
  saveSession(session: Session): Promise<void>;
  /** Oldest first; with `limit`, only the most recent `limit` turns */
  loadHistory(sessionId: string, limit?: number): Promise<Turn[]>;
  appendTurn(sessionId: string, turn: Turn): Promise<void>;
  /** Saves the session summary and appends the turns as one write; nothing is stored on failure */
  appendTurns(sessionId: string, session: Session, turns: Turn[]): Promise<void>;
}
