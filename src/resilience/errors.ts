import { Turn } from '../config/types';

export type PipelineErrorCode =
  | 'DETECTION_AMBIGUOUS'
  | 'TRANSLATION_UNAVAILABLE'
  | 'RETRIEVAL_UNAVAILABLE'
  | 'GENERATION_TRANSIENT'
  | 'GENERATION_FATAL'
  | 'PERSISTENCE_UNAVAILABLE'
  | 'ORCHESTRATION_FATAL';

/** Base class for every failure the chat pipeline knows how to classify. */
export class PipelineError extends Error {
  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

export class DetectionAmbiguousError extends PipelineError {
  constructor(message: string) {
    super('DETECTION_AMBIGUOUS', message);
    this.name = 'DetectionAmbiguousError';
  }
}

export class TranslationUnavailableError extends PipelineError {
  constructor(
    message: string,
    readonly source: string,
    readonly target: string,
    cause?: unknown,
  ) {
    super('TRANSLATION_UNAVAILABLE', message, cause);
    this.name = 'TranslationUnavailableError';
  }
}

export class RetrievalUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('RETRIEVAL_UNAVAILABLE', message, cause);
    this.name = 'RetrievalUnavailableError';
  }
}

/** Timeout, rate limit or upstream 5xx: worth another attempt. */
export class GenerationTransientError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('GENERATION_TRANSIENT', message, cause);
    this.name = 'GenerationTransientError';
  }
}

/** Invalid request, auth failure: retrying cannot help. */
export class GenerationFatalError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('GENERATION_FATAL', message, cause);
    this.name = 'GenerationFatalError';
  }
}

export class PersistenceUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('PERSISTENCE_UNAVAILABLE', message, cause);
    this.name = 'PersistenceUnavailableError';
  }
}

/**
 * The only pipeline failure surfaced to the caller.
 * Carries the synthetic error turn shown to the student; nothing was persisted.
 */
export class OrchestrationFatalError extends PipelineError {
  constructor(
    message: string,
    readonly sessionId: string,
    readonly errorTurn: Turn,
    cause?: unknown,
  ) {
    super('ORCHESTRATION_FATAL', message, cause);
    this.name = 'OrchestrationFatalError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
