export type PipelineState =
  | 'RECEIVED'
  | 'LANGUAGE_RESOLVED'
  | 'RETRIEVED'
  | 'CONTEXT_BUILT'
  | 'GENERATED'
  | 'TRANSLATED'
  | 'SCORED'
  | 'PERSISTED'
  | 'COMPLETED';

/** Each state has exactly one successor; stages never skip or go back. */
export const PIPELINE_TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  RECEIVED: ['LANGUAGE_RESOLVED'],
  LANGUAGE_RESOLVED: ['RETRIEVED'],
  RETRIEVED: ['CONTEXT_BUILT'],
  CONTEXT_BUILT: ['GENERATED'],
  GENERATED: ['TRANSLATED'],
  TRANSLATED: ['SCORED'],
  SCORED: ['PERSISTED'],
  PERSISTED: ['COMPLETED'],
  COMPLETED: [],
};

export interface StateTransitionEvent {
  requestId: string;
  from: PipelineState;
  to: PipelineState;
  reason: string;
  timestamp: number;
}
