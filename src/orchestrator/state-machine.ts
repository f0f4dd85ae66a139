import { PIPELINE_TRANSITIONS, PipelineState, StateTransitionEvent } from './types';
import { logger } from '../observability/logger';
import { pipelineTransitions } from '../observability/metrics';

export class PipelineStateMachine {
  /**
   * Attempt a state transition. Returns the new state if valid, or the current state if not.
   */
  transition(
    requestId: string,
    currentState: PipelineState,
    targetState: PipelineState,
    reason: string,
  ): { newState: PipelineState; event: StateTransitionEvent | null } {
    const allowed = PIPELINE_TRANSITIONS[currentState];
    if (!allowed.includes(targetState)) {
      logger.warn(
        { requestId, from: currentState, to: targetState, reason },
        'Invalid pipeline transition attempted',
      );
      return { newState: currentState, event: null };
    }

    const event: StateTransitionEvent = {
      requestId,
      from: currentState,
      to: targetState,
      reason,
      timestamp: Date.now(),
    };

    pipelineTransitions.inc({ from: currentState, to: targetState });
    logger.debug(event, 'Pipeline transition');

    return { newState: targetState, event };
  }

  isTerminal(state: PipelineState): boolean {
    return PIPELINE_TRANSITIONS[state].length === 0;
  }
}

export const pipelineStateMachine = new PipelineStateMachine();
