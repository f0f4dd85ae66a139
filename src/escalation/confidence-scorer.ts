import { RetrievedChunk } from '../config/types';

export interface ConfidenceOptions {
  /** Confidence when nothing was retrieved */
  emptyFloor: number;
  /** Lowest confidence for a grounded answer */
  groundedFloor: number;
  /** Multiplier applied when generation fell back */
  degradedPenalty: number;
}

export const DEFAULT_CONFIDENCE_OPTIONS: ConfidenceOptions = {
  emptyFloor: 0.1,
  groundedFloor: 0.2,
  degradedPenalty: 0.5,
};

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Confidence for a turn: a fixed floor without grounding, otherwise rising
 * linearly with the top chunk's score. Always in [0, 1].
 */
export function scoreConfidence(
  chunks: readonly RetrievedChunk[],
  outcome: { degraded: boolean },
  options: ConfidenceOptions = DEFAULT_CONFIDENCE_OPTIONS,
): number {
  let confidence: number;
  if (chunks.length === 0) {
    confidence = options.emptyFloor;
  } else {
    const top = Math.max(...chunks.map((c) => c.score));
    confidence = options.groundedFloor + (1 - options.groundedFloor) * clamp01(top);
  }
  if (outcome.degraded) {
    confidence *= options.degradedPenalty;
  }
  return clamp01(confidence);
}
