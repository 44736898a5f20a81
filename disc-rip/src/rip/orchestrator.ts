import type { ClassificationResult, DestinationFactory, RipPlan } from './types.js';
import { buildRipPlan, type PlanOptions } from './plan-builder.js';

/**
 * Expand a classification into one rip plan per title, in classification order.
 *
 * Performs no I/O. The destination factory receives each title, its episode
 * code (null when the classification has none) and its 1-based track index.
 * Any error from the factory or the plan builder aborts the whole expansion.
 */
export function ripDisc(
  device: string,
  classification: ClassificationResult,
  destinationFactory: DestinationFactory,
  options: PlanOptions = {}
): RipPlan[] {
  const { episodes, episodeCodes } = classification;

  if (episodeCodes.length > 0 && episodeCodes.length !== episodes.length) {
    throw new Error(
      `Episode codes must align with episodes (${episodeCodes.length} codes for ${episodes.length} titles)`
    );
  }

  return episodes.map((title, i) => {
    const code = episodeCodes.length > 0 ? episodeCodes[i] : null;
    const destination = destinationFactory(title, code, i + 1);
    return buildRipPlan(device, title, destination, options);
  });
}
