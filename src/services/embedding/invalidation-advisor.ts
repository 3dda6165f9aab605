import { BASELINE_DIMENSIONS } from '../../constants/embedding-constants.js';
import type { SwitchOutcome } from './ModelSwitcher.js';

/**
 * Cache invalidation guidance for a completed switch
 *
 * An incompatible target always gets guidance, even when the switch wrote
 * nothing: wikis built with it do not match the baseline width. Returns null
 * when cached wikis and the vector index remain usable. Never touches the
 * cache; deleting entries is left to the caller.
 */
export function adviseInvalidation(
  outcome: Pick<SwitchOutcome, 'descriptor' | 'previousModel' | 'changed'>
): string | null {
  const { descriptor, previousModel } = outcome;

  if (!descriptor.compatible) {
    return (
      `${descriptor.id} produces ${descriptor.dimensionality}-dimensional vectors, ` +
      `not the baseline ${BASELINE_DIMENSIONS}. Rebuild the index and clear cached wikis ` +
      `(docwiki cache list / docwiki cache delete) before generating again.`
    );
  }

  if (!outcome.changed) {
    return null;
  }

  const previousWidth = previousModel?.dimensions ?? null;

  if (previousWidth !== null && previousWidth !== descriptor.dimensionality) {
    return (
      `Vector width changed from ${previousWidth} to ${descriptor.dimensionality}. ` +
      `Wikis generated with ${previousModel?.model ?? 'the previous model'} are stale; ` +
      `delete them and rebuild the index.`
    );
  }

  return null;
}
