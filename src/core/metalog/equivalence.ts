import type { EquivalenceResult, MetalogRecord } from '../../types/index.js';
import { FILENAME_CONFLICT_KEY } from '../../constants/index.js';

export interface CompareOptions {
  /** hard-link comparison: names are expected to differ */
  ignoreFilename?: boolean;
}

/**
 * Check that records believed to describe the same entry agree.
 *
 * The first record is the reference. Each record's own keys are checked against
 * it in insertion order, and the first differing key is reported. A key the
 * reference has but another record lacks is never a conflict: a missing field is
 * compatible with any value. This one-sided rule is inherited from the METALOG
 * tooling and is kept on purpose.
 */
export function compareRecords(
  records: readonly MetalogRecord[],
  options: CompareOptions = {}
): EquivalenceResult {
  const [reference] = records;
  if (!reference) {
    return { equal: true };
  }

  for (const record of records) {
    if (!options.ignoreFilename && record.filename !== reference.filename) {
      return { equal: false, conflictKey: FILENAME_CONFLICT_KEY };
    }
    for (const [key, value] of record.attributes) {
      const expected = reference.attributes.get(key);
      if (expected !== undefined && expected !== value) {
        return { equal: false, conflictKey: key };
      }
    }
  }

  return { equal: true };
}
