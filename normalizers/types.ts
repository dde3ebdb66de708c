/**
 * Source-agnostic extraction contract
 */

import type { Source } from '../schemas/index.js';

/**
 * Common interface for all record extractors
 *
 * Implementations are pure: the same payload always yields the same records.
 */
export interface RecordExtractor<TRecord> {
  /** Source the payload comes from */
  source: Source;
  /** Flatten one raw payload into zero or more records */
  extract(payload: unknown): TRecord[];
}
