/**
 * Reporter type definitions
 */

import type { GovernanceRecord } from '../types.js';

/**
 * Reporter interface
 */
export interface Reporter {
  /**
   * Render the record. The section filter only affects reporters that
   * choose sections themselves; document formats always carry every field.
   */
  generate(record: GovernanceRecord, sections: readonly string[]): string;
}
