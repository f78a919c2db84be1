/**
 * JSON Reporter - machine-readable output
 */

import { toGovernanceDocument } from './document.js';
import type { Reporter } from './types.js';
import type { GovernanceRecord } from '../types.js';

export class JsonReporter implements Reporter {
  generate(record: GovernanceRecord): string {
    return `${JSON.stringify(toGovernanceDocument(record), null, 2)}\n`;
  }
}
