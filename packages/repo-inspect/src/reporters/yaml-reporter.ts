/**
 * YAML Reporter - same document as JSON, YAML-encoded
 */

import { stringify } from 'yaml';
import { toGovernanceDocument } from './document.js';
import type { Reporter } from './types.js';
import type { GovernanceRecord } from '../types.js';

export class YamlReporter implements Reporter {
  generate(record: GovernanceRecord): string {
    return stringify(toGovernanceDocument(record));
  }
}
