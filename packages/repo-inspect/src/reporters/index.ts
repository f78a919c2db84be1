/**
 * Reporter selection and rendering
 */

import { EncodingError, UnsupportedFormatError, toError } from '../errors.js';
import type { GovernanceRecord, OutputFormat } from '../types.js';
import { JsonReporter } from './json-reporter.js';
import { TreeReporter } from './tree-reporter.js';
import type { Reporter } from './types.js';
import { YamlReporter } from './yaml-reporter.js';

export type { Reporter } from './types.js';
export { JsonReporter } from './json-reporter.js';
export { YamlReporter } from './yaml-reporter.js';
export { TreeReporter, formatBoolean, formatPermission, type TreeReporterOptions } from './tree-reporter.js';
export { toGovernanceDocument, type GovernanceDocument } from './document.js';

/**
 * Resolve a user-supplied format name, case-insensitively. "yml" is an alias for "yaml".
 */
export function parseOutputFormat(value: string): OutputFormat {
  switch (value.toLowerCase()) {
    case 'json':
      return 'json';
    case 'yaml':
    case 'yml':
      return 'yaml';
    case 'table':
      return 'table';
    default:
      throw new UnsupportedFormatError(value);
  }
}

export interface RenderOptions {
  color?: boolean;
}

/**
 * Get reporter based on format
 */
export function getReporter(format: OutputFormat, options: RenderOptions = {}): Reporter {
  switch (format) {
    case 'json':
      return new JsonReporter();
    case 'yaml':
      return new YamlReporter();
    case 'table':
      return new TreeReporter({ color: options.color ?? false });
  }
}

/**
 * Render the whole record to a string. Nothing is written here, so a
 * failing encoder never leaves partial output behind.
 */
export function render(
  record: GovernanceRecord,
  format: string,
  sections: readonly string[],
  options: RenderOptions = {}
): string {
  const outputFormat = parseOutputFormat(format);
  const reporter = getReporter(outputFormat, options);
  try {
    return reporter.generate(record, sections);
  } catch (error) {
    throw new EncodingError(outputFormat, toError(error));
  }
}
