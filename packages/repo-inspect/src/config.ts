/**
 * Inspect configuration
 *
 * Built once from parsed command-line options and the environment, then
 * passed to the inspector and reporters. Nothing here reads global state;
 * callers hand in the environment they want honoured.
 */

import { parseOutputFormat } from './reporters/index.js';
import { parseSectionList } from './sections.js';
import { DEFAULT_API_URL, type InspectConfig } from './types.js';

export interface CliOptions {
  format: string;
  verbose?: boolean;
  sections?: string[];
  /** false when --no-color was given */
  color?: boolean;
  token?: string;
  apiUrl?: string;
}

export interface ConfigContext {
  env: Record<string, string | undefined>;
  /** Whether stdout is an interactive terminal */
  isTTY: boolean;
}

/**
 * Validate options and build the configuration. Throws
 * UnsupportedFormatError before anything has been fetched or written.
 */
export function resolveConfig(options: CliOptions, context: ConfigContext): InspectConfig {
  const { env } = context;
  const token = options.token ?? env['GH_TOKEN'] ?? env['GITHUB_TOKEN'];

  const config: InspectConfig = {
    format: parseOutputFormat(options.format),
    verbose: options.verbose === true,
    sections: parseSectionList(options.sections ?? []),
    color: options.color !== false && context.isTTY && !env['NO_COLOR'],
    apiUrl: options.apiUrl ?? env['GITHUB_API_URL'] ?? DEFAULT_API_URL,
  };
  if (token) {
    config.token = token;
  }
  return config;
}
