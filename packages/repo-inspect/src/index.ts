/**
 * repo-inspect - read-only repository governance inspection
 *
 * Collects a repository's settings, rulesets, collaborators, teams,
 * security settings, labels and milestones from the GitHub REST API and
 * renders them as JSON, YAML or a tree.
 *
 * @packageDocumentation
 */

export { VERSION } from './version.js';

// Types
export * from './types.js';
export * from './errors.js';

// Section filter
export { isSectionIncluded, parseSectionList, isSectionName, unknownSections } from './sections.js';

// Configuration and logging
export { resolveConfig, type CliOptions, type ConfigContext } from './config.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions, type TextSink } from './logger.js';

// Hosting API
export {
  GitHubClient,
  createGitHubClient,
  type GitHubClientConfig,
  type HostingClient,
} from './providers/github.js';

// Collection
export { defaultCollectors, type Collector, type CollectorRegistry } from './collectors/index.js';
export {
  GovernanceInspector,
  createGovernanceInspector,
  COLLECTION_ORDER,
  type GovernanceInspectorOptions,
} from './inspector/governance-inspector.js';

// Rendering
export {
  render,
  getReporter,
  parseOutputFormat,
  JsonReporter,
  YamlReporter,
  TreeReporter,
  toGovernanceDocument,
  type Reporter,
  type GovernanceDocument,
  type RenderOptions,
} from './reporters/index.js';

// Repository resolution
export {
  parseRepositoryArgument,
  parseRemoteUrl,
  resolveCurrentRepository,
  type GitRemote,
  type RemoteLister,
} from './repository.js';

// CLI
export { createProgram, runInspect, type InspectDependencies } from './cli.js';
