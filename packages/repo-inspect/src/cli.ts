/**
 * repo-inspect command
 *
 * Wires configuration, repository resolution, the inspector and the
 * reporters together. Fatal errors are logged to stderr as
 * "Error: <message>" and turn into exit code 1; collector failures never do.
 */

import { Command } from 'commander';
import { resolveConfig, type CliOptions } from './config.js';
import { toError } from './errors.js';
import { GovernanceInspector } from './inspector/governance-inspector.js';
import { createLogger, type Logger, type TextSink } from './logger.js';
import { createGitHubClient, type HostingClient } from './providers/github.js';
import { render } from './reporters/index.js';
import {
  parseRepositoryArgument,
  resolveCurrentRepository,
  type ResolveRepositoryOptions,
} from './repository.js';
import { unknownSections } from './sections.js';
import { SECTION_NAMES, type InspectConfig, type RepositoryIdentity } from './types.js';
import { VERSION } from './version.js';

export interface InspectDependencies {
  stdout: TextSink;
  stderr: TextSink;
  env: Record<string, string | undefined>;
  cwd: string;
  isTTY: boolean;
  createClient: (config: InspectConfig) => HostingClient;
  resolveRepository: (options: ResolveRepositoryOptions) => Promise<RepositoryIdentity>;
}

function defaultDependencies(): InspectDependencies {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    cwd: process.cwd(),
    isTTY: process.stdout.isTTY === true,
    createClient: (config) => createGitHubClient({ token: config.token, apiUrl: config.apiUrl }),
    resolveRepository: resolveCurrentRepository,
  };
}

/**
 * Run one inspection and return the process exit code.
 */
export async function runInspect(
  repositoryArg: string | undefined,
  options: CliOptions,
  overrides: Partial<InspectDependencies> = {}
): Promise<number> {
  const deps: InspectDependencies = { ...defaultDependencies(), ...overrides };
  // Replaced once the configuration is known
  let logger: Logger = createLogger({ verbose: false, color: false, stream: deps.stderr });

  try {
    const config = resolveConfig(options, { env: deps.env, isTTY: deps.isTTY });
    logger = createLogger({ verbose: config.verbose, color: config.color, stream: deps.stderr });

    const ignored = unknownSections(config.sections);
    if (ignored.length > 0) {
      logger.warn(`unknown section(s) ${ignored.join(', ')} will be ignored (known: ${SECTION_NAMES.join(', ')})`);
    }

    const repository =
      repositoryArg !== undefined
        ? parseRepositoryArgument(repositoryArg)
        : await deps.resolveRepository({ cwd: deps.cwd, env: deps.env });

    logger.info(`Inspecting repository: ${repository.owner}/${repository.name}`);

    const inspector = new GovernanceInspector({ client: deps.createClient(config), logger });
    const { record } = await inspector.inspect(repository, config.sections);

    deps.stdout.write(render(record, config.format, config.sections, { color: config.color }));
    return 0;
  } catch (error) {
    logger.error(toError(error).message);
    return 1;
  }
}

function collectSections(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export interface ProgramOptions extends Partial<InspectDependencies> {
  /** Receives the exit code of the inspection */
  exit?: (code: number) => void;
}

/**
 * Create and configure the CLI program
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const { exit, ...overrides } = options;
  const setExitCode =
    exit ??
    ((code: number): void => {
      process.exitCode = code;
    });

  const program = new Command();

  program
    .name('repo-inspect')
    .description('Discover repository governance configuration without making changes')
    .version(VERSION)
    .argument('[repository]', "Repository in 'owner/repo' form (defaults to the current git repository)")
    .option('-f, --format <format>', 'Output format (json, yaml, table)', 'json')
    .option('-v, --verbose', 'Enable verbose output')
    .option(
      '-s, --sections <sections>',
      `Specific sections to inspect, comma-separated (${SECTION_NAMES.join(', ')})`,
      collectSections,
      []
    )
    .option('--token <token>', 'API token (or set GH_TOKEN / GITHUB_TOKEN)')
    .option('--api-url <url>', 'REST API root (or set GITHUB_API_URL)')
    .option('--no-color', 'Disable colored output')
    .action(async (repository: string | undefined, opts: CliOptions) => {
      setExitCode(await runInspect(repository, opts, overrides));
    });

  program.addHelpText(
    'after',
    `
Examples:
  $ repo-inspect                              Inspect the repository in the current directory
  $ repo-inspect octo-org/widgets             Inspect a named repository
  $ repo-inspect octo-org/widgets -f table    Print a readable tree
  $ repo-inspect -s rulesets,teams -f yaml    Only collect rulesets and teams
`
  );

  return program;
}
