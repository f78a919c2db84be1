/**
 * Error classes for repo-inspect.
 *
 * Everything except HostingApiError is fatal to the command. Hosting errors
 * surface inside collectors and are downgraded to diagnostics there.
 */

export class InspectError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InspectError';
  }
}

export class RepositoryArgumentError extends InspectError {
  constructor(public readonly value: string) {
    super(`repository must be in format 'owner/repo', got "${value}"`);
    this.name = 'RepositoryArgumentError';
  }
}

export class RepositoryResolutionError extends InspectError {
  public readonly errorCause: Error | undefined;

  constructor(reason: string, errorCause?: Error) {
    super(`no repository specified and could not determine current repository: ${reason}`);
    this.name = 'RepositoryResolutionError';
    this.errorCause = errorCause;
  }
}

export class UnsupportedFormatError extends InspectError {
  constructor(public readonly format: string) {
    super(`unsupported output format: "${format}" (expected json, yaml, yml or table)`);
    this.name = 'UnsupportedFormatError';
  }
}

export class EncodingError extends InspectError {
  public readonly errorCause: Error | undefined;

  constructor(format: string, errorCause?: Error) {
    super(`failed to encode ${format} output${errorCause ? `: ${errorCause.message}` : ''}`);
    this.name = 'EncodingError';
    this.errorCause = errorCause;
  }
}

export class HostingApiError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly status: number | undefined,
    message: string
  ) {
    super(status === undefined ? `GET ${endpoint}: ${message}` : `GET ${endpoint} (${status}): ${message}`);
    this.name = 'HostingApiError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
