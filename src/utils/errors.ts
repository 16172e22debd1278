/**
 * Error hierarchy for planning and executing file operations.
 *
 * Only UnparsableEntryError is recoverable: the planner skips the entry and moves on.
 * Everything else aborts the run and carries the path, key or count needed to diagnose it.
 */
export class OrganizeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type UnparsableReason = 'missing-season' | 'missing-episode' | 'invalid-number';

export class UnparsableEntryError extends OrganizeError {
  constructor(
    public readonly path: string,
    public readonly reason: UnparsableReason,
  ) {
    super(`Unable to parse episode from ${path} (${reason})`);
  }
}

export class MetadataMismatchError extends OrganizeError {
  constructor(
    public readonly episodeKey: string,
    public readonly path: string,
  ) {
    super(`Unable to get metadata for ${episodeKey} (from ${path})`);
  }
}

export class AmbiguousOutputError extends OrganizeError {
  constructor(public readonly destination: string) {
    super(`Multiple input files map to the same output: ${destination}`);
  }
}

export class AmbiguousMovieSourceError extends OrganizeError {
  constructor(
    public readonly source: string,
    public readonly candidates: string[],
  ) {
    super(
      `Expected exactly one video file in ${source}, found ${candidates.length}` +
        (candidates.length > 0 ? `: ${candidates.join(', ')}` : ''),
    );
  }

  get count(): number {
    return this.candidates.length;
  }
}

export class MissingTargetError extends OrganizeError {
  constructor(public readonly source: string) {
    super(`Failed to determine target directory for ${source}`);
  }
}

export class IoFailureError extends OrganizeError {
  constructor(
    public readonly path: string,
    message: string,
    cause?: unknown,
  ) {
    super(`${message}: ${path}${describeCause(cause)}`, { cause });
  }
}

export class MetadataFetchError extends OrganizeError {
  constructor(
    public readonly resource: string,
    public readonly status: number | undefined,
    cause?: unknown,
  ) {
    super(`TMDb request failed for ${resource}${status ? ` (HTTP ${status})` : ''}${describeCause(cause)}`, { cause });
  }
}

export class NoSearchResultsError extends OrganizeError {
  constructor(public readonly query: string, kind: string) {
    super(`No ${kind} found for query: ${query}`);
  }
}

export class ConfigError extends OrganizeError {}

function describeCause(cause: unknown): string {
  if (cause instanceof Error && cause.message) {
    return ` (${cause.message})`;
  }
  return '';
}
