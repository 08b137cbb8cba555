/**
 * Error types raised by external collaborators and configuration loading.
 *
 * The pipeline catches SearchError and GenerationError inside each agent;
 * neither ever crosses ProposalOrchestrator.orchestrate().
 */

export type UseCaseStudioErrorCode =
  | 'SEARCH_FAILED'
  | 'GENERATION_FAILED'
  | 'CONFIGURATION_INVALID';

export class UseCaseStudioError extends Error {
  readonly code: UseCaseStudioErrorCode;

  constructor(code: UseCaseStudioErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UseCaseStudioError';
    this.code = code;
  }
}

/** Search backend call failed (transport, HTTP status or response shape). */
export class SearchError extends UseCaseStudioError {
  readonly query: string;
  readonly statusCode: number;

  constructor(
    message: string,
    details: { query: string; statusCode?: number; cause?: unknown },
  ) {
    super('SEARCH_FAILED', message, { cause: details.cause });
    this.name = 'SearchError';
    this.query = details.query;
    this.statusCode = details.statusCode ?? 0;
  }
}

/** Text generation failed (transport, auth, quota, or empty output). */
export class GenerationError extends UseCaseStudioError {
  readonly provider: string;
  readonly statusCode: number;

  constructor(
    message: string,
    details: { provider: string; statusCode?: number; cause?: unknown },
  ) {
    super('GENERATION_FAILED', message, { cause: details.cause });
    this.name = 'GenerationError';
    this.provider = details.provider;
    this.statusCode = details.statusCode ?? 0;
  }
}

/** Raised by requireValidConfig() before any client is built. */
export class ConfigurationError extends UseCaseStudioError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('CONFIGURATION_INVALID', `Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

/** Flatten an unknown thrown value into a one-line description. */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const parts = [error.message];
  if (error instanceof SearchError || error instanceof GenerationError) {
    if (error.statusCode !== 0) {
      parts.push(`statusCode=${error.statusCode}`);
    }
  }
  const cause: unknown = error.cause;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    parts.push(`cause=${cause.message}`);
  }
  return parts.join(' | ');
}
