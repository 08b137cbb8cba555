/**
 * Use-Case Studio - shared type definitions
 *
 * Types used by the proposal pipeline, the HTTP API and the CLI.
 */

export type * from './types/search.js';
export type * from './types/proposal.js';

// ============================================================================
// HTTP API
// ============================================================================

/** Error body returned by every non-2xx API response. */
export interface ApiErrorBody {
  /** Machine-readable error code */
  error: string;
  /** Human-readable message */
  message: string;
}

export interface CreateProposalRequest {
  subject: string;
}
