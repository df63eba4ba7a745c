/**
 * Pipeline error classes.
 *
 * Lower layers throw; the driver and the extractor decide whether a failure
 * is scoped to one item (logged, skipped) or to the whole run (rethrown).
 */

export type PipelineErrorCategory =
  | 'AGENCY_LISTING_FAILED'
  | 'SOURCE_DIR_INVALID'
  | 'BATCH_UNREADABLE'
  | 'INVALID_ARGUMENT'
  | 'API_RESPONSE_INVALID';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly category: PipelineErrorCategory,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PipelineError';
  }
}

export function isPipelineError(error: unknown, category?: PipelineErrorCategory): error is PipelineError {
  if (!(error instanceof PipelineError)) return false;
  return category === undefined || error.category === category;
}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
