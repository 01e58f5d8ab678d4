/**
 * errors.ts
 *
 * Error taxonomy for the enrichment crawler. Each class carries a stable `code`
 * so callers and logs can branch on it without instanceof chains.
 */

export type EnrichErrorCode =
  | 'NAVIGATION_TIMEOUT'
  | 'CHALLENGE_NOT_CLEARED'
  | 'NO_CANDIDATE_FOUND'
  | 'DETAIL_NOT_CONFIRMED'
  | 'RECORD_PROCESSING_FAILED'
  | 'SESSION_INIT_FAILED'
  | 'FATAL_BATCH_ERROR'

export class EnrichError extends Error {
  constructor(
    message: string,
    public readonly code: EnrichErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message)
    this.name = 'EnrichError'
  }
}

/** No normal content within the budget; retryable by re-navigation */
export class NavigationTimeoutError extends EnrichError {
  constructor(public readonly url: string, detail?: string) {
    super(`No expected content at ${url}${detail ? ` (${detail})` : ''}`, 'NAVIGATION_TIMEOUT')
    this.name = 'NavigationTimeoutError'
  }
}

export class ChallengeNotClearedError extends EnrichError {
  constructor(public readonly url: string, public readonly waitedMs: number) {
    super(`Challenge not cleared within ${Math.round(waitedMs / 1000)}s at ${url}`, 'CHALLENGE_NOT_CLEARED')
    this.name = 'ChallengeNotClearedError'
  }
}

export class NoCandidateFoundError extends EnrichError {
  constructor(public readonly url: string) {
    super(`No suitable detail link on ${url}`, 'NO_CANDIDATE_FOUND')
    this.name = 'NoCandidateFoundError'
  }
}

export class DetailNotConfirmedError extends EnrichError {
  constructor(reason: string) {
    super(reason, 'DETAIL_NOT_CONFIRMED')
    this.name = 'DetailNotConfirmedError'
  }
}

export class RecordProcessingError extends EnrichError {
  constructor(public readonly rowIndex: number, cause: unknown) {
    super(`Record ${rowIndex + 1} failed: ${errorMessage(cause)}`, 'RECORD_PROCESSING_FAILED', cause)
    this.name = 'RecordProcessingError'
  }
}

export class SessionInitError extends EnrichError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SESSION_INIT_FAILED', cause)
    this.name = 'SessionInitError'
  }
}

export class FatalBatchError extends EnrichError {
  constructor(cause: unknown, public readonly backupPath: string | null) {
    super(`Batch aborted: ${errorMessage(cause)}`, 'FATAL_BATCH_ERROR', cause)
    this.name = 'FatalBatchError'
  }
}

/** Auto-path failures that hand the record over to the operator */
export function isManualEscalation(err: unknown): err is EnrichError {
  return err instanceof EnrichError && (
    err.code === 'NAVIGATION_TIMEOUT' ||
    err.code === 'CHALLENGE_NOT_CLEARED' ||
    err.code === 'NO_CANDIDATE_FOUND' ||
    err.code === 'DETAIL_NOT_CONFIRMED'
  )
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
