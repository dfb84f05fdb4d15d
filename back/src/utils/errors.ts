import type { ContentfulStatusCode } from 'hono/utils/http-status'

export const ErrorCodes = {
  INVALID_INPUT: 'INVALID_INPUT',
  UNAUTHORIZED: 'UNAUTHORIZED',
  RATE_LIMITED: 'RATE_LIMITED',
  SUBMISSION_NOT_FOUND: 'SUBMISSION_NOT_FOUND',
  PHASE_NOT_FOUND: 'PHASE_NOT_FOUND',
  COMPETITION_NOT_FOUND: 'COMPETITION_NOT_FOUND',
  JOB_NOT_FOUND: 'JOB_NOT_FOUND',
  INVALID_JOB: 'INVALID_JOB',
  PRECONDITION_MISSING: 'PRECONDITION_MISSING',
  AUTHENTICATION_MISMATCH: 'AUTHENTICATION_MISMATCH',
  MALFORMED_RESULT: 'MALFORMED_RESULT',
  DISPATCH_FAILED: 'DISPATCH_FAILED',
  INVALID_EXECUTION_KEY: 'INVALID_EXECUTION_KEY',
  PHASE_ALREADY_DISPATCHED: 'PHASE_ALREADY_DISPATCHED',
  ZIP_CORRUPTED: 'ZIP_CORRUPTED',
  STORAGE_NOT_FOUND: 'STORAGE_NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR'
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes] | (string & {})

export type ErrorPayload = {
  error: {
    code: ErrorCode
    message: string
    details?: Record<string, unknown>
  }
}

export const buildError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ErrorPayload => {
  if (details) {
    return { error: { code, message, details } }
  }

  return { error: { code, message } }
}

export class AppError extends Error {
  public readonly code: ErrorCode
  public readonly status: ContentfulStatusCode
  public readonly details?: Record<string, unknown>

  constructor(
    code: ErrorCode,
    message: string,
    status: ContentfulStatusCode = 500,
    details?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.status = status
    if (details) {
      this.details = details
    }
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError

// Raised while applying a callback to a submission that was already resolved.
export class SubmissionUpdateError extends Error {
  public readonly submissionId: string
  public readonly inner: unknown

  constructor(submissionId: string, inner: unknown) {
    super(errorMessage(inner))
    this.name = 'SubmissionUpdateError'
    this.submissionId = submissionId
    this.inner = inner
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'unknown'

export const toErrorResponse = (
  error: unknown,
  fallbackMessage = 'internal error'
): { status: ContentfulStatusCode; payload: ErrorPayload } => {
  if (isAppError(error)) {
    return {
      status: error.status,
      payload: buildError(error.code, error.message, error.details)
    }
  }

  return {
    status: 500,
    payload: buildError(ErrorCodes.INTERNAL_ERROR, fallbackMessage)
  }
}
