import { SubmissionStatus } from './enums.js'
import type { StatusChange, Submission } from './submissions.js'

export const TERMINAL_STATUSES: ReadonlySet<SubmissionStatus> = new Set([
  SubmissionStatus.FINISHED,
  SubmissionStatus.FAILED,
  SubmissionStatus.CANCELLED
])

const ACTIVE: readonly SubmissionStatus[] = [SubmissionStatus.SUBMITTED, SubmissionStatus.RUNNING]

// Allowed source states for each target state.
const ALLOWED_SOURCES: Record<SubmissionStatus, readonly SubmissionStatus[]> = {
  [SubmissionStatus.SUBMITTED]: ACTIVE,
  [SubmissionStatus.RUNNING]: ACTIVE,
  [SubmissionStatus.FINISHED]: ACTIVE,
  [SubmissionStatus.FAILED]: ACTIVE,
  [SubmissionStatus.CANCELLED]: ACTIVE
}

export const isTerminal = (status: SubmissionStatus): boolean => TERMINAL_STATUSES.has(status)

export const canTransition = (from: SubmissionStatus, to: SubmissionStatus): boolean =>
  ALLOWED_SOURCES[to].includes(from)

export const planTransition = (
  current: Pick<Submission, 'status' | 'startedAt'>,
  next: SubmissionStatus,
  now: string
): StatusChange | null => {
  if (!canTransition(current.status, next)) {
    return null
  }

  return {
    status: next,
    ...(next === SubmissionStatus.RUNNING && !current.startedAt ? { startedAt: now } : {}),
    ...(isTerminal(next) ? { completedAt: now } : {})
  }
}
