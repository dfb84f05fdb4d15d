import { AppError, ErrorCodes } from '../utils/errors.js'

export type PhaseProgress =
  | { kind: 'not_started' }
  | { kind: 'predict_dispatched'; predictJobId: string }
  | { kind: 'score_dispatched'; scoreJobId: string; predictJobId?: string }

export type PipelinePhase = 'predict' | 'score'

type StoredExecutionKey = {
  predict?: string
  score?: string
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value)

const isStoredExecutionKey = (value: unknown): value is StoredExecutionKey => {
  if (!isRecord(value)) {
    return false
  }
  return (
    (value.predict === undefined || typeof value.predict === 'string') &&
    (value.score === undefined || typeof value.score === 'string')
  )
}

export const NOT_STARTED: PhaseProgress = { kind: 'not_started' }

export const parsePhaseProgress = (executionKey: string): PhaseProgress => {
  if (executionKey.trim().length === 0) {
    return NOT_STARTED
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(executionKey)
  } catch {
    throw new AppError(ErrorCodes.INVALID_EXECUTION_KEY, 'execution key is not valid JSON', 500, {
      executionKey
    })
  }

  if (!isStoredExecutionKey(parsed)) {
    throw new AppError(ErrorCodes.INVALID_EXECUTION_KEY, 'execution key has unexpected shape', 500, {
      executionKey
    })
  }

  if (parsed.score) {
    return {
      kind: 'score_dispatched',
      scoreJobId: parsed.score,
      ...(parsed.predict ? { predictJobId: parsed.predict } : {})
    }
  }
  if (parsed.predict) {
    return { kind: 'predict_dispatched', predictJobId: parsed.predict }
  }
  return NOT_STARTED
}

export const serializePhaseProgress = (progress: PhaseProgress): string => {
  switch (progress.kind) {
    case 'not_started':
      return ''
    case 'predict_dispatched':
      return JSON.stringify({ predict: progress.predictJobId })
    case 'score_dispatched':
      return JSON.stringify(
        progress.predictJobId
          ? { predict: progress.predictJobId, score: progress.scoreJobId }
          : { score: progress.scoreJobId }
      )
  }
}

export const hasGeneratedPredictions = (progress: PhaseProgress): boolean =>
  progress.kind === 'predict_dispatched' ||
  (progress.kind === 'score_dispatched' && progress.predictJobId !== undefined)

// Phases are only ever added: predict (optional) then score, each exactly once.
export const recordDispatch = (
  progress: PhaseProgress,
  phase: PipelinePhase,
  jobId: string
): PhaseProgress => {
  if (phase === 'predict') {
    if (progress.kind !== 'not_started') {
      throw new AppError(ErrorCodes.PHASE_ALREADY_DISPATCHED, 'predict phase already dispatched', 409, {
        progress: progress.kind
      })
    }
    return { kind: 'predict_dispatched', predictJobId: jobId }
  }

  if (progress.kind === 'score_dispatched') {
    throw new AppError(ErrorCodes.PHASE_ALREADY_DISPATCHED, 'score phase already dispatched', 409, {
      scoreJobId: progress.scoreJobId
    })
  }

  return {
    kind: 'score_dispatched',
    scoreJobId: jobId,
    ...(progress.kind === 'predict_dispatched' ? { predictJobId: progress.predictJobId } : {})
  }
}

const dispatchedJobs = (progress: PhaseProgress): Partial<Record<PipelinePhase, string>> => {
  switch (progress.kind) {
    case 'not_started':
      return {}
    case 'predict_dispatched':
      return { predict: progress.predictJobId }
    case 'score_dispatched':
      return progress.predictJobId
        ? { predict: progress.predictJobId, score: progress.scoreJobId }
        : { score: progress.scoreJobId }
  }
}

// Guard for persisted writes: a recorded phase may never be removed or re-pointed.
export const assertExecutionKeyGrows = (previous: string, next: string): void => {
  const before = dispatchedJobs(parsePhaseProgress(previous))
  const after = dispatchedJobs(parsePhaseProgress(next))
  for (const phase of ['predict', 'score'] as const) {
    const recorded = before[phase]
    if (recorded !== undefined && after[phase] !== recorded) {
      throw new AppError(ErrorCodes.INVALID_EXECUTION_KEY, 'execution key may not shrink', 409, {
        previous,
        next
      })
    }
  }
}
