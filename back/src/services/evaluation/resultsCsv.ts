import { ScoreSorting, SubmissionStatus } from '../../domain/enums.js'
import type { Submission } from '../../domain/submissions.js'
import type { Phase, ScoreDef } from '../../domain/types.js'
import { toCsv } from '../../utils/csv.js'
import type { CsvCell } from '../../utils/csv.js'
import { getDefaultScoreDef } from '../store.js'
import type { EvaluationStore } from '../store.js'

export type ResultsCsvOptions = {
  includeScoresNotOnLeaderboard?: boolean
}

type ResultRow = {
  submission: Submission
  values: Map<string, number>
}

const compareRows = (defaultDef: ScoreDef | null) => (left: ResultRow, right: ResultRow): number => {
  if (defaultDef) {
    const leftValue = left.values.get(defaultDef.scoreDefId)
    const rightValue = right.values.get(defaultDef.scoreDefId)
    if (leftValue !== undefined && rightValue === undefined) return -1
    if (leftValue === undefined && rightValue !== undefined) return 1
    if (leftValue !== undefined && rightValue !== undefined && leftValue !== rightValue) {
      return defaultDef.sorting === ScoreSorting.ASC ? leftValue - rightValue : rightValue - leftValue
    }
  }
  return left.submission.submittedAt.localeCompare(right.submission.submittedAt)
}

/**
 * Per-phase results table handed to scoring programs. By default only
 * leaderboard entries are listed.
 */
export const buildResultsCsv = async (
  store: EvaluationStore,
  phase: Phase,
  options: ResultsCsvOptions = {}
): Promise<string> => {
  const defs = await store.listScoreDefs(phase.competitionId)
  const submissions = await store.listPhaseSubmissions(phase.phaseId)
  const scores = await store.listPhaseScores(phase.phaseId)

  const valuesBySubmission = new Map<string, Map<string, number>>()
  for (const score of scores) {
    const values = valuesBySubmission.get(score.submissionId) ?? new Map<string, number>()
    values.set(score.scoreDefId, score.value)
    valuesBySubmission.set(score.submissionId, values)
  }

  let included: Submission[]
  if (options.includeScoresNotOnLeaderboard) {
    included = submissions.filter(
      (submission) =>
        submission.status === SubmissionStatus.FINISHED && valuesBySubmission.has(submission.submissionId)
    )
  } else {
    const onLeaderboard = new Set(
      (await store.listLeaderboard(phase.phaseId)).map((entry) => entry.submissionId)
    )
    included = submissions.filter((submission) => onLeaderboard.has(submission.submissionId))
  }

  const rows = included
    .map(
      (submission): ResultRow => ({
        submission,
        values: valuesBySubmission.get(submission.submissionId) ?? new Map<string, number>()
      })
    )
    .sort(compareRows(getDefaultScoreDef(defs)))

  const headers = ['submission_id', 'username', 'submission_number', ...defs.map((def) => def.key)]
  const cells = rows.map((row): CsvCell[] => [
    row.submission.submissionId,
    row.submission.participant.username,
    row.submission.submissionNumber,
    ...defs.map((def) => row.values.get(def.scoreDefId))
  ])

  return toCsv(headers, cells)
}
