import { ScoreSorting } from '../../domain/enums.js'
import type { Submission } from '../../domain/submissions.js'
import type { Competition, Phase, ScoreDef } from '../../domain/types.js'
import { getDefaultScoreDef } from '../store.js'
import type { EvaluationStore } from '../store.js'

export type PromotionReason = 'blind_phase' | 'forced_submission' | 'best_submission'

export type PromotionInput = {
  phase: Pick<Phase, 'isBlind' | 'forceBestSubmissionToLeaderboard'>
  competition: Pick<Competition, 'forceSubmissionToLeaderboard'>
  defaultScoreDef: Pick<ScoreDef, 'sorting'> | null
  // Undefined when the submission recorded no value for the default definition.
  submissionValue: number | undefined
  // Every recorded value for the default definition in this phase, this submission's included.
  phaseValues: readonly number[]
}

export const isAtLeastAsGood = (
  sorting: ScoreSorting,
  value: number,
  phaseValues: readonly number[]
): boolean => {
  if (phaseValues.length === 0) {
    return true
  }
  return sorting === ScoreSorting.ASC
    ? value <= Math.min(...phaseValues)
    : value >= Math.max(...phaseValues)
}

// Clauses are checked in order and each one may fire; ties promote.
export const decidePromotion = (input: PromotionInput): PromotionReason[] => {
  const reasons: PromotionReason[] = []
  const bestOnly = input.phase.forceBestSubmissionToLeaderboard

  if (input.phase.isBlind && !bestOnly) {
    reasons.push('blind_phase')
  }
  if (input.competition.forceSubmissionToLeaderboard && !bestOnly) {
    reasons.push('forced_submission')
  }
  if (
    bestOnly &&
    input.defaultScoreDef &&
    input.submissionValue !== undefined &&
    isAtLeastAsGood(input.defaultScoreDef.sorting, input.submissionValue, input.phaseValues)
  ) {
    reasons.push('best_submission')
  }

  return reasons
}

export class LeaderboardPromoter {
  private readonly store: EvaluationStore

  constructor(store: EvaluationStore) {
    this.store = store
  }

  async promote(submission: Submission, phase: Phase, competition: Competition): Promise<PromotionReason[]> {
    const defaultScoreDef = getDefaultScoreDef(await this.store.listScoreDefs(competition.competitionId))
    const phaseScores = defaultScoreDef
      ? await this.store.listPhaseScores(phase.phaseId, defaultScoreDef.scoreDefId)
      : []

    const reasons = decidePromotion({
      phase,
      competition,
      defaultScoreDef,
      submissionValue: phaseScores.find((score) => score.submissionId === submission.submissionId)?.value,
      phaseValues: phaseScores.map((score) => score.value)
    })

    if (reasons.length > 0) {
      await this.store.addToLeaderboard(phase.phaseId, submission.submissionId)
    }

    console.info(
      JSON.stringify({
        event: 'leaderboard_evaluated',
        submissionId: submission.submissionId,
        phaseId: phase.phaseId,
        promoted: reasons.length > 0,
        reasons
      })
    )
    return reasons
  }
}
