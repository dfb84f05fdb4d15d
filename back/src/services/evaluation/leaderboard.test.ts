import { describe, expect, it } from 'vitest'
import { ScoreSorting } from '../../domain/enums.js'
import { buildCompetition, buildPhase, buildScoreDef, buildSubmission } from '../../testing/fixtures.js'
import { MemoryStore } from '../../testing/memoryStore.js'
import { decidePromotion, LeaderboardPromoter } from './leaderboard.js'
import type { PromotionInput } from './leaderboard.js'

const bestOnly = (
  sorting: ScoreSorting,
  submissionValue: number,
  phaseValues: number[]
): PromotionInput => ({
  phase: { isBlind: false, forceBestSubmissionToLeaderboard: true },
  competition: { forceSubmissionToLeaderboard: false },
  defaultScoreDef: { sorting },
  submissionValue,
  phaseValues
})

describe('decidePromotion', () => {
  it('promotes a tie for best in ascending order', () => {
    expect(decidePromotion(bestOnly(ScoreSorting.ASC, 3.0, [3.0, 3.0]))).toEqual(['best_submission'])
  })

  it('promotes a tie for best in descending order', () => {
    expect(decidePromotion(bestOnly(ScoreSorting.DESC, 5.0, [5.0, 5.0]))).toEqual(['best_submission'])
  })

  it('does not promote a worse ascending score', () => {
    expect(decidePromotion(bestOnly(ScoreSorting.ASC, 4.0, [3.0, 4.0]))).toEqual([])
  })

  it('promotes blind and forced submissions unless best-only applies', () => {
    const base = {
      defaultScoreDef: null,
      submissionValue: undefined,
      phaseValues: []
    }
    expect(
      decidePromotion({
        ...base,
        phase: { isBlind: true, forceBestSubmissionToLeaderboard: false },
        competition: { forceSubmissionToLeaderboard: true }
      })
    ).toEqual(['blind_phase', 'forced_submission'])
    expect(
      decidePromotion({
        ...base,
        phase: { isBlind: true, forceBestSubmissionToLeaderboard: true },
        competition: { forceSubmissionToLeaderboard: true }
      })
    ).toEqual([])
  })
})

describe('LeaderboardPromoter', () => {
  it('adds a submission once however often it is evaluated', async () => {
    const store = new MemoryStore()
    const competition = buildCompetition({ forceSubmissionToLeaderboard: true })
    const phase = buildPhase()
    store.scoreDefs.push(buildScoreDef())
    const submission = buildSubmission()
    await store.saveScore({ submissionId: 'sub_1', phaseId: 'phase_1', scoreDefId: 'def_accuracy', value: 0.9 })

    const promoter = new LeaderboardPromoter(store)
    await promoter.promote(submission, phase, competition)
    await promoter.promote(submission, phase, competition)

    expect(await store.listLeaderboard('phase_1')).toEqual([
      { phaseId: 'phase_1', submissionId: 'sub_1', addedAt: '2026-01-01T00:00:00.000Z' }
    ])
  })

  it('compares against every recorded score of the default definition', async () => {
    const store = new MemoryStore()
    store.scoreDefs.push(buildScoreDef({ sorting: ScoreSorting.DESC }))
    await store.saveScore({ submissionId: 'sub_0', phaseId: 'phase_1', scoreDefId: 'def_accuracy', value: 0.95 })
    await store.saveScore({ submissionId: 'sub_1', phaseId: 'phase_1', scoreDefId: 'def_accuracy', value: 0.9 })

    const reasons = await new LeaderboardPromoter(store).promote(
      buildSubmission(),
      buildPhase({ forceBestSubmissionToLeaderboard: true }),
      buildCompetition()
    )

    expect(reasons).toEqual([])
    expect(store.leaderboardWrites).toBe(0)
  })
})
