import { describe, expect, it } from 'vitest'
import { ScoreSorting, SubmissionStatus } from '../../domain/enums.js'
import { buildPhase, buildScoreDef, buildSubmission } from '../../testing/fixtures.js'
import { MemoryStore } from '../../testing/memoryStore.js'
import { buildResultsCsv } from './resultsCsv.js'

const seed = async () => {
  const store = new MemoryStore()
  store.scoreDefs.push(
    buildScoreDef({ scoreDefId: 'def_rmse', key: 'rmse', sorting: ScoreSorting.ASC, ordering: 1, selectionDefault: true }),
    buildScoreDef({ scoreDefId: 'def_time', key: 'time', ordering: 2, selectionDefault: false })
  )

  const submissions = [
    buildSubmission({ submissionId: 'sub_a', status: SubmissionStatus.FINISHED, submittedAt: '2026-01-01T00:00:01Z' }),
    buildSubmission({
      submissionId: 'sub_b',
      status: SubmissionStatus.FINISHED,
      submissionNumber: 2,
      submittedAt: '2026-01-01T00:00:02Z',
      participant: { participantId: 'part_2', username: 'bob, jr', emailOnSubmissionFinished: false }
    }),
    buildSubmission({ submissionId: 'sub_c', status: SubmissionStatus.FAILED, submittedAt: '2026-01-01T00:00:03Z' })
  ]
  for (const submission of submissions) store.addSubmission(submission)

  await store.saveScore({ submissionId: 'sub_a', phaseId: 'phase_1', scoreDefId: 'def_rmse', value: 0.4 })
  await store.saveScore({ submissionId: 'sub_a', phaseId: 'phase_1', scoreDefId: 'def_time', value: 12 })
  await store.saveScore({ submissionId: 'sub_b', phaseId: 'phase_1', scoreDefId: 'def_rmse', value: 0.2 })
  await store.saveScore({ submissionId: 'sub_c', phaseId: 'phase_1', scoreDefId: 'def_rmse', value: 0.1 })
  return store
}

describe('buildResultsCsv', () => {
  it('lists leaderboard entries only by default', async () => {
    const store = await seed()
    await store.addToLeaderboard('phase_1', 'sub_a')

    expect(await buildResultsCsv(store, buildPhase())).toBe(
      'submission_id,username,submission_number,rmse,time\r\nsub_a,alice,1,0.4,12\r\n'
    )
  })

  it('includes every finished scored submission, best first', async () => {
    const store = await seed()

    expect(await buildResultsCsv(store, buildPhase(), { includeScoresNotOnLeaderboard: true })).toBe(
      'submission_id,username,submission_number,rmse,time\r\n' +
        'sub_b,"bob, jr",2,0.2,\r\n' +
        'sub_a,alice,1,0.4,12\r\n'
    )
  })
})
