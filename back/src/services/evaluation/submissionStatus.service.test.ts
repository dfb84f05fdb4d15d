import { describe, expect, it, vi } from 'vitest'
import { SubmissionStatus } from '../../domain/enums.js'
import { buildSubmission } from '../../testing/fixtures.js'
import { loggedEvents } from '../../testing/harness.js'
import { MemoryStore } from '../../testing/memoryStore.js'
import { SubmissionStatusService } from './submissionStatus.service.js'

const NOW = new Date('2026-02-01T10:00:00.000Z')

describe('SubmissionStatusService', () => {
  it('stamps times and latches terminal states', async () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const store = new MemoryStore()
    store.addSubmission(buildSubmission())
    const service = new SubmissionStatusService(store, () => NOW)

    await service.transition('sub_1', SubmissionStatus.RUNNING)
    await service.cancel('sub_1')
    const late = await service.transition('sub_1', SubmissionStatus.FINISHED)

    expect(late).toEqual({
      submissionId: 'sub_1',
      previous: SubmissionStatus.CANCELLED,
      current: SubmissionStatus.CANCELLED,
      applied: false
    })
    expect(await store.getSubmission('sub_1')).toMatchObject({
      status: SubmissionStatus.CANCELLED,
      startedAt: NOW.toISOString(),
      completedAt: NOW.toISOString()
    })
    expect(loggedEvents(info.mock.calls)).toEqual([
      {
        event: 'submission_transition_ignored',
        submissionId: 'sub_1',
        current: SubmissionStatus.CANCELLED,
        requested: SubmissionStatus.FINISHED
      }
    ])
  })

  it('serialises concurrent transitions on one submission', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    const store = new MemoryStore()
    store.addSubmission(buildSubmission())
    const service = new SubmissionStatusService(store, () => NOW)

    const results = await Promise.all([
      service.transition('sub_1', SubmissionStatus.FINISHED),
      service.transition('sub_1', SubmissionStatus.FAILED),
      service.transition('sub_1', SubmissionStatus.RUNNING)
    ])

    expect(results.map((result) => result.applied)).toEqual([true, false, false])
    expect((await store.getSubmission('sub_1'))?.status).toBe(SubmissionStatus.FINISHED)
  })
})
