import { describe, expect, it } from 'vitest'
import { SubmissionStatus } from '../../domain/enums.js'
import { buildPhase, buildSubmission } from '../../testing/fixtures.js'
import { MemoryStore } from '../../testing/memoryStore.js'
import { decodeResultBundle, findBundleEntry } from '../archive/resultBundle.js'
import { buildCoopetitionArchive } from './coopetition.js'

describe('buildCoopetitionArchive', () => {
  it('collects per-phase statistics, downloads and the current user', async () => {
    const store = new MemoryStore()
    store.phases.set('phase_1', buildPhase())
    store.phases.set('phase_2', buildPhase({ phaseId: 'phase_2', phaseNumber: 2 }))
    store.addSubmission(
      buildSubmission({
        status: SubmissionStatus.FINISHED,
        startedAt: '2026-01-01T00:00:00Z',
        completedAt: '2026-01-01T00:05:00Z',
        downloadCount: 4,
        likeCount: 2,
        dislikeCount: 1
      })
    )
    store.addSubmission(buildSubmission({ submissionId: 'sub_2', status: SubmissionStatus.RUNNING }))
    store.downloads.push({
      competitionId: 'comp_1',
      submissionId: 'sub_1',
      submissionOwner: 'alice',
      downloadedBy: 'bob',
      downloadedAt: '2026-01-02T00:00:00Z'
    })

    const bundle = decodeResultBundle(
      await buildCoopetitionArchive(store, { competitionId: 'comp_1', currentUsername: 'carol' })
    )

    expect(bundle.map((entry) => entry.name)).toEqual([
      'coopetition_phase_1.txt',
      'coopetition_phase_2.txt',
      'coopetition_scores_phase_1.txt',
      'coopetition_scores_phase_2.txt',
      'coopetition_downloads.txt',
      'current_user.txt'
    ])
    expect(findBundleEntry(bundle, 'coopetition_phase_1.txt')?.data.toString('utf8')).toBe(
      'participant_username,submission_id,when_made_public,when_unmade_public,started_at,completed_at,' +
        'download_count,submission_number,like_count,dislike_count\r\n' +
        'alice,sub_1,,,2026-01-01T00:00:00Z,2026-01-01T00:05:00Z,4,1,2,1\r\n'
    )
    expect(findBundleEntry(bundle, 'coopetition_downloads.txt')?.data.toString('utf8')).toBe(
      'submission_id,submission_owner,downloaded_by,time_of_download\r\nsub_1,alice,bob,2026-01-02T00:00:00Z\r\n'
    )
    expect(findBundleEntry(bundle, 'current_user.txt')?.data.toString('utf8')).toBe('carol')
  })
})
