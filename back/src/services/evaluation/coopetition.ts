import { SubmissionStatus } from '../../domain/enums.js'
import { toCsv } from '../../utils/csv.js'
import { encodeArchive } from '../archive/zipWriter.js'
import type { ArchiveInput } from '../archive/zipWriter.js'
import type { EvaluationStore } from '../store.js'
import { buildResultsCsv } from './resultsCsv.js'

const PHASE_HEADERS = [
  'participant_username',
  'submission_id',
  'when_made_public',
  'when_unmade_public',
  'started_at',
  'completed_at',
  'download_count',
  'submission_number',
  'like_count',
  'dislike_count'
] as const

const DOWNLOAD_HEADERS = ['submission_id', 'submission_owner', 'downloaded_by', 'time_of_download'] as const

export type CoopetitionRequest = {
  competitionId: string
  currentUsername: string
  generatedAt?: Date
}

/** Cross-submission statistics for every phase of a competition, as a zip for scoring programs. */
export const buildCoopetitionArchive = async (
  store: EvaluationStore,
  request: CoopetitionRequest
): Promise<Buffer> => {
  const phases = await store.listPhases(request.competitionId)
  const files: ArchiveInput = []

  for (const phase of phases) {
    const finished = (await store.listPhaseSubmissions(phase.phaseId)).filter(
      (submission) => submission.status === SubmissionStatus.FINISHED
    )
    files.push({
      name: `coopetition_phase_${phase.phaseNumber}.txt`,
      data: toCsv(
        PHASE_HEADERS,
        finished.map((submission) => [
          submission.participant.username,
          submission.submissionId,
          submission.whenMadePublic,
          submission.whenUnmadePublic,
          submission.startedAt,
          submission.completedAt,
          submission.downloadCount,
          submission.submissionNumber,
          submission.likeCount,
          submission.dislikeCount
        ])
      )
    })
  }

  for (const phase of phases) {
    files.push({
      name: `coopetition_scores_phase_${phase.phaseNumber}.txt`,
      data: await buildResultsCsv(store, phase, { includeScoresNotOnLeaderboard: true })
    })
  }

  const downloads = await store.listDownloads(request.competitionId)
  files.push(
    {
      name: 'coopetition_downloads.txt',
      data: toCsv(
        DOWNLOAD_HEADERS,
        downloads.map((record) => [
          record.submissionId,
          record.submissionOwner,
          record.downloadedBy,
          record.downloadedAt
        ])
      )
    },
    { name: 'current_user.txt', data: request.currentUsername }
  )

  return encodeArchive(files, request.generatedAt)
}
