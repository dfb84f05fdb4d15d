import type { Submission } from '../../domain/submissions.js'
import { AppError, ErrorCodes } from '../../utils/errors.js'
import type { EvaluationStore } from '../store.js'
import { publishMessage } from '../tasks.service.js'
import type { TaskQueue } from '../tasks.service.js'

export type RerunResult = {
  phaseId: string
  submissionIds: string[]
}

// One submission per distinct uploaded file; the earliest one wins.
export const dedupeByFile = (submissions: readonly Submission[]): Submission[] => {
  const seen = new Set<string>()
  return submissions.filter((submission) => {
    const key = submission.files.file ?? ''
    if (seen.has(key)) {
      return false
    }
    seen.add(key)
    return true
  })
}

export class PhaseRerunner {
  private readonly store: EvaluationStore
  private readonly queue: TaskQueue

  constructor(deps: { store: EvaluationStore; queue: TaskQueue }) {
    this.store = deps.store
    this.queue = deps.queue
  }

  async rerunPhase(phaseId: string): Promise<RerunResult> {
    const phase = await this.store.getPhase(phaseId)
    if (!phase) {
      throw new AppError(ErrorCodes.PHASE_NOT_FOUND, 'phase not found', 404, { phaseId })
    }

    const originals = dedupeByFile(await this.store.listPhaseSubmissions(phaseId))
    const submissionIds: string[] = []

    for (const original of originals) {
      const copy = await this.store.createSubmission({
        competitionId: original.competitionId,
        phaseId: original.phaseId,
        participant: original.participant,
        files: original.files.file ? { file: original.files.file } : {},
        ...(original.dockerImage ? { dockerImage: original.dockerImage } : {})
      })
      await publishMessage(this.queue, {
        type: 'evaluate',
        body: { submission_id: copy.submissionId, is_scoring_only: phase.isScoringOnly }
      })
      submissionIds.push(copy.submissionId)
    }

    console.info(
      JSON.stringify({
        event: 'phase_rerun_enqueued',
        phaseId,
        source: originals.length,
        submissionIds
      })
    )
    return { phaseId, submissionIds }
  }
}
