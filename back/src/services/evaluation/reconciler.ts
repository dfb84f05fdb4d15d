import type { CallbackExtra } from 'shared'
import { CallbackStatus, JobStatus, SubmissionStatus, TaskType } from '../../domain/enums.js'
import { parsePhaseProgress } from '../../domain/phaseProgress.js'
import type { PhaseProgress } from '../../domain/phaseProgress.js'
import type { Submission } from '../../domain/submissions.js'
import type { Job } from '../../domain/types.js'
import { AppError, ErrorCodes, SubmissionUpdateError, errorMessage, isAppError } from '../../utils/errors.js'
import { secretsMatch } from '../../utils/security.js'
import { decodeResultBundle, findBundleEntry } from '../archive/resultBundle.js'
import type { Notifier } from '../notifier.js'
import type { StorageBackend } from '../storage.service.js'
import type { EvaluationStore } from '../store.js'
import type { LeaderboardPromoter } from './leaderboard.js'
import type { EvaluationOrchestrator } from './orchestrator.js'
import { SCORES_FILE_NAME, parseScoresFile } from './scores.js'
import type { SubmissionStatusService } from './submissionStatus.service.js'

export type CallbackInput = {
  jobId: string
  status: string
  secret: string
  extra?: CallbackExtra
}

export type CallbackOutcome = {
  jobId: string
  submissionId: string
  jobStatus: JobStatus
  error?: string
}

type ReconcilerDeps = {
  store: EvaluationStore
  storage: StorageBackend
  status: SubmissionStatusService
  orchestrator: EvaluationOrchestrator
  promoter: LeaderboardPromoter
  notifier: Notifier
  siteUrl: string
  fromEmail: string
}

/** Applies worker status callbacks to submissions. */
export class ResultReconciler {
  private readonly deps: ReconcilerDeps

  constructor(deps: ReconcilerDeps) {
    this.deps = deps
  }

  async handleCallback(input: CallbackInput): Promise<CallbackOutcome> {
    const job = await this.requireEvaluationJob(input.jobId)
    const submissionId = job.taskArgs.submissionId
    const submission = await this.deps.store.getSubmission(submissionId)
    if (!submission) {
      throw new AppError(ErrorCodes.SUBMISSION_NOT_FOUND, 'submission not found', 404, {
        jobId: job.jobId,
        submissionId
      })
    }

    if (!secretsMatch(input.secret, submission.secret)) {
      console.error(
        JSON.stringify({
          event: 'callback_secret_mismatch',
          jobId: job.jobId,
          submissionId,
          status: input.status
        })
      )
      throw new AppError(ErrorCodes.AUTHENTICATION_MISMATCH, 'secret does not match', 403, {
        jobId: job.jobId
      })
    }

    let outcome: CallbackOutcome
    try {
      const jobStatus = await this.applyUpdate(job, submission, input)
      outcome = { jobId: job.jobId, submissionId, jobStatus }
    } catch (error) {
      if (!(error instanceof SubmissionUpdateError)) {
        throw error
      }
      outcome = await this.forceFailed(job, error)
    }

    await this.deps.store.setJobStatus(job.jobId, outcome.jobStatus)
    return outcome
  }

  private async requireEvaluationJob(jobId: string): Promise<Job> {
    const job = await this.deps.store.getJob(jobId)
    if (!job) {
      throw new AppError(ErrorCodes.JOB_NOT_FOUND, 'job not found', 404, { jobId })
    }
    if (job.taskType !== TaskType.EVALUATE_SUBMISSION) {
      throw new AppError(ErrorCodes.INVALID_JOB, 'job has incorrect task type', 422, {
        jobId,
        taskType: job.taskType
      })
    }
    return job
  }

  private async applyUpdate(job: Job, submission: Submission, input: CallbackInput): Promise<JobStatus> {
    try {
      const progress = parsePhaseProgress(submission.executionKey)
      const metadata = input.extra?.metadata
      if (metadata && Object.keys(metadata).length > 0) {
        await this.deps.store.upsertSubmissionMetadata(
          submission.submissionId,
          progress.kind === 'score_dispatched' ? 'score' : 'predict',
          metadata
        )
      }

      switch (input.status) {
        case CallbackStatus.RUNNING:
          await this.deps.status.transition(submission.submissionId, SubmissionStatus.RUNNING)
          return JobStatus.RUNNING
        case CallbackStatus.FINISHED:
          if (progress.kind !== 'score_dispatched') {
            return await this.continueWithScoring(job, submission, progress)
          }
          if (job.jobId === progress.predictJobId) {
            console.info(
              JSON.stringify({
                event: 'callback_stale',
                jobId: job.jobId,
                submissionId: submission.submissionId,
                scoreJobId: progress.scoreJobId
              })
            )
            return JobStatus.FINISHED
          }
          return await this.completeScoring(job, submission)
        default:
          return await this.markFailed(job, submission, input)
      }
    } catch (error) {
      console.error(
        JSON.stringify({
          event: 'submission_update_failed',
          jobId: job.jobId,
          submissionId: submission.submissionId,
          status: input.status,
          message: errorMessage(error)
        })
      )
      throw new SubmissionUpdateError(submission.submissionId, error)
    }
  }

  // A failed scoring dispatch after a good prediction run is recorded and made terminal.
  private async continueWithScoring(
    job: Job,
    submission: Submission,
    progress: PhaseProgress
  ): Promise<JobStatus> {
    try {
      const scoreJobId = await this.deps.orchestrator.continueWithScoring(submission.submissionId)
      console.info(
        JSON.stringify({
          event: 'score_phase_dispatched',
          submissionId: submission.submissionId,
          predictJobId: job.jobId,
          scoreJobId,
          previous: progress.kind
        })
      )
      return JobStatus.FINISHED
    } catch (error) {
      // A concurrent duplicate of this callback already claimed the score phase.
      if (isAppError(error) && error.code === ErrorCodes.PHASE_ALREADY_DISPATCHED) {
        console.info(
          JSON.stringify({
            event: 'callback_stale',
            jobId: job.jobId,
            submissionId: submission.submissionId,
            reason: 'score phase already claimed'
          })
        )
        return JobStatus.FINISHED
      }

      const message = errorMessage(error)
      console.error(
        JSON.stringify({
          event: 'score_phase_dispatch_failed',
          submissionId: submission.submissionId,
          jobId: job.jobId,
          message
        })
      )
      await this.deps.store.patchSubmission(submission.submissionId, () => ({
        exceptionDetails: `score phase dispatch failed: ${message}`
      }))
      await this.deps.status.transition(submission.submissionId, SubmissionStatus.FAILED)
      return JobStatus.FAILED
    }
  }

  private async completeScoring(job: Job, submission: Submission): Promise<JobStatus> {
    const output = submission.files.output
    const bundle = output ? decodeResultBundle(await this.deps.storage.read(output)) : []
    const scoresEntry = findBundleEntry(bundle, SCORES_FILE_NAME)
    if (!scoresEntry) {
      console.error(
        JSON.stringify({
          event: 'scores_file_missing',
          jobId: job.jobId,
          submissionId: submission.submissionId
        })
      )
      await this.deps.status.transition(submission.submissionId, SubmissionStatus.FAILED)
      return JobStatus.FAILED
    }

    for (const line of parseScoresFile(scoresEntry.data.toString('utf8'))) {
      const scoreDef = await this.deps.store.findScoreDef(submission.competitionId, line.label)
      if (!scoreDef) {
        console.warn(
          JSON.stringify({
            event: 'score_label_unknown',
            submissionId: submission.submissionId,
            label: line.label
          })
        )
        continue
      }

      await this.deps.store.saveScore({
        submissionId: submission.submissionId,
        phaseId: submission.phaseId,
        scoreDefId: scoreDef.scoreDefId,
        value: line.value
      })
    }

    const result = await this.deps.status.transition(submission.submissionId, SubmissionStatus.FINISHED)
    if (!result.applied) {
      return JobStatus.FINISHED
    }

    const { phase, competition } = await this.deps.orchestrator.loadContext(submission)
    await this.deps.promoter.promote(submission, phase, competition)

    const participant = submission.participant
    if (participant.emailOnSubmissionFinished && participant.email) {
      await this.deps.notifier.submissionFinished({
        to: participant.email,
        from: this.deps.fromEmail,
        competitionTitle: competition.title,
        competitionUrl: `${this.deps.siteUrl}/competitions/${competition.competitionId}`,
        submissionNumber: submission.submissionNumber
      })
    }
    return JobStatus.FINISHED
  }

  private async markFailed(job: Job, submission: Submission, input: CallbackInput): Promise<JobStatus> {
    if (input.status !== CallbackStatus.FAILED) {
      console.warn(
        JSON.stringify({
          event: 'callback_status_invalid',
          jobId: job.jobId,
          submissionId: submission.submissionId,
          status: input.status
        })
      )
    }

    const traceback = input.extra?.traceback
    if (traceback) {
      await this.deps.store.patchSubmission(submission.submissionId, () => ({ exceptionDetails: traceback }))
    }

    await this.deps.status.transition(submission.submissionId, SubmissionStatus.FAILED)
    return JobStatus.FAILED
  }

  private async forceFailed(job: Job, error: SubmissionUpdateError): Promise<CallbackOutcome> {
    await this.deps.status.transition(error.submissionId, SubmissionStatus.FAILED)
    return {
      jobId: job.jobId,
      submissionId: error.submissionId,
      jobStatus: JobStatus.FAILED,
      error: error.message
    }
  }
}
