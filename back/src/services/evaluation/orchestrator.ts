import { JobStatus, SubmissionStatus, TaskType } from '../../domain/enums.js'
import {
  hasGeneratedPredictions,
  parsePhaseProgress,
  recordDispatch,
  serializePhaseProgress
} from '../../domain/phaseProgress.js'
import type { PipelinePhase } from '../../domain/phaseProgress.js'
import type { Submission, SubmissionFiles } from '../../domain/submissions.js'
import { AppError, ErrorCodes, errorMessage } from '../../utils/errors.js'
import type { BundleComposer } from '../bundle/manifest.js'
import { placeholderText, submissionObjectPath } from '../bundle/paths.js'
import type { StorageBackend } from '../storage.service.js'
import type { EvaluationStore } from '../store.js'
import { publishMessage } from '../tasks.service.js'
import type { TaskQueue } from '../tasks.service.js'
import { buildCoopetitionArchive } from './coopetition.js'
import type { DispatchContext, Dispatcher } from './dispatcher.js'
import { buildResultsCsv } from './resultsCsv.js'
import type { SubmissionStatusService } from './submissionStatus.service.js'

const TEXT = 'text/plain; charset=utf-8'
const ZIP = 'application/zip'

export type EvaluationOutcome = {
  jobId: string
  submissionId: string
  phase: PipelinePhase
  dispatched: boolean
}

type OrchestratorDeps = {
  store: EvaluationStore
  storage: StorageBackend
  composer: BundleComposer
  dispatcher: Dispatcher
  status: SubmissionStatusService
  queue: TaskQueue
}

const requirePrecondition = (value: string | undefined, message: string, submission: Submission): string => {
  if (!value) {
    throw new AppError(ErrorCodes.PRECONDITION_MISSING, message, 422, {
      submissionId: submission.submissionId
    })
  }
  return value
}

export class EvaluationOrchestrator {
  private readonly store: EvaluationStore
  private readonly storage: StorageBackend
  private readonly composer: BundleComposer
  private readonly dispatcher: Dispatcher
  private readonly status: SubmissionStatusService
  private readonly queue: TaskQueue

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store
    this.storage = deps.storage
    this.composer = deps.composer
    this.dispatcher = deps.dispatcher
    this.status = deps.status
    this.queue = deps.queue
  }

  /**
   * Starts a submission's pipeline. A failed dispatch is turned into a `failed`
   * update for the same job so the submission still reaches a terminal state.
   */
  async evaluate(submissionId: string, isScoringOnly: boolean): Promise<EvaluationOutcome> {
    const job = await this.store.createJob(TaskType.EVALUATE_SUBMISSION, {
      submissionId,
      predict: !isScoringOnly
    })
    const submission = await this.requireSubmission(submissionId)
    const phase: PipelinePhase = isScoringOnly ? 'score' : 'predict'

    console.info(
      JSON.stringify({ event: 'evaluation_started', submissionId, jobId: job.jobId, phase })
    )

    try {
      const context = await this.loadContext(submission)
      if (phase === 'predict') {
        await this.predict(job.jobId, context)
      } else {
        await this.score(job.jobId, context)
      }
      return { jobId: job.jobId, submissionId, phase, dispatched: true }
    } catch (error) {
      console.error(
        JSON.stringify({
          event: 'evaluation_dispatch_failed',
          submissionId,
          jobId: job.jobId,
          phase,
          message: errorMessage(error)
        })
      )
      await this.reportDispatchFailure(job.jobId, submission, error)
      return { jobId: job.jobId, submissionId, phase, dispatched: false }
    }
  }

  // Second pipeline step after a successful prediction run; always under a fresh job.
  async continueWithScoring(submissionId: string): Promise<string> {
    const job = await this.store.createJob(TaskType.EVALUATE_SUBMISSION, {
      submissionId,
      predict: false
    })
    try {
      const submission = await this.requireSubmission(submissionId)
      await this.score(job.jobId, await this.loadContext(submission))
    } catch (error) {
      await this.store.setJobStatus(job.jobId, JobStatus.FAILED)
      throw error
    }
    return job.jobId
  }

  async predict(jobId: string, context: DispatchContext): Promise<void> {
    const { phase } = context
    const program = requirePrecondition(context.submission.files.file, 'program is missing', context.submission)
    const submission = await this.claimPhase(context.submission.submissionId, 'predict', jobId)

    const files: SubmissionFiles = {
      stdout: await this.saveText(submission, 'stdout', placeholderText('output', submission)),
      predictionStdout: await this.saveText(submission, 'predictionStdout', placeholderText('output', submission)),
      stderr: await this.saveText(submission, 'stderr', placeholderText('error', submission)),
      predictionStderr: await this.saveText(submission, 'predictionStderr', placeholderText('error', submission)),
      predictionOutput: await this.storage.save(
        submissionObjectPath(submission, 'predictionOutput'),
        Buffer.alloc(0),
        ZIP
      )
    }

    const manifest = await this.composer.composeRunManifest({
      program,
      input: phase.inputData,
      stdout: files.predictionStdout,
      stderr: files.predictionStderr
    })
    files.predictionRunfile = await this.saveText(submission, 'predictionRunfile', manifest)

    const updated = await this.store.patchSubmission(submission.submissionId, () => ({ files }))

    await this.dispatcher.dispatch(jobId, { ...context, submission: updated }, true)
    await this.status.transition(submission.submissionId, SubmissionStatus.SUBMITTED)
  }

  async score(jobId: string, context: DispatchContext): Promise<void> {
    const { phase, competition } = context
    const generatedPredictions = hasGeneratedPredictions(parsePhaseProgress(context.submission.executionKey))
    const resultsOf = (target: Submission) =>
      generatedPredictions ? target.files.predictionOutput : target.files.file

    requirePrecondition(phase.scoringProgram, 'program is missing', context.submission)
    requirePrecondition(resultsOf(context.submission), 'results are missing', context.submission)
    // Nothing is written for the phase until it is claimed; a concurrent duplicate stops here.
    const submission = await this.claimPhase(context.submission.submissionId, 'score', jobId)

    const files: SubmissionFiles = {
      history: await this.saveText(submission, 'history', ''),
      scores: await this.storage.save(
        submissionObjectPath(submission, 'scores'),
        await buildResultsCsv(this.store, phase),
        'text/csv; charset=utf-8'
      ),
      coopetition: await this.storage.save(
        submissionObjectPath(submission, 'coopetition'),
        await buildCoopetitionArchive(this.store, {
          competitionId: competition.competitionId,
          currentUsername: submission.participant.username
        }),
        ZIP
      )
    }

    const inputManifest = await this.composer.composeInputManifest({
      ref: phase.referenceData,
      res: resultsOf(submission),
      history: files.history,
      scores: files.scores,
      coopetition: files.coopetition,
      submittedBy: submission.participant.username,
      submittedAt: submission.submittedAt,
      submissionNumber: submission.submissionNumber,
      phaseNumber: phase.phaseNumber,
      automaticSubmission: await this.isAutomaticSubmission(context)
    })
    files.inputfile = await this.saveText(submission, 'inputfile', inputManifest)

    files.stdout = submission.files.stdout ?? submissionObjectPath(submission, 'stdout')
    files.stderr = submission.files.stderr ?? submissionObjectPath(submission, 'stderr')
    files.output = submissionObjectPath(submission, 'output')
    files.privateOutput = submissionObjectPath(submission, 'privateOutput')

    const runManifest = await this.composer.composeRunManifest({
      program: phase.scoringProgram,
      input: files.inputfile,
      stdout: files.stdout,
      stderr: files.stderr,
      privateOutput: files.privateOutput,
      output: files.output
    })
    files.runfile = await this.saveText(submission, 'runfile', runManifest)

    if (!generatedPredictions) {
      files.stdout = await this.saveText(submission, 'stdout', placeholderText('output', submission))
      files.stderr = await this.saveText(submission, 'stderr', placeholderText('error', submission))
    }

    files.output = await this.storage.save(files.output, Buffer.alloc(0), ZIP)
    files.privateOutput = await this.storage.save(files.privateOutput, Buffer.alloc(0), ZIP)
    files.detailedResults = await this.storage.save(
      submissionObjectPath(submission, 'detailedResults'),
      Buffer.alloc(0),
      ZIP
    )

    const updated = await this.store.patchSubmission(submission.submissionId, () => ({ files }))

    await this.dispatcher.dispatch(jobId, { ...context, submission: updated }, false)

    if (!generatedPredictions) {
      await this.status.transition(submission.submissionId, SubmissionStatus.SUBMITTED)
    }
  }

  async loadContext(submission: Submission): Promise<DispatchContext> {
    const phase = await this.store.getPhase(submission.phaseId)
    if (!phase) {
      throw new AppError(ErrorCodes.PHASE_NOT_FOUND, 'phase not found', 404, { phaseId: submission.phaseId })
    }
    const competition = await this.store.getCompetition(phase.competitionId)
    if (!competition) {
      throw new AppError(ErrorCodes.COMPETITION_NOT_FOUND, 'competition not found', 404, {
        competitionId: phase.competitionId
      })
    }
    return { submission, phase, competition }
  }

  // Falls back to failing the submission here when the update queue is unreachable too.
  private async reportDispatchFailure(jobId: string, submission: Submission, cause: unknown): Promise<void> {
    try {
      await publishMessage(this.queue, {
        type: 'submission_update',
        body: { job_id: jobId, status: 'failed', secret: submission.secret }
      })
    } catch (error) {
      console.error(
        JSON.stringify({
          event: 'evaluation_failure_report_failed',
          submissionId: submission.submissionId,
          jobId,
          message: errorMessage(error)
        })
      )
      await this.store.patchSubmission(submission.submissionId, () => ({
        exceptionDetails: `dispatch failed: ${errorMessage(cause)}`
      }))
      await this.status.transition(submission.submissionId, SubmissionStatus.FAILED)
      await this.store.setJobStatus(jobId, JobStatus.FAILED)
    }
  }

  // Records the phase's job in the execution key; throws PHASE_ALREADY_DISPATCHED if another job holds it.
  private claimPhase(submissionId: string, phase: PipelinePhase, jobId: string): Promise<Submission> {
    return this.store.patchSubmission(submissionId, (current) => ({
      executionKey: serializePhaseProgress(recordDispatch(parsePhaseProgress(current.executionKey), phase, jobId))
    }))
  }

  private async requireSubmission(submissionId: string): Promise<Submission> {
    const submission = await this.store.getSubmission(submissionId)
    if (!submission) {
      throw new AppError(ErrorCodes.SUBMISSION_NOT_FOUND, 'submission not found', 404, { submissionId })
    }
    return submission
  }

  // First submission by this participant in a phase that migrates submissions automatically.
  private async isAutomaticSubmission({ submission, phase }: DispatchContext): Promise<boolean> {
    if (!phase.autoMigration) {
      return false
    }
    const count = await this.store.countParticipantSubmissions(
      phase.phaseId,
      submission.participant.participantId
    )
    return count === 1
  }

  private saveText(
    submission: Submission,
    slot: Parameters<typeof submissionObjectPath>[1],
    content: string
  ): Promise<string> {
    return this.storage.save(submissionObjectPath(submission, slot), content, TEXT)
  }
}
