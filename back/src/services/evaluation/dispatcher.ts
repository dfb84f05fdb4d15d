import type { RunEnvelope } from 'shared'
import { SignPermission } from '../../domain/enums.js'
import type { Submission, SubmissionFiles } from '../../domain/submissions.js'
import type { Competition, Phase } from '../../domain/types.js'
import { AppError, ErrorCodes } from '../../utils/errors.js'
import type { SignedAccessProvider } from '../storage.service.js'
import { publishMessage } from '../tasks.service.js'
import type { TaskQueue } from '../tasks.service.js'

export const DEFAULT_SOFT_TIME_LIMIT_SECONDS = 600

export const resolveSoftTimeLimit = (executionTimeLimit: number | undefined): number =>
  executionTimeLimit !== undefined && Number.isFinite(executionTimeLimit) && executionTimeLimit > 0
    ? executionTimeLimit
    : DEFAULT_SOFT_TIME_LIMIT_SECONDS

export const resolveRoutingKey = (competition: Competition): string | undefined => {
  const queueId = competition.queue?.queueId.trim()
  return queueId ? queueId : undefined
}

type RunFiles = {
  bundle?: string
  stdout?: string
  stderr?: string
  output?: string
}

export const selectRunFiles = (files: SubmissionFiles, isPrediction: boolean): RunFiles => {
  const selected = isPrediction
    ? {
        bundle: files.predictionRunfile,
        stdout: files.predictionStdout,
        stderr: files.predictionStderr,
        output: files.predictionOutput
      }
    : { bundle: files.runfile, stdout: files.stdout, stderr: files.stderr, output: files.output }

  return {
    ...(selected.bundle ? { bundle: selected.bundle } : {}),
    ...(selected.stdout ? { stdout: selected.stdout } : {}),
    ...(selected.stderr ? { stderr: selected.stderr } : {}),
    ...(selected.output ? { output: selected.output } : {})
  }
}

export type DispatchContext = {
  submission: Submission
  phase: Phase
  competition: Competition
}

type DispatcherDeps = {
  queue: TaskQueue
  access: SignedAccessProvider
  defaultDockerImage: string
}

/** Hands one run to the compute queue; wall-clock limits are left to the worker. */
export class Dispatcher {
  private readonly queue: TaskQueue
  private readonly access: SignedAccessProvider
  private readonly defaultDockerImage: string

  constructor(deps: DispatcherDeps) {
    this.queue = deps.queue
    this.access = deps.access
    this.defaultDockerImage = deps.defaultDockerImage
  }

  async dispatch(jobId: string, context: DispatchContext, isPrediction: boolean): Promise<RunEnvelope> {
    const { submission, phase, competition } = context
    const files = selectRunFiles(submission.files, isPrediction)

    const bundleUrl = await this.access.sign(files.bundle, SignPermission.READ)
    if (!bundleUrl) {
      throw new AppError(ErrorCodes.PRECONDITION_MISSING, 'run bundle is missing', 422, {
        submissionId: submission.submissionId,
        predict: isPrediction
      })
    }

    const executionTimeLimit = resolveSoftTimeLimit(phase.executionTimeLimit)
    const envelope: RunEnvelope = {
      id: jobId,
      task_type: 'run',
      task_args: {
        submission_id: submission.submissionId,
        docker_image: submission.dockerImage || this.defaultDockerImage,
        bundle_url: bundleUrl,
        stdout_url: await this.access.sign(files.stdout, SignPermission.WRITE),
        stderr_url: await this.access.sign(files.stderr, SignPermission.WRITE),
        output_url: await this.access.sign(files.output, SignPermission.WRITE),
        detailed_results_url: await this.access.sign(submission.files.detailedResults, SignPermission.WRITE),
        private_output_url: await this.access.sign(submission.files.privateOutput, SignPermission.WRITE),
        secret: submission.secret,
        execution_time_limit: executionTimeLimit,
        predict: isPrediction
      }
    }

    const routingKey = resolveRoutingKey(competition)
    const taskName = await publishMessage(
      this.queue,
      { type: 'run', envelope },
      {
        softTimeLimitSeconds: executionTimeLimit,
        ...(routingKey ? { routingKey } : {})
      }
    )

    console.info(
      JSON.stringify({
        event: 'run_dispatched',
        submissionId: submission.submissionId,
        jobId,
        predict: isPrediction,
        executionTimeLimit,
        routingKey: routingKey ?? null,
        taskName
      })
    )
    return envelope
  }
}
