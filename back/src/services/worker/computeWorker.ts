import type { RunEnvelope, RunTaskArgs, WorkerCallbackRequest } from 'shared'
import { errorMessage } from '../../utils/errors.js'
import { resolveSoftTimeLimit } from '../evaluation/dispatcher.js'

export type ExecuteRun = (jobId: string, taskArgs: RunTaskArgs) => Promise<void>
export type ReportStatus = (jobId: string, body: WorkerCallbackRequest) => Promise<void>

export type ComputeTaskOutcome = 'completed' | 'timed_out'

type ComputeTaskDeps = {
  execute: ExecuteRun
  report: ReportStatus
}

/**
 * Worker side of a run: executes it under the soft time limit and reports
 * `failed` for the job when the limit is exceeded. The run itself is not killed.
 */
export const runComputeTask = async (
  envelope: RunEnvelope,
  deps: ComputeTaskDeps
): Promise<ComputeTaskOutcome> => {
  const limitSeconds = resolveSoftTimeLimit(envelope.task_args.execution_time_limit)
  let timer: NodeJS.Timeout | undefined

  const timeout = new Promise<'timed_out'>((resolve) => {
    timer = setTimeout(() => resolve('timed_out'), limitSeconds * 1000)
  })
  const run = deps.execute(envelope.id, envelope.task_args).then((): 'completed' => 'completed')

  try {
    const outcome = await Promise.race([run, timeout])
    if (outcome === 'timed_out') {
      console.warn(
        JSON.stringify({
          event: 'compute_soft_time_limit_exceeded',
          jobId: envelope.id,
          submissionId: envelope.task_args.submission_id,
          limitSeconds
        })
      )
      void run.catch((error: unknown) => {
        console.error(
          JSON.stringify({
            event: 'compute_run_failed_after_time_limit',
            jobId: envelope.id,
            message: errorMessage(error)
          })
        )
      })
      await deps.report(envelope.id, { status: 'failed', secret: envelope.task_args.secret })
    }
    return outcome
  } finally {
    clearTimeout(timer)
  }
}
