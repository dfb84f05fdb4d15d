export type ApiError = {
  error: {
    code: string
    message: string
    details?: Record<string, unknown>
  }
}

export type CallbackStatus = 'running' | 'finished' | 'failed'

export type SubmissionStatus = 'SUBMITTED' | 'RUNNING' | 'FINISHED' | 'FAILED' | 'CANCELLED'

export type MetadataValue = string | number | boolean | null

export type CallbackExtra = {
  traceback?: string
  metadata?: Record<string, MetadataValue>
}

// Body a compute worker posts to /v1/jobs/:jobId/status.
export type WorkerCallbackRequest = {
  status: string
  secret: string
  extra?: CallbackExtra
}

export type WorkerCallbackResponse = {
  accepted: true
  job_id: string
}

export type RunTaskArgs = {
  submission_id: string
  docker_image: string
  bundle_url: string
  stdout_url: string
  stderr_url: string
  output_url: string
  detailed_results_url: string
  private_output_url: string
  secret: string
  execution_time_limit: number
  predict: boolean
}

export type RunEnvelope = {
  id: string
  task_type: 'run'
  task_args: RunTaskArgs
}

export type SubmissionUpdateTaskBody = {
  job_id: string
  status: string
  secret: string
  extra?: CallbackExtra
}

export type EvaluateTaskBody = {
  submission_id: string
  is_scoring_only: boolean
}

export type RerunPhaseTaskBody = {
  phase_id: string
}

export type TaskAcceptedResponse =
  | {
      accepted: true
      job_id?: string
      submission_id?: string
      status?: string
    }
  | {
      accepted: false
      reason: string
    }

export type CancelSubmissionResponse = {
  submission_id: string
  status: SubmissionStatus
  applied: boolean
}

export type RunManifestKey = 'program' | 'input' | 'stdout' | 'stderr' | 'private_output' | 'output'

export type InputManifestKey =
  | 'ref'
  | 'res'
  | 'history'
  | 'scores'
  | 'coopetition'
  | 'submitted-by'
  | 'submitted-at'
  | 'competition-submission'
  | 'competition-phase'
  | 'automatic-submission'
