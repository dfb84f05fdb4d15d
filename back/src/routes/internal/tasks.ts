import type { Hono } from 'hono'
import type { EvaluateTaskBody, RerunPhaseTaskBody, TaskAcceptedResponse } from 'shared'
import type { Runtime } from '../../runtime.js'
import { buildError, ErrorCodes } from '../../utils/errors.js'
import { isRecord, parseCallbackFields, readRequiredString } from '../parsers.js'
import type { Parsed } from '../parsers.js'
import { getRequestId, respondToTaskError } from './respond.js'

const parseEvaluateBody = (value: unknown): Parsed<EvaluateTaskBody> => {
  if (!isRecord(value)) {
    return { ok: false, message: 'request body must be an object' }
  }
  const submissionId = readRequiredString(value, 'submission_id')
  if (!submissionId.ok) return submissionId
  if (typeof value.is_scoring_only !== 'boolean') {
    return { ok: false, message: 'is_scoring_only must be a boolean' }
  }
  return { ok: true, value: { submission_id: submissionId.value, is_scoring_only: value.is_scoring_only } }
}

const parseRerunBody = (value: unknown): Parsed<RerunPhaseTaskBody> => {
  if (!isRecord(value)) {
    return { ok: false, message: 'request body must be an object' }
  }
  const phaseId = readRequiredString(value, 'phase_id')
  if (!phaseId.ok) return phaseId
  return { ok: true, value: { phase_id: phaseId.value } }
}

const readJson = async (read: () => Promise<unknown>): Promise<unknown> => read().catch(() => null)

export const registerTaskRoutes = (app: Hono, runtime: Runtime) => {
  app.post('/tasks/evaluate', async (c) => {
    const parsed = parseEvaluateBody(await readJson(() => c.req.json()))
    if (!parsed.ok) {
      return c.json(buildError(ErrorCodes.INVALID_INPUT, parsed.message), 400)
    }

    const requestId = getRequestId(c.req.header('x-cloudtasks-taskname'))
    const submissionId = parsed.value.submission_id
    try {
      const outcome = await runtime.orchestrator.evaluate(submissionId, parsed.value.is_scoring_only)
      console.info(
        JSON.stringify({
          event: 'evaluate_task_completed',
          requestId,
          submissionId,
          jobId: outcome.jobId,
          dispatched: outcome.dispatched
        })
      )
      const response: TaskAcceptedResponse = {
        accepted: true,
        job_id: outcome.jobId,
        submission_id: submissionId
      }
      return c.json(response, 200)
    } catch (error) {
      return respondToTaskError(c, error, 'evaluate_task_failed', { requestId, submissionId })
    }
  })

  app.post('/tasks/submission-update', async (c) => {
    const body = await readJson(() => c.req.json())
    const jobId = isRecord(body) ? readRequiredString(body, 'job_id') : null
    if (!jobId || !jobId.ok) {
      return c.json(buildError(ErrorCodes.INVALID_INPUT, 'job_id is required'), 400)
    }
    const parsed = parseCallbackFields(body)
    if (!parsed.ok) {
      return c.json(buildError(ErrorCodes.INVALID_INPUT, parsed.message), 400)
    }

    const requestId = getRequestId(c.req.header('x-cloudtasks-taskname'))
    try {
      const outcome = await runtime.reconciler.handleCallback({ jobId: jobId.value, ...parsed.value })
      console.info(
        JSON.stringify({
          event: 'submission_update_applied',
          requestId,
          jobId: outcome.jobId,
          submissionId: outcome.submissionId,
          jobStatus: outcome.jobStatus
        })
      )
      const response: TaskAcceptedResponse = {
        accepted: true,
        job_id: outcome.jobId,
        submission_id: outcome.submissionId,
        status: outcome.jobStatus
      }
      return c.json(response, 200)
    } catch (error) {
      return respondToTaskError(c, error, 'submission_update_task_failed', { requestId, jobId: jobId.value })
    }
  })

  app.post('/tasks/rerun-phase', async (c) => {
    const parsed = parseRerunBody(await readJson(() => c.req.json()))
    if (!parsed.ok) {
      return c.json(buildError(ErrorCodes.INVALID_INPUT, parsed.message), 400)
    }

    const requestId = getRequestId(c.req.header('x-cloudtasks-taskname'))
    try {
      const result = await runtime.rerunner.rerunPhase(parsed.value.phase_id)
      const response: TaskAcceptedResponse = { accepted: true }
      console.info(
        JSON.stringify({
          event: 'rerun_phase_task_completed',
          requestId,
          phaseId: result.phaseId,
          count: result.submissionIds.length
        })
      )
      return c.json(response, 200)
    } catch (error) {
      return respondToTaskError(c, error, 'rerun_phase_task_failed', {
        requestId,
        phaseId: parsed.value.phase_id
      })
    }
  })
}
