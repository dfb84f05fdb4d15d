import type { Hono } from 'hono'
import type { WorkerCallbackResponse } from 'shared'
import type { Runtime } from '../../runtime.js'
import { publishMessage } from '../../services/tasks.service.js'
import { buildError, ErrorCodes, toErrorResponse } from '../../utils/errors.js'
import { parseCallbackFields } from '../parsers.js'

export const registerJobRoutes = (app: Hono, runtime: Runtime) => {
  app.post('/jobs/:jobId/status', async (c) => {
    const jobId = c.req.param('jobId').trim()

    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      return c.json(buildError(ErrorCodes.INVALID_INPUT, 'request body must be JSON'), 400)
    }

    const parsed = parseCallbackFields(body)
    if (!parsed.ok) {
      return c.json(buildError(ErrorCodes.INVALID_INPUT, parsed.message), 400)
    }

    try {
      runtime.callbackLimiter.check(`job:${jobId}`)
      await publishMessage(runtime.queue, {
        type: 'submission_update',
        body: { job_id: jobId, ...parsed.value }
      })

      console.info(
        JSON.stringify({
          event: 'worker_callback_enqueued',
          jobId,
          status: parsed.value.status
        })
      )

      const response: WorkerCallbackResponse = { accepted: true, job_id: jobId }
      return c.json(response, 202)
    } catch (error) {
      const response = toErrorResponse(error, 'failed to enqueue callback')
      console.error(
        JSON.stringify({
          event: 'worker_callback_rejected',
          jobId,
          status: response.status,
          code: response.payload.error.code
        })
      )
      return c.json(response.payload, response.status)
    }
  })
}
