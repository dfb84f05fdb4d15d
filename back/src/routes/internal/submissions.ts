import type { Hono } from 'hono'
import type { CancelSubmissionResponse } from 'shared'
import type { Runtime } from '../../runtime.js'
import { toErrorResponse } from '../../utils/errors.js'

export const registerSubmissionRoutes = (app: Hono, runtime: Runtime) => {
  app.post('/submissions/:submissionId/cancel', async (c) => {
    const submissionId = c.req.param('submissionId').trim()
    try {
      const result = await runtime.status.cancel(submissionId)
      const response: CancelSubmissionResponse = {
        submission_id: submissionId,
        status: result.current,
        applied: result.applied
      }
      return c.json(response, 200)
    } catch (error) {
      const response = toErrorResponse(error, 'failed to cancel submission')
      console.error(
        JSON.stringify({
          event: 'submission_cancel_failed',
          submissionId,
          code: response.payload.error.code
        })
      )
      return c.json(response.payload, response.status)
    }
  })
}
