import type { Context } from 'hono'
import type { TaskAcceptedResponse } from 'shared'
import { toErrorResponse } from '../../utils/errors.js'

// 4xx failures are final: answer 200 so Cloud Tasks does not redeliver the task.
export const respondToTaskError = (
  c: Context,
  error: unknown,
  event: string,
  fields: Record<string, unknown>
) => {
  const response = toErrorResponse(error, 'task failed')
  console.error(
    JSON.stringify({
      event,
      ...fields,
      status: response.status,
      code: response.payload.error.code,
      message: response.payload.error.message
    })
  )

  if (response.status < 500) {
    const rejected: TaskAcceptedResponse = { accepted: false, reason: response.payload.error.code }
    return c.json(rejected, 200)
  }
  return c.json(response.payload, response.status)
}

export const getRequestId = (headerValue: string | undefined): string =>
  headerValue?.trim() || `task_${Date.now()}_${Math.random().toString(36).slice(2, 10)}`
