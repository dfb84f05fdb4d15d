import { Hono } from 'hono'
import type { Runtime } from '../../runtime.js'
import { buildError, ErrorCodes, toErrorResponse } from '../../utils/errors.js'
import { readBearerToken } from '../../utils/security.js'
import { registerSubmissionRoutes } from './submissions.js'
import { registerTaskRoutes } from './tasks.js'

export const registerInternalRoutes = (app: Hono, runtime: Runtime) => {
  const internal = new Hono()

  const verify = runtime.verifyInternalToken
  if (verify) {
    internal.use('*', async (c, next) => {
      const token = readBearerToken({ header: (name) => c.req.header(name) })
      if (!token) {
        return c.json(buildError(ErrorCodes.UNAUTHORIZED, 'bearer token is required'), 401)
      }
      try {
        await verify(token)
      } catch (error) {
        const response = toErrorResponse(error, 'invalid internal token')
        return c.json(response.payload, response.status)
      }
      await next()
    })
  }

  registerTaskRoutes(internal, runtime)
  registerSubmissionRoutes(internal, runtime)

  app.route('/internal', internal)
}
