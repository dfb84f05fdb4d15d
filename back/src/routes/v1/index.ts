import { Hono } from 'hono'
import type { Runtime } from '../../runtime.js'
import { registerHealthRoutes } from './health.js'
import { registerJobRoutes } from './jobs.js'

export const registerV1Routes = (app: Hono, runtime: Runtime) => {
  const v1 = new Hono()

  registerJobRoutes(v1, runtime)
  registerHealthRoutes(v1, runtime)

  app.route('/v1', v1)
}
