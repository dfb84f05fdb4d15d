import { Hono } from 'hono'
import { registerInternalRoutes } from './routes/internal/index.js'
import { registerV1Routes } from './routes/v1/index.js'
import type { Runtime } from './runtime.js'

export const createApp = (runtime: Runtime) => {
  const app = new Hono()

  registerV1Routes(app, runtime)
  registerInternalRoutes(app, runtime)

  return app
}
