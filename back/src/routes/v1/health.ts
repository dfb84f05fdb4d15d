import type { Hono } from 'hono'
import type { Runtime } from '../../runtime.js'

export type HealthResponse = {
  status: 'ok'
  dispatch_mode: Runtime['config']['tasks']['dispatchMode']
  storage_backend: Runtime['config']['storage']['backend']
}

export const registerHealthRoutes = (app: Hono, runtime: Runtime) => {
  app.get('/healthz', (c) => c.text('ok', 200))
  app.get('/health', (c) => {
    const response: HealthResponse = {
      status: 'ok',
      dispatch_mode: runtime.config.tasks.dispatchMode,
      storage_backend: runtime.config.storage.backend
    }
    return c.json(response, 200)
  })
}
