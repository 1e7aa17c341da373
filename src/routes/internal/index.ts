import { Hono } from 'hono'
import { registerBatchRoutes } from './batch.js'
import type { BatchRouteDeps } from './batch.js'

export const registerInternalRoutes = (app: Hono, deps: BatchRouteDeps) => {
  const internal = new Hono()

  registerBatchRoutes(internal, deps)

  app.route('/internal', internal)
}
