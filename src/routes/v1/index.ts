import { Hono } from 'hono'
import type { ExtractionController } from '../../services/extraction/controller.js'
import type { DocumentPipeline } from '../../services/extraction/document.pipeline.js'
import type { ModelProvider } from '../../services/llm/provider.client.js'
import { registerExtractRoutes } from './extract.js'
import { registerHealthRoutes } from './health.js'

type V1RouteDeps = {
  provider: ModelProvider
  controller: ExtractionController
  pipeline: DocumentPipeline
}

export const registerV1Routes = (app: Hono, deps: V1RouteDeps) => {
  const v1 = new Hono()

  registerExtractRoutes(v1, deps)
  registerHealthRoutes(v1, deps.provider)

  app.route('/v1', v1)
}
