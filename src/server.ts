import { Hono } from 'hono'
import { cors } from 'hono/cors'
import type { AppConfig } from './config.js'
import { ExtractionController } from './services/extraction/controller.js'
import { DocumentPipeline } from './services/extraction/document.pipeline.js'
import { createModelProvider } from './services/llm/provider.client.js'
import type { ModelProvider } from './services/llm/provider.client.js'
import { StorageService } from './services/storage.service.js'
import { registerV1Routes } from './routes/v1/index.js'
import { registerInternalRoutes } from './routes/internal/index.js'

type AppDependencies = {
  provider?: ModelProvider
  storage?: StorageService
  pipeline?: DocumentPipeline
}

export const createApp = (config: Readonly<AppConfig>, dependencies: AppDependencies = {}) => {
  const app = new Hono()

  app.use(
    '*',
    cors({
      origin: (origin) => origin || '*',
      allowHeaders: ['Content-Type', 'Authorization'],
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      maxAge: 600
    })
  )

  const provider = dependencies.provider ?? createModelProvider(config)
  const storage = dependencies.storage ?? new StorageService({ rootDir: config.outputDir })
  const controller = new ExtractionController({ provider, config })
  const pipeline = dependencies.pipeline ?? new DocumentPipeline({ config, provider, storage })

  registerV1Routes(app, { provider, controller, pipeline })
  registerInternalRoutes(app, { pipeline, storage, inputDir: config.inputDir })

  return app
}
