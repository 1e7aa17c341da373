import type { Hono } from 'hono'
import type { ModelProvider } from '../../services/llm/provider.client.js'

export const registerHealthRoutes = (app: Hono, provider: ModelProvider) => {
  app.get('/healthz', (c) => c.text('ok', 200))
  app.get('/health', (c) => c.json({ status: 'ok', provider: provider.kind, model: provider.model }, 200))
}
