import { serve } from '@hono/node-server'
import { loadConfig } from './config.js'
import { createApp } from './server.js'

const config = loadConfig()

serve({ fetch: createApp(config).fetch, port: config.port }, (info) => {
  console.info(
    JSON.stringify({
      event: 'server_started',
      port: info.port,
      provider: config.provider,
      model: config.model
    })
  )
})
