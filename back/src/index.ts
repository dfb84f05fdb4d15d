import { serve } from '@hono/node-server'
import { readConfig } from './config.js'
import { createRuntime } from './runtime.js'
import { createApp } from './server.js'

const config = readConfig()

serve({ fetch: createApp(createRuntime(config)).fetch, port: config.port })

console.info(JSON.stringify({ event: 'server_started', port: config.port }))
