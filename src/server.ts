import 'dotenv/config'
import { serve } from '@hono/node-server'
import { loadBindings } from './config'
import { collaboratorsFromBindings, createApp } from './index'

const bindings = loadBindings(process.env)
const app = createApp({ bindings, ...collaboratorsFromBindings(bindings) })
const port = Number(bindings.PORT ?? 3000)

serve({ fetch: app.fetch, port }, (info) => {
  console.log(`[Server] Listening on http://localhost:${info.port}`)
})
