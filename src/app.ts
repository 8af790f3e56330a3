import express from 'express'
import { logger } from './logger'
import { createRoutes, RouteDeps } from './routes'

export function createApp(deps: RouteDeps) {
  const app = express()
  app.use(express.json({ limit: '64kb' }))
  app.use('/', createRoutes(deps))

  app.use((_req: express.Request, res: express.Response) => {
    res.status(404).json({ error: 'not_found' })
  })

  // Erros padrão em JSON
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // body-parser marca JSON inválido com status 400
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
      return res.status(400).json({ error: 'invalid_json' })
    }
    logger.error({ err }, 'Unhandled error')
    res.status(500).json({ error: 'internal_error' })
  })

  return app
}
