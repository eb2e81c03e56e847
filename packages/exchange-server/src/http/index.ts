/**
 * HTTP router for the exchange server
 * Exposes `createApp()` so tests can mount the app without starting a server.
 */
import express, { ErrorRequestHandler } from 'express'
import { reject } from '@govex/reasons'
import corr from './middleware/corr'
import { exchangeRouter } from './exchange'
import { capRouter } from './cap'
import { queryRouter } from './queries'
import { HttpOptions, sendRejection } from './respond'
import { metricsHandler } from '../utils/metrics'
import { logHttp } from '../utils/logger'
import type { ExchangeEngine } from '../services/ExchangeEngine'
import type { CapPolicy } from '../services/CapPolicy'

export type AppDeps = HttpOptions & {
  engine: ExchangeEngine
  capPolicy: CapPolicy
}

export function createApp(deps: AppDeps) {
  const app = express()
  app.use(corr)
  app.use(express.json())

  app.use((req, res, next) => {
    const start = Date.now()
    res.on('finish', () => {
      logHttp({ path: req.path, method: req.method, status: res.statusCode, corr_id: req.corr_id, latency_ms: Date.now() - start })
    })
    next()
  })

  const opts: HttpOptions = { auditPath: deps.auditPath }
  app.use(exchangeRouter(deps.engine, opts))
  app.use(capRouter(deps.capPolicy, opts))
  app.use(queryRouter(deps.engine, opts))
  app.get('/metrics', metricsHandler)

  // body-parser failures arrive here before any route runs
  const onError: ErrorRequestHandler = (err, req, res, next) => {
    const rejection = err instanceof SyntaxError ? reject('CLIENT_BAD_REQUEST', { context: { issues: 'malformed JSON body' } }) : err
    sendRejection(req, res, rejection, 'http', opts).catch(next)
  }
  app.use(onError)

  return app
}

export default createApp
