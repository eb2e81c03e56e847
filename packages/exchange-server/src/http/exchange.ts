/**
 * POST /exchange and POST /exchange/preview
 *
 * The caller named in `x-caller-address` is the operator: it must hold the exchanger role
 * and have approved the exchange to pull the burn amount from its utility balance.
 */
import { Router } from 'express'
import type { ExchangeEngine } from '../services/ExchangeEngine'
import { parseCaller, parseExchangeIntent, parsePreview } from '../validators/exchangeIntentValidator'
import { HttpOptions, handle, sendJson } from './respond'

export function exchangeRouter(engine: ExchangeEngine, opts: HttpOptions): Router {
  const router = Router()

  router.post('/exchange', handle('exchange', opts, async (req, res) => {
    const operator = parseCaller(req.header('x-caller-address'))
    const intent = parseExchangeIntent(req.body)
    const receipt = await engine.exchange(operator, intent, { corr_id: req.corr_id })
    sendJson(res, 200, { corr_id: req.corr_id, ...receipt })
  }))

  router.post('/exchange/preview', handle('preview', opts, async (req, res) => {
    const { requester, amount } = parsePreview(req.body)
    const preview = await engine.previewExchange(requester, amount)
    sendJson(res, 200, preview)
  }))

  return router
}
