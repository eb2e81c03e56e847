/**
 * GET /cap and PUT /cap
 */
import { Router } from 'express'
import type { CapPolicy } from '../services/CapPolicy'
import { parseCaller, parseSetCap } from '../validators/exchangeIntentValidator'
import { HttpOptions, handle, sendJson } from './respond'

export function capRouter(capPolicy: CapPolicy, opts: HttpOptions): Router {
  const router = Router()

  router.get('/cap', handle('cap', opts, async (_req, res) => {
    sendJson(res, 200, { votingPowerCap: capPolicy.getCap() })
  }))

  router.put('/cap', handle('cap', opts, async (req, res) => {
    const caller = parseCaller(req.header('x-caller-address'))
    const { newCap } = parseSetCap(req.body)
    const votingPowerCap = await capPolicy.setCap(caller, newCap)
    sendJson(res, 200, { votingPowerCap })
  }))

  return router
}
