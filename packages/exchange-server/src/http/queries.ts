/**
 * Read-only accessors: constants, nonce state, holder state.
 */
import { Router } from 'express'
import { isHexString } from 'ethers'
import { reject } from '@govex/reasons'
import type { ExchangeEngine } from '../services/ExchangeEngine'
import { parseAddress } from '../validators/exchangeIntentValidator'
import { HttpOptions, handle, sendJson } from './respond'

export function queryRouter(engine: ExchangeEngine, opts: HttpOptions): Router {
  const router = Router()

  router.get('/constants', handle('query', opts, async (_req, res) => {
    sendJson(res, 200, engine.constants())
  }))

  router.get('/nonces/:requester/:nonce', handle('query', opts, async (req, res) => {
    const requester = parseAddress(req.params.requester, 'requester')
    const { nonce } = req.params
    if (!isHexString(nonce, 32)) throw reject('CLIENT_BAD_REQUEST', { context: { issues: 'nonce: expected a 0x-prefixed 32-byte hex nonce' } })
    sendJson(res, 200, { requester, nonce, consumed: engine.isNonceConsumed(requester, nonce) })
  }))

  router.get('/holders/:address', handle('query', opts, async (req, res) => {
    const account = parseAddress(req.params.address, 'address')
    const state = await engine.holder(account)
    sendJson(res, 200, { account, ...state })
  }))

  return router
}
