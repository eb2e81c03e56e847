/**
 * Response helpers shared by the handlers: JSON bodies with bigint-safe encoding, and the
 * error envelope for every rejection.
 */
import { Request, Response, NextFunction, RequestHandler } from 'express'
import { ErrorEnvelope, ExchangeState } from '@govex/dto'
import { ReasonedRejection, reject } from '@govex/reasons'
import { appendRejection } from '../utils/rejectionAudit'
import { getLogger } from '../utils/logger'
import { toWire } from '../utils/wire'

export type HttpOptions = { auditPath?: string }

export function sendJson(res: Response, status: number, body: unknown) {
  res.status(status).json(toWire(body))
}

export async function sendRejection(req: Request, res: Response, e: unknown, stage: string, opts: HttpOptions) {
  const corr_id = req.corr_id ?? '-'
  let rejection: ReasonedRejection
  if (e instanceof ReasonedRejection) {
    rejection = e
  } else {
    ;(req.log ?? getLogger()).error({ event: 'http.unexpected_error', stage, err: e })
    rejection = reject('INTERNAL_ERROR')
  }

  const envelope: ErrorEnvelope = { corr_id, state: ExchangeState.REJECTED, reason: rejection.reason, ts: new Date().toISOString() }
  if (opts.auditPath) {
    const requester = typeof req.body?.requester === 'string' ? req.body.requester : undefined
    const { code, category, http_status, message, context } = rejection.reason
    await appendRejection(opts.auditPath, { ts: envelope.ts, corr_id, requester, stage, reason: { code, category, http_status, message }, context })
  }
  res.status(rejection.reason.http_status).json(envelope)
}

/** Express 4 does not await handlers; route every failure through the envelope. */
export function handle(stage: string, opts: HttpOptions, fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch((e: unknown) => sendRejection(req, res, e, stage, opts)).catch(next)
  }
}
