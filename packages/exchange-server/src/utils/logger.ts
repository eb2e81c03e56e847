import pino from 'pino'

type TransitionPayload = {
  requester: string
  nonce: string
  from: string
  to: string
  corr_id?: string
  reason_code?: string
  ts?: string
}

type HttpPayload = {
  path: string
  method: string
  status: number
  corr_id?: string
  latency_ms?: number
}

// module-wide logger; tests can replace via setLogger
let logger: pino.Logger = pino({ level: process.env.LOG_LEVEL || 'info' })

export function setLogger(l: pino.Logger) {
  logger = l
}

export function getLogger(): pino.Logger {
  return logger
}

export function logTransition(payload: TransitionPayload): void {
  const base = {
    event: 'exchange.transition',
    requester: payload.requester,
    nonce: payload.nonce,
    from: payload.from,
    to: payload.to,
    corr_id: payload.corr_id,
    reason_code: payload.reason_code,
    ts: payload.ts ?? new Date().toISOString(),
  }

  if (payload.to === 'REJECTED') logger.warn(base)
  else logger.info(base)
}

export function logHttp(payload: HttpPayload): void {
  logger.info({
    event: 'http.request',
    path: payload.path,
    method: payload.method,
    status: payload.status,
    corr_id: payload.corr_id,
    latency_ms: payload.latency_ms,
  })
}
