import { Registry, Counter, Histogram } from 'prom-client'
import { Request, Response } from 'express'
import { getLogger } from './logger'

let registry: Registry
let exchangeCounter: Counter<string>
let rejectionCounter: Counter<string>
let cappedFillCounter: Counter<string>
let latencyHistogram: Histogram<string>

function initMetrics(reg?: Registry) {
  registry = reg ?? new Registry()

  exchangeCounter = new Counter({
    name: 'exchange_counter',
    help: 'Counts exchange attempts by outcome',
    labelNames: ['outcome'],
    registers: [registry]
  })

  rejectionCounter = new Counter({
    name: 'rejection_counter',
    help: 'Counts rejections by reason code',
    labelNames: ['reason'],
    registers: [registry]
  })

  cappedFillCounter = new Counter({
    name: 'capped_fill_counter',
    help: 'Counts exchanges clamped to the voting power cap',
    registers: [registry]
  })

  latencyHistogram = new Histogram({
    name: 'exchange_latency_ms',
    help: 'Exchange latency by outcome (ms)',
    labelNames: ['outcome'],
    buckets: [1, 5, 10, 50, 100, 500, 1000],
    registers: [registry]
  })
}

// initialize default metrics on module load
initMetrics()

export function setRegistry(reg: Registry) {
  initMetrics(reg)
}

export function getRegistry(): Registry {
  return registry
}

export function countExchange(outcome: 'settled' | 'rejected') {
  exchangeCounter.labels({ outcome }).inc()
}

export function countRejection(reason: string) {
  rejectionCounter.labels({ reason }).inc()
}

export function countCappedFill() {
  cappedFillCounter.inc()
}

export function observeLatency(outcome: 'settled' | 'rejected', ms: number) {
  latencyHistogram.labels({ outcome }).observe(ms)
}

export async function metricsHandler(_req: Request, res: Response) {
  try {
    const body = await registry.metrics()
    res.setHeader('Content-Type', registry.contentType)
    res.status(200).end(body)
  } catch (e) {
    getLogger().error({ event: 'metrics.render_failed', err: e })
    res.status(500).end('error')
  }
}
