import { Registry } from 'prom-client'
import * as metrics from '../../src/utils/metrics'

describe('metrics wrapper', () => {
  let reg: Registry

  beforeEach(() => {
    reg = new Registry()
    metrics.setRegistry(reg)
  })

  async function metric(name: string) {
    const found = (await reg.getMetricsAsJSON()).find((m) => m.name === name)
    if (!found) throw new Error(`metric ${name} not registered`)
    return found
  }

  test('exchange-counter: counts by outcome', async () => {
    metrics.countExchange('settled')
    metrics.countExchange('settled')
    metrics.countExchange('rejected')
    const { values } = await metric('exchange_counter')
    expect(values.find((s) => s.labels.outcome === 'settled')?.value).toBe(2)
    expect(values.find((s) => s.labels.outcome === 'rejected')?.value).toBe(1)
  })

  test('rejection-counter: labelled by reason code', async () => {
    metrics.countRejection('INVALID_NONCE')
    const { values } = await metric('rejection_counter')
    expect(values.find((s) => s.labels.reason === 'INVALID_NONCE')?.value).toBe(1)
  })

  test('capped-fill counter', async () => {
    metrics.countCappedFill()
    const { values } = await metric('capped_fill_counter')
    expect(values[0].value).toBe(1)
  })

  test('latency histogram records one sample', async () => {
    metrics.observeLatency('settled', 12)
    const { values } = await metric('exchange_latency_ms')
    const inf = values.find((s) => s.labels.outcome === 'settled' && s.labels.le === '+Inf')
    expect(inf?.value).toBe(1)
  })

  test('getRegistry exposes the active registry', () => {
    expect(metrics.getRegistry()).toBe(reg)
  })
})
