import { EventEmitter } from 'events'
import { getLogger } from './logger'

/**
 * Emits after state has been committed. A listener that throws is logged; the caller's
 * result stands.
 */
export function emitSafely(emitter: EventEmitter, name: string, payload: unknown): void {
  try {
    emitter.emit(name, payload)
  } catch (e) {
    getLogger().error({ event: 'emitter.listener_failed', emitted: name, err: e })
  }
}
