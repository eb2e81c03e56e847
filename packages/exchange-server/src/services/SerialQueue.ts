/**
 * SerialQueue
 * - FIFO mutex shared by every state-changing operation of the exchange
 * - each task runs to completion (resolve or reject) before the next one starts
 */
export class SerialQueue {
  private waiters: Array<() => void> = []

  /** Acquire the lock (FIFO). Resolves when the lock is held. */
  private acquire(): Promise<void> {
    let resolver: () => void = () => undefined
    const p = new Promise<void>((resolve) => (resolver = resolve))
    this.waiters.push(resolver)

    // If we're the only waiter, acquire immediately
    if (this.waiters.length === 1) resolver()
    return p
  }

  private release() {
    // Remove current holder and wake the next waiter
    this.waiters.shift()
    const next = this.waiters[0]
    if (next) next()
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await task()
    } finally {
      this.release()
    }
  }

  get pending(): number {
    return this.waiters.length
  }
}
