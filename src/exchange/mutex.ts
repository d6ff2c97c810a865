// src/exchange/mutex.ts — Serializes engine calls
//
// One ExchangeEngine holds one mutex: matches and cancels queue behind each
// other in arrival order, so ledger check-then-finalize sequences and the
// host's transaction never interleave between two calls.

export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve()

  /** Run fn once every previously queued fn has settled. */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => { release = resolve })

    const prev = this.tail
    this.tail = gate

    await prev
    try {
      return await fn()
    } finally {
      release()
    }
  }
}
