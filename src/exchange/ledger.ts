// src/exchange/ledger.ts — Finalization ledger (digest → consumed)
//
// A digest is consumed once, by the first successful match or by a maker
// cancellation, and is never unset afterwards. `release` exists only for the
// engine to undo its own finalizations when the call that made them aborts.

import type { Hex } from "viem"

export interface FinalizationLedger {
  isFinalized(digest: Hex): Promise<boolean>
  /** Mark the digest consumed. False (and no write) if it already was. */
  tryFinalize(digest: Hex): Promise<boolean>
  /** Undo an uncommitted finalization. */
  release(digest: Hex): Promise<void>
}

// ---------------------------------------------------------------------------
// In-memory
// ---------------------------------------------------------------------------

export class MemoryFinalizationLedger implements FinalizationLedger {
  private readonly finalized = new Set<string>()

  async isFinalized(digest: Hex): Promise<boolean> {
    return this.finalized.has(digest.toLowerCase())
  }

  async tryFinalize(digest: Hex): Promise<boolean> {
    const key = digest.toLowerCase()
    if (this.finalized.has(key)) return false
    this.finalized.add(key)
    return true
  }

  async release(digest: Hex): Promise<void> {
    this.finalized.delete(digest.toLowerCase())
  }

  get size(): number {
    return this.finalized.size
  }
}

// ---------------------------------------------------------------------------
// Redis
// ---------------------------------------------------------------------------

/** Redis commands the ledger needs (subset of ioredis) */
export interface LedgerRedisClient {
  exists(key: string): Promise<number>
  /** SET key value NX — "OK" when written, null when the key existed */
  setIfAbsent(key: string, value: string): Promise<"OK" | null>
  del(key: string): Promise<number>
}

export const DEFAULT_LEDGER_KEY_PREFIX = "exchange"

/**
 * Redis-backed ledger. SET NX makes the check-and-mark a single command, so
 * two engines sharing the store cannot both consume one digest.
 */
export class RedisFinalizationLedger implements FinalizationLedger {
  constructor(
    private readonly redis: LedgerRedisClient,
    private readonly keyPrefix: string = DEFAULT_LEDGER_KEY_PREFIX,
  ) {}

  async isFinalized(digest: Hex): Promise<boolean> {
    return (await this.redis.exists(this.key(digest))) > 0
  }

  async tryFinalize(digest: Hex): Promise<boolean> {
    const result = await this.redis.setIfAbsent(this.key(digest), String(Date.now()))
    return result === "OK"
  }

  async release(digest: Hex): Promise<void> {
    await this.redis.del(this.key(digest))
  }

  private key(digest: Hex): string {
    return `${this.keyPrefix}:finalized:${digest.toLowerCase()}`
  }
}
