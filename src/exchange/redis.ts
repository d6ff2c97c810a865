// src/exchange/redis.ts — ioredis adapter for the finalization ledger

import { Redis } from "ioredis"
import type { LedgerRedisClient } from "./ledger.js"

export interface LedgerRedisConfig {
  url: string
  connectTimeoutMs: number
  commandTimeoutMs: number
}

export interface LedgerRedisConnection {
  client: LedgerRedisClient
  close(): Promise<void>
}

/** Open an ioredis connection and expose the commands the ledger uses. */
export function createLedgerRedis(config: LedgerRedisConfig): LedgerRedisConnection {
  const redis = new Redis(config.url, {
    connectTimeout: config.connectTimeoutMs,
    commandTimeout: config.commandTimeoutMs,
    maxRetriesPerRequest: 1,
  })

  return {
    client: {
      exists: (key) => redis.exists(key),
      setIfAbsent: (key, value) => redis.set(key, value, "NX"),
      del: (key) => redis.del(key),
    },
    async close() {
      await redis.quit()
    },
  }
}
