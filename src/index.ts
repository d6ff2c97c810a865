// src/index.ts — Order gateway entry point
// Boot sequence: config → chain reader → ledger → gateway → serve

import { serve } from "@hono/node-server"
import { loadConfig } from "./config.js"
import { createViemChainReader } from "./exchange/chain-reader.js"
import { MemoryFinalizationLedger, RedisFinalizationLedger, type FinalizationLedger } from "./exchange/ledger.js"
import { createLedgerRedis, type LedgerRedisConnection } from "./exchange/redis.js"
import { createApp } from "./gateway/server.js"

async function main() {
  const bootStart = Date.now()
  console.log("[exchange] booting order gateway...")

  // 1. Load config
  const config = loadConfig()
  console.log(`[exchange] config loaded: chain=${config.chainId}, exchange=${config.exchangeAddress}, port=${config.port}`)

  // 2. Chain reader
  const chain = createViemChainReader(config.rpcUrl)
  console.log(`[exchange] rpc: ${config.rpcUrl}`)

  // 3. Finalization ledger
  let ledger: FinalizationLedger
  let redis: LedgerRedisConnection | undefined
  if (config.redis.enabled) {
    redis = createLedgerRedis(config.redis)
    ledger = new RedisFinalizationLedger(redis.client, config.redis.keyPrefix)
    console.log(`[exchange] ledger: redis (prefix=${config.redis.keyPrefix})`)
  } else {
    ledger = new MemoryFinalizationLedger()
    console.log("[exchange] ledger: in-memory (REDIS_URL not set)")
  }

  // 4. Gateway
  const app = createApp({
    exchange: config.exchangeAddress,
    chainId: config.chainId,
    ledger,
    chain,
    ledgerBackend: config.redis.enabled ? "redis" : "memory",
  })

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    console.log(`[exchange] ready on :${info.port} (boot: ${Date.now() - bootStart}ms)`)
  })

  // 5. Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[exchange] ${signal} received, shutting down...`)
    server.close()
    if (redis) await redis.close()
    process.exit(0)
  }
  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      console.error("[exchange] shutdown failed:", err)
      process.exit(1)
    })
  }
  process.on("SIGTERM", () => onSignal("SIGTERM"))
  process.on("SIGINT", () => onSignal("SIGINT"))
}

main().catch((err) => {
  console.error("[exchange] fatal:", err)
  process.exit(1)
})
