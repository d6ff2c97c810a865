// src/gateway/server.ts — Hono HTTP app

import { Hono } from "hono"
import type { Address } from "viem"
import type { ChainReader } from "../exchange/collaborators.js"
import type { FinalizationLedger } from "../exchange/ledger.js"
import { exchangeRoutes } from "./exchange-routes.js"

export interface AppOptions {
  exchange: Address
  chainId: number
  ledger: FinalizationLedger
  chain: ChainReader
  /** Reported by /health */
  ledgerBackend: "memory" | "redis"
  clock?: () => bigint
}

export function createApp(options: AppOptions): Hono {
  const app = new Hono()

  app.get("/health", (c) => c.json({
    status: "ok",
    exchange: options.exchange,
    chain_id: options.chainId,
    ledger: options.ledgerBackend,
  }))

  app.route("/api/v1", exchangeRoutes({
    exchange: options.exchange,
    chainId: options.chainId,
    ledger: options.ledger,
    chain: options.chain,
    clock: options.clock,
  }))

  return app
}
