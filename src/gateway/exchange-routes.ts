// src/gateway/exchange-routes.ts — Order read endpoints for signing tooling
//
// Read-only: hashing, typed-data payloads, signature validation, price quotes
// and finalization status. Settlement itself is never triggered over HTTP.

import { Hono, type Context } from "hono"
import type { Address } from "viem"
import { validateOrder, type AuthorizationContext } from "../exchange/authorize.js"
import { decodeOrder, decodeSignature } from "../exchange/codec.js"
import { DOMAIN_NAME, DOMAIN_VERSION, ORDER_TYPES, hashOrder, orderTypedData } from "../exchange/hash.js"
import type { ChainReader } from "../exchange/collaborators.js"
import type { FinalizationLedger } from "../exchange/ledger.js"
import { isWithinWindow } from "../exchange/matching.js"
import { checkAuctionWindow, resolvePrice } from "../exchange/pricing.js"
import { ExchangeError, type Order } from "../exchange/types.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ExchangeRouteDeps {
  exchange: Address
  chainId: number
  ledger: FinalizationLedger
  /** Target code lookups for validation responses */
  chain: ChainReader
  /** Unix seconds */
  clock?: () => bigint
}

const DIGEST_PATTERN = /^0x[0-9a-fA-F]{64}$/

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function readBody(c: Context): Promise<Record<string, unknown>> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    throw new ExchangeError("Request body must be JSON", "INVALID_ORDER")
  }
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new ExchangeError("Request body must be a JSON object", "INVALID_ORDER")
  }
  return Object.fromEntries(Object.entries(body))
}

/** Typed-data payload with uint256 values as decimal strings */
function typedDataJson(order: Order, chainId: number) {
  const { message } = orderTypedData(order, chainId)
  return {
    domain: {
      name: DOMAIN_NAME,
      version: DOMAIN_VERSION,
      chainId,
      verifyingContract: order.exchange,
    },
    types: ORDER_TYPES,
    primaryType: "Order",
    message: {
      ...message,
      basePrice: message.basePrice.toString(),
      endPrice: message.endPrice.toString(),
      listingTime: message.listingTime.toString(),
      expirationTime: message.expirationTime.toString(),
      salt: message.salt.toString(),
    },
  }
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

export function exchangeRoutes(deps: ExchangeRouteDeps): Hono {
  const app = new Hono()
  const ctx: AuthorizationContext = { exchange: deps.exchange, chainId: deps.chainId }
  const clock = deps.clock ?? (() => BigInt(Math.floor(Date.now() / 1000)))

  app.onError((err, c) => {
    if (err instanceof ExchangeError) {
      return c.json({ error: err.message, code: err.code }, 400)
    }
    return c.json({ error: "Internal error", code: "INTERNAL_ERROR" }, 500)
  })

  // POST /orders/hash — digest the maker signs
  app.post("/orders/hash", async (c) => {
    const body = await readBody(c)
    const order = decodeOrder(body.order)
    return c.json({ hash: hashOrder(order, deps.chainId) })
  })

  // POST /orders/typed-data — EIP-712 payload for wallet signing
  app.post("/orders/typed-data", async (c) => {
    const body = await readBody(c)
    const order = decodeOrder(body.order)
    return c.json(typedDataJson(order, deps.chainId))
  })

  // POST /orders/validate — signature, parameters, finalization status and target code
  app.post("/orders/validate", async (c) => {
    const body = await readBody(c)
    const order = decodeOrder(body.order)
    const signature = decodeSignature(body.signature)
    const valid = await validateOrder(order, signature, ctx, deps.ledger)
    const targetDeployed = await deps.chain.hasCode(order.target)
    return c.json({ valid, hash: hashOrder(order, deps.chainId), target_deployed: targetDeployed })
  })

  // POST /orders/price — current price, or the price at `at` (Unix seconds)
  app.post("/orders/price", async (c) => {
    const body = await readBody(c)
    const order = decodeOrder(body.order)
    let at = clock()
    if (body.at !== undefined) {
      if (typeof body.at !== "string" || !/^[0-9]+$/.test(body.at)) {
        throw new ExchangeError("at must be a decimal string of Unix seconds", "INVALID_ORDER")
      }
      at = BigInt(body.at)
    }
    checkAuctionWindow(order)
    if (!isWithinWindow(order, at)) {
      throw new ExchangeError(`Order is not live at ${at}`, "INVALID_WINDOW")
    }
    return c.json({ price: resolvePrice(order, at).toString() })
  })

  // GET /orders/:hash/status
  app.get("/orders/:hash/status", async (c) => {
    const hash = c.req.param("hash")
    if (!DIGEST_PATTERN.test(hash)) {
      throw new ExchangeError("hash must be a 32-byte hex digest", "INVALID_ORDER")
    }
    const finalized = await deps.ledger.isFinalized(`0x${hash.slice(2)}`)
    return c.json({ hash: hash.toLowerCase(), finalized })
  })

  return app
}
