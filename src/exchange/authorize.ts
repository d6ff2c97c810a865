// src/exchange/authorize.ts — Order authorization
//
// An order is authorized when the maker submits it directly, or when its
// signature recovers to the maker. Parameter checks (exchange scope, auction
// window) apply either way.

import {
  concat,
  hexToNumber,
  isAddressEqual,
  numberToHex,
  recoverAddress,
  size,
  slice,
  type Address,
  type Hex,
} from "viem"
import { hashOrder } from "./hash.js"
import type { FinalizationLedger } from "./ledger.js"
import { checkAuctionWindow } from "./pricing.js"
import { ExchangeError, type Order, type OrderSignature } from "./types.js"

export interface AuthorizationContext {
  /** This engine's own identity */
  exchange: Address
  chainId: number
}

// ---------------------------------------------------------------------------
// Signature encoding
// ---------------------------------------------------------------------------

/** Split a 65-byte r ‖ s ‖ v signature. */
export function splitSignature(signature: Hex): OrderSignature {
  if (size(signature) !== 65) {
    throw new ExchangeError(`Signature must be 65 bytes, got ${size(signature)}`, "INVALID_ORDER")
  }
  return {
    r: slice(signature, 0, 32),
    s: slice(signature, 32, 64),
    v: hexToNumber(slice(signature, 64, 65)),
  }
}

export function joinSignature(signature: OrderSignature): Hex {
  return concat([signature.r, signature.s, numberToHex(signature.v, { size: 1 })])
}

/** Recover the signer of a digest, or null when the signature is malformed. */
export async function recoverSigner(digest: Hex, signature: OrderSignature): Promise<Address | null> {
  try {
    return await recoverAddress({ hash: digest, signature: joinSignature(signature) })
  } catch {
    return null
  }
}

// ---------------------------------------------------------------------------
// Parameter checks
// ---------------------------------------------------------------------------

function checkOrderParameters(order: Order, exchange: Address): void {
  if (!isAddressEqual(order.exchange, exchange)) {
    throw new ExchangeError(
      `Order is scoped to exchange ${order.exchange}, not ${exchange}`,
      "WRONG_EXCHANGE",
    )
  }
  checkAuctionWindow(order)
}

/** Non-signature validity of an order, as a read. */
export function validateOrderParameters(order: Order, exchange: Address): boolean {
  try {
    checkOrderParameters(order, exchange)
    return true
  } catch (err) {
    if (err instanceof ExchangeError) return false
    throw err
  }
}

// ---------------------------------------------------------------------------
// Authorization
// ---------------------------------------------------------------------------

/**
 * Authorize an order for settlement and return its digest.
 *
 * The maker calling directly needs no signature. Anyone else must present a
 * signature that recovers to the maker.
 */
export async function authorizeOrder(
  order: Order,
  signature: OrderSignature,
  caller: Address,
  ctx: AuthorizationContext,
): Promise<Hex> {
  checkOrderParameters(order, ctx.exchange)

  const digest = hashOrder(order, ctx.chainId)
  if (isAddressEqual(caller, order.maker)) return digest

  const signer = await recoverSigner(digest, signature)
  if (signer === null || !isAddressEqual(signer, order.maker)) {
    throw new ExchangeError(`Signature does not authorize order ${digest}`, "UNAUTHORIZED")
  }
  return digest
}

/**
 * Whether an order could still be settled on its signature alone: parameters
 * valid, digest not consumed and signature recovering to the maker.
 */
export async function validateOrder(
  order: Order,
  signature: OrderSignature,
  ctx: AuthorizationContext,
  ledger: FinalizationLedger,
): Promise<boolean> {
  if (!validateOrderParameters(order, ctx.exchange)) return false

  const digest = hashOrder(order, ctx.chainId)
  if (await ledger.isFinalized(digest)) return false

  const signer = await recoverSigner(digest, signature)
  return signer !== null && isAddressEqual(signer, order.maker)
}
