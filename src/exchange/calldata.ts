// src/exchange/calldata.ts — Masked call-data reconciliation
//
// A template order (e.g. "buy any token of this collection") leaves some bytes
// of its call data open by setting them in its replacement pattern. Those bytes
// are taken from the counter-order; afterwards both sides must agree on the
// exact call byte for byte.

import { bytesToHex, hexToBytes, size, type Hex } from "viem"
import { ExchangeError, type Order } from "./types.js"

/**
 * Bitwise merge: out[i] = (mask[i] & desired[i]) | (~mask[i] & template[i]).
 * Inputs are left untouched.
 */
export function reconcileCalldata(template: Hex, desired: Hex, mask: Hex): Hex {
  const t = hexToBytes(template)
  const d = hexToBytes(desired)
  const m = hexToBytes(mask)

  if (t.length !== d.length || t.length !== m.length) {
    throw new ExchangeError(
      `Call data lengths differ: template ${t.length}, desired ${d.length}, mask ${m.length}`,
      "LENGTH_MISMATCH",
    )
  }

  const out = new Uint8Array(t.length)
  for (let i = 0; i < t.length; i++) {
    out[i] = (m[i] & d[i]) | (~m[i] & t[i] & 0xff)
  }
  return bytesToHex(out)
}

export interface ReconciledCalldata {
  buyCallData: Hex
  sellCallData: Hex
}

/**
 * Fill each side's wildcards from the other side, then require the two calls
 * to be identical. The buy side is filled first; the sell side then fills from
 * the already-filled buy call, so a byte both sides leave open ends up agreed.
 */
export function reconcileOrders(buy: Order, sell: Order): ReconciledCalldata {
  const buyCallData = size(buy.replacementPattern) > 0
    ? reconcileCalldata(buy.callData, sell.callData, buy.replacementPattern)
    : buy.callData
  const sellCallData = size(sell.replacementPattern) > 0
    ? reconcileCalldata(sell.callData, buyCallData, sell.replacementPattern)
    : sell.callData

  if (buyCallData.toLowerCase() !== sellCallData.toLowerCase()) {
    throw new ExchangeError("Call data does not match after reconciliation", "CALLDATA_MISMATCH")
  }
  return { buyCallData, sellCallData }
}

/** Whether two orders' call data reconcile to the same call. */
export function orderCalldataCanMatch(buy: Order, sell: Order): boolean {
  try {
    reconcileOrders(buy, sell)
    return true
  } catch (err) {
    if (err instanceof ExchangeError) return false
    throw err
  }
}
