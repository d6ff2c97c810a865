// src/exchange/matching.ts — Cross-order compatibility
//
// Pure checks that a buy and a sell describe the same trade. Prices are only
// compared structurally here; whether the buyer's price covers the seller's is
// decided by calculateMatchPrice.

import { isAddressEqual, type Address } from "viem"
import { ZERO_ADDRESS, type Order } from "./types.js"

/** listingTime <= now, and not past expirationTime unless it is 0. */
export function isWithinWindow(order: Order, now: bigint): boolean {
  if (order.listingTime > now) return false
  return order.expirationTime === 0n || order.expirationTime >= now
}

/**
 * Sell-to-highest-bidder auction: the price does not decline, so settling it
 * is the seller's call to make.
 */
export function isAscendingAuction(order: Order): boolean {
  return order.saleKind === "auction" && order.basePrice <= order.endPrice
}

function takerAccepts(order: Order, counterparty: Address): boolean {
  return isAddressEqual(order.taker, ZERO_ADDRESS) || isAddressEqual(order.taker, counterparty)
}

export function ordersCanMatch(buy: Order, sell: Order, caller: Address, now: bigint): boolean {
  if (buy.side !== "buy" || sell.side !== "sell") return false

  if (!takerAccepts(buy, sell.maker) || !takerAccepts(sell, buy.maker)) return false

  if (buy.saleKind !== sell.saleKind) return false
  if (!isAddressEqual(buy.target, sell.target)) return false
  if (!isAddressEqual(buy.paymentToken, sell.paymentToken)) return false
  if (buy.basePrice !== sell.basePrice) return false

  // A declining auction pins both ends of the curve
  const endPriceRelaxed = sell.saleKind === "fixed" || sell.basePrice <= sell.endPrice
  if (!endPriceRelaxed && buy.endPrice !== sell.endPrice) return false

  if (isAscendingAuction(sell) && !isAddressEqual(caller, sell.maker)) return false

  return isWithinWindow(buy, now) && isWithinWindow(sell, now)
}
