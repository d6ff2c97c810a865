// src/exchange/pricing.ts — Order price resolution
//
// Fixed-price orders settle at basePrice. Declining auctions interpolate
// linearly from basePrice at listingTime to endPrice at expirationTime
// (integer division, floors). Ascending auctions do not move: the seller asks
// basePrice and the bidder offers endPrice; the match check decides.

import { ExchangeError, FEE_DENOMINATOR, type Order } from "./types.js"

/** An auction must close strictly after it lists. */
export function checkAuctionWindow(order: Order): void {
  if (order.saleKind === "auction" && order.expirationTime <= order.listingTime) {
    throw new ExchangeError(
      `Auction window is empty: listing ${order.listingTime}, expiration ${order.expirationTime}`,
      "INVALID_WINDOW",
    )
  }
}

/**
 * Price of an order at `now` (Unix seconds).
 *
 * Callers only resolve orders inside their validity window, so a declining
 * auction never extrapolates below endPrice. An auction with an empty window
 * throws INVALID_WINDOW.
 */
export function resolvePrice(order: Order, now: bigint): bigint {
  if (order.saleKind === "fixed") return order.basePrice
  checkAuctionWindow(order)

  if (order.basePrice > order.endPrice) {
    const elapsed = now - order.listingTime
    const duration = order.expirationTime - order.listingTime
    const decline = order.basePrice - order.endPrice
    return order.basePrice - (elapsed * decline) / duration
  }

  if (order.basePrice < order.endPrice) {
    return order.side === "sell" ? order.basePrice : order.endPrice
  }

  // basePrice == endPrice: a flat auction behaves as a fixed-price order
  return order.basePrice
}

/** Settlement price of a compatible pair: the buyer's price, provided it covers the seller's. */
export function calculateMatchPrice(buy: Order, sell: Order, now: bigint): bigint {
  const buyPrice = resolvePrice(buy, now)
  const sellPrice = resolvePrice(sell, now)
  if (buyPrice < sellPrice) {
    throw new ExchangeError(
      `Buy price ${buyPrice} is below sell price ${sellPrice}`,
      "PRICE_MISMATCH",
    )
  }
  return buyPrice
}

/** Protocol fee on a settled price (2.5%, floored). */
export function computeFee(price: bigint): bigint {
  return price / FEE_DENOMINATOR
}
