// src/exchange/hash.ts — EIP-712 order digest
//
// The digest is \x19\x01 ‖ domainSeparator ‖ structHash. The domain pins the
// protocol name, version, chain and the exchange instance; the struct hash
// commits to every order field, with the variable-length byte fields reduced
// to their keccak256 first (EIP-712 encoding of `bytes`).

import { hashTypedData, type Address, type Hex, type TypedDataDomain } from "viem"
import type { Order, OrderSide, SaleKind } from "./types.js"

export const DOMAIN_NAME = "AtomicMatchExchange"
export const DOMAIN_VERSION = "1"

export const ORDER_TYPES = {
  Order: [
    { name: "exchange", type: "address" },
    { name: "maker", type: "address" },
    { name: "taker", type: "address" },
    { name: "side", type: "uint8" },
    { name: "saleKind", type: "uint8" },
    { name: "target", type: "address" },
    { name: "paymentToken", type: "address" },
    { name: "callData", type: "bytes" },
    { name: "replacementPattern", type: "bytes" },
    { name: "staticTarget", type: "address" },
    { name: "staticExtra", type: "bytes" },
    { name: "basePrice", type: "uint256" },
    { name: "endPrice", type: "uint256" },
    { name: "listingTime", type: "uint256" },
    { name: "expirationTime", type: "uint256" },
    { name: "salt", type: "uint256" },
  ],
} as const

const SIDE_CODES: Record<OrderSide, number> = { buy: 0, sell: 1 }
const SALE_KIND_CODES: Record<SaleKind, number> = { fixed: 0, auction: 1 }

export function orderDomain(exchange: Address, chainId: number): TypedDataDomain {
  return {
    name: DOMAIN_NAME,
    version: DOMAIN_VERSION,
    chainId,
    verifyingContract: exchange,
  }
}

/**
 * Typed-data payload for an order. Signing this with `signTypedData` yields a
 * signature over exactly the digest returned by {@link hashOrder}.
 */
export function orderTypedData(order: Order, chainId: number) {
  return {
    domain: orderDomain(order.exchange, chainId),
    types: ORDER_TYPES,
    primaryType: "Order" as const,
    message: {
      exchange: order.exchange,
      maker: order.maker,
      taker: order.taker,
      side: SIDE_CODES[order.side],
      saleKind: SALE_KIND_CODES[order.saleKind],
      target: order.target,
      paymentToken: order.paymentToken,
      callData: order.callData,
      replacementPattern: order.replacementPattern,
      staticTarget: order.staticTarget,
      staticExtra: order.staticExtra,
      basePrice: order.basePrice,
      endPrice: order.endPrice,
      listingTime: order.listingTime,
      expirationTime: order.expirationTime,
      salt: order.salt,
    },
  }
}

/** Deterministic digest of an order; the identity used for signing and finalization. */
export function hashOrder(order: Order, chainId: number): Hex {
  return hashTypedData(orderTypedData(order, chainId))
}
