// src/exchange/codec.ts — JSON wire format for orders and signatures
//
// Integers travel as decimal strings, bytes as 0x hex. Decoding validates the
// shape with TypeBox, range-checks uint256 fields and checksums addresses.

import { Type, type Static, type TSchema } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { getAddress, type Hex } from "viem"
import { splitSignature } from "./authorize.js"
import { ExchangeError, MAX_UINT256, type Order, type OrderSignature } from "./types.js"

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const AddressString = Type.String({ pattern: "^0x[0-9a-fA-F]{40}$" })
const BytesString = Type.String({ pattern: "^0x([0-9a-fA-F]{2})*$" })
const Bytes32String = Type.String({ pattern: "^0x[0-9a-fA-F]{64}$" })
const UintString = Type.String({ pattern: "^[0-9]{1,78}$" })

export const OrderJson = Type.Object({
  exchange: AddressString,
  maker: AddressString,
  taker: AddressString,
  side: Type.Union([Type.Literal("buy"), Type.Literal("sell")]),
  saleKind: Type.Union([Type.Literal("fixed"), Type.Literal("auction")]),
  target: AddressString,
  paymentToken: AddressString,
  callData: BytesString,
  replacementPattern: BytesString,
  staticTarget: AddressString,
  staticExtra: BytesString,
  basePrice: UintString,
  endPrice: UintString,
  listingTime: UintString,
  expirationTime: UintString,
  salt: UintString,
}, { additionalProperties: false })

export type OrderJson = Static<typeof OrderJson>

export const SignatureJson = Type.Union([
  Type.Object({
    v: Type.Integer({ minimum: 0, maximum: 255 }),
    r: Bytes32String,
    s: Bytes32String,
  }, { additionalProperties: false }),
  Type.String({ pattern: "^0x[0-9a-fA-F]{130}$" }),
])

export type SignatureJson = Static<typeof SignatureJson>

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function firstError(schema: TSchema, input: unknown): string {
  const error = Value.Errors(schema, input).First()
  if (!error) return "invalid value"
  return `${error.path || "/"} ${error.message}`
}

function toUint256(field: string, raw: string): bigint {
  const value = BigInt(raw)
  if (value > MAX_UINT256) {
    throw new ExchangeError(`Invalid order: /${field} exceeds uint256`, "INVALID_ORDER")
  }
  return value
}

function toHex(raw: string): Hex {
  return `0x${raw.slice(2).toLowerCase()}`
}

export function decodeOrder(input: unknown): Order {
  if (!Value.Check(OrderJson, input)) {
    throw new ExchangeError(`Invalid order: ${firstError(OrderJson, input)}`, "INVALID_ORDER")
  }
  return {
    exchange: getAddress(input.exchange),
    maker: getAddress(input.maker),
    taker: getAddress(input.taker),
    side: input.side,
    saleKind: input.saleKind,
    target: getAddress(input.target),
    paymentToken: getAddress(input.paymentToken),
    callData: toHex(input.callData),
    replacementPattern: toHex(input.replacementPattern),
    staticTarget: getAddress(input.staticTarget),
    staticExtra: toHex(input.staticExtra),
    basePrice: toUint256("basePrice", input.basePrice),
    endPrice: toUint256("endPrice", input.endPrice),
    listingTime: toUint256("listingTime", input.listingTime),
    expirationTime: toUint256("expirationTime", input.expirationTime),
    salt: toUint256("salt", input.salt),
  }
}

export function encodeOrder(order: Order): OrderJson {
  return {
    exchange: order.exchange,
    maker: order.maker,
    taker: order.taker,
    side: order.side,
    saleKind: order.saleKind,
    target: order.target,
    paymentToken: order.paymentToken,
    callData: order.callData,
    replacementPattern: order.replacementPattern,
    staticTarget: order.staticTarget,
    staticExtra: order.staticExtra,
    basePrice: order.basePrice.toString(),
    endPrice: order.endPrice.toString(),
    listingTime: order.listingTime.toString(),
    expirationTime: order.expirationTime.toString(),
    salt: order.salt.toString(),
  }
}

/** Accepts `{ v, r, s }` or a 65-byte r ‖ s ‖ v hex string. */
export function decodeSignature(input: unknown): OrderSignature {
  if (!Value.Check(SignatureJson, input)) {
    throw new ExchangeError(`Invalid signature: ${firstError(SignatureJson, input)}`, "INVALID_ORDER")
  }
  if (typeof input === "string") return splitSignature(toHex(input))
  return { v: input.v, r: toHex(input.r), s: toHex(input.s) }
}
