// src/exchange/types.ts — Order, signature and match-record types
//
// An order is an immutable, signed statement of intent to swap a non-fungible
// asset against a payment. It is identified by its EIP-712 digest; every field
// below is committed to by that digest (see hash.ts).

import type { Address, Hex } from "viem"

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Wildcard taker, native-currency payment token and "no post-condition" target */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000"

/** Empty byte sequence (no wildcards / no static extra data) */
export const EMPTY_BYTES: Hex = "0x"

/** Protocol fee is price / FEE_DENOMINATOR (2.5%) */
export const FEE_DENOMINATOR = 40n

/** Largest value an unsigned 256-bit field can carry */
export const MAX_UINT256 = (1n << 256n) - 1n

// ---------------------------------------------------------------------------
// Order
// ---------------------------------------------------------------------------

export type OrderSide = "buy" | "sell"

/** "fixed" settles at basePrice; "auction" moves between basePrice and endPrice over the window */
export type SaleKind = "fixed" | "auction"

export interface Order {
  /** Settlement engine this order is scoped to */
  exchange: Address
  maker: Address
  /** ZERO_ADDRESS means any counterparty */
  taker: Address
  side: OrderSide
  saleKind: SaleKind
  /** Asset contract the call data is executed against */
  target: Address
  /** Fungible payment token, or ZERO_ADDRESS for native currency */
  paymentToken: Address
  /** Exact asset-transfer call issued against `target` */
  callData: Hex
  /** Byte mask over callData; set bits may be filled in from the counter-order */
  replacementPattern: Hex
  /** Post-condition contract, or ZERO_ADDRESS for none */
  staticTarget: Address
  staticExtra: Hex
  basePrice: bigint
  endPrice: bigint
  /** Unix seconds */
  listingTime: bigint
  /** Unix seconds; 0 never expires */
  expirationTime: bigint
  salt: bigint
}

/** Detached ECDSA signature over an order digest */
export interface OrderSignature {
  v: number
  r: Hex
  s: Hex
}

// ---------------------------------------------------------------------------
// Match
// ---------------------------------------------------------------------------

export interface MatchArgs {
  buy: Order
  buySig: OrderSignature
  sell: Order
  sellSig: OrderSignature
}

/** Who is calling the engine and how much native currency the call carries */
export interface CallContext {
  caller: Address
  /** Attached native currency in wei */
  value?: bigint
}

/** Auditable record of a completed match (OrderMatched event payload) */
export interface MatchResult {
  buyHash: Hex
  sellHash: Hex
  /** Counterparty of the initiating side */
  maker: Address
  /** Initiating side */
  taker: Address
  price: bigint
}

export interface CancelResult {
  hash: Hex
  maker: Address
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type ExchangeErrorCode =
  | "UNAUTHORIZED"
  | "WRONG_EXCHANGE"
  | "INVALID_WINDOW"
  | "NOT_MATCHED"
  | "ALREADY_FINALIZED"
  | "INVALID_TARGET"
  | "CALLDATA_MISMATCH"
  | "LENGTH_MISMATCH"
  | "PRICE_MISMATCH"
  | "INVALID_PAYMENT"
  | "TRANSFER_FAILED"
  | "DELEGATE_CALL_FAILED"
  | "POST_CONDITION_FAILED"
  | "REENTRANT"
  | "INVALID_ORDER"

export class ExchangeError extends Error {
  constructor(
    message: string,
    public readonly code: ExchangeErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "ExchangeError"
  }
}
