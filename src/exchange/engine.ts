// src/exchange/engine.ts — Atomic match settlement
//
// atomicMatch validates a buy/sell pair, consumes both digests, moves the
// payment (seller proceeds, protocol fee, refund), has the seller's delegate
// execute the agreed asset transfer and runs any post-condition checks.
// Either every step succeeds or nothing the engine did remains:
//   - collaborator writes are bounded by the host's transaction
//   - the engine's own ledger writes are journaled and released on failure
// Calls are serialized, and a call issued from inside a running call's
// external sub-calls is refused.

import { AsyncLocalStorage } from "node:async_hooks"
import { EventEmitter } from "node:events"
import { concat, isAddressEqual, type Address, type Hex } from "viem"
import {
  authorizeOrder,
  validateOrder as validateOrderSignature,
  type AuthorizationContext,
} from "./authorize.js"
import { reconcileOrders } from "./calldata.js"
import type {
  ChainReader,
  DelegateRegistry,
  ExecutionHost,
  FungibleAssetLedger,
  NativeCurrency,
} from "./collaborators.js"
import { hashOrder } from "./hash.js"
import type { FinalizationLedger } from "./ledger.js"
import { createExchangeLogger, type ExchangeLogger, type ExchangeOperation } from "./logger.js"
import { ordersCanMatch } from "./matching.js"
import { AsyncMutex } from "./mutex.js"
import { calculateMatchPrice, computeFee } from "./pricing.js"
import {
  ExchangeError,
  ZERO_ADDRESS,
  type CallContext,
  type CancelResult,
  type ExchangeErrorCode,
  type MatchArgs,
  type MatchResult,
  type Order,
  type OrderSignature,
} from "./types.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ExchangeEngineDeps {
  /** This engine's identity; orders must be scoped to it */
  address: Address
  chainId: number
  /** Receives the protocol fee */
  feeRecipient: Address
  ledger: FinalizationLedger
  registry: DelegateRegistry
  tokens: FungibleAssetLedger
  native: NativeCurrency
  chain: ChainReader
  host: ExecutionHost
  logger?: ExchangeLogger
  /** Unix seconds */
  clock?: () => bigint
}

export interface ExchangeEvents {
  OrderMatched: [result: MatchResult]
  OrderCancelled: [result: CancelResult]
}

interface CallScope {
  operation: ExchangeOperation
}

/** Digests known so far in a match, for logging a failed call */
interface MatchTrace {
  buyHash?: Hex
  sellHash?: Hex
}

const systemClock = (): bigint => BigInt(Math.floor(Date.now() / 1000))

// ---------------------------------------------------------------------------
// Settlement journal
// ---------------------------------------------------------------------------

/** Undo actions for the engine's own writes, unwound newest first. */
class SettlementJournal {
  private readonly entries: { label: string; undo: () => Promise<void> }[] = []

  record(label: string, undo: () => Promise<void>): void {
    this.entries.push({ label, undo })
  }

  /** Run every undo; a failing undo is reported and does not stop the rest. */
  async unwind(onError: (label: string, err: unknown) => void): Promise<void> {
    while (this.entries.length > 0) {
      const entry = this.entries.pop()
      if (!entry) break
      try {
        await entry.undo()
      } catch (err) {
        onError(entry.label, err)
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class ExchangeEngine extends EventEmitter<ExchangeEvents> {
  readonly address: Address
  readonly chainId: number
  readonly feeRecipient: Address

  private readonly ledger: FinalizationLedger
  private readonly registry: DelegateRegistry
  private readonly tokens: FungibleAssetLedger
  private readonly native: NativeCurrency
  private readonly chain: ChainReader
  private readonly host: ExecutionHost
  private readonly logger: ExchangeLogger
  private readonly clock: () => bigint

  private readonly mutex = new AsyncMutex()
  private readonly scope = new AsyncLocalStorage<CallScope>()

  constructor(deps: ExchangeEngineDeps) {
    super()
    this.address = deps.address
    this.chainId = deps.chainId
    this.feeRecipient = deps.feeRecipient
    this.ledger = deps.ledger
    this.registry = deps.registry
    this.tokens = deps.tokens
    this.native = deps.native
    this.chain = deps.chain
    this.host = deps.host
    this.logger = deps.logger ?? createExchangeLogger()
    this.clock = deps.clock ?? systemClock
  }

  private get authContext(): AuthorizationContext {
    return { exchange: this.address, chainId: this.chainId }
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  hashOrder(order: Order): Hex {
    return hashOrder(order, this.chainId)
  }

  isFinalized(digest: Hex): Promise<boolean> {
    return this.ledger.isFinalized(digest)
  }

  validateOrder(order: Order, signature: OrderSignature): Promise<boolean> {
    return validateOrderSignature(order, signature, this.authContext, this.ledger)
  }

  ordersCanMatch(buy: Order, sell: Order, caller: Address): boolean {
    return ordersCanMatch(buy, sell, caller, this.clock())
  }

  calculateMatchPrice(buy: Order, sell: Order): bigint {
    return calculateMatchPrice(buy, sell, this.clock())
  }

  // -------------------------------------------------------------------------
  // atomicMatch
  // -------------------------------------------------------------------------

  async atomicMatch(args: MatchArgs, call: CallContext): Promise<MatchResult> {
    const result = await this.exclusive("match", () => this.runMatch(args, call))
    this.notify("match", result.sellHash, () => this.emit("OrderMatched", result))
    return result
  }

  private async runMatch(args: MatchArgs, call: CallContext): Promise<MatchResult> {
    const started = Date.now()
    const journal = new SettlementJournal()
    const trace: MatchTrace = {}

    try {
      const result = await this.host.atomically(() => this.settle(args, call, journal, trace))
      this.logger.log("match", result.sellHash, {
        buy_hash: result.buyHash,
        maker: result.maker,
        taker: result.taker,
        price: result.price,
      }, Date.now() - started)
      return result
    } catch (err) {
      await this.unwind(journal, trace.sellHash)
      this.logger.logError("match", trace.sellHash ?? "unknown", err, {
        buy_hash: trace.buyHash,
        caller: call.caller,
      })
      throw err
    }
  }

  private async settle(
    args: MatchArgs,
    call: CallContext,
    journal: SettlementJournal,
    trace: MatchTrace,
  ): Promise<MatchResult> {
    const { buy, sell } = args
    const { caller } = call
    const value = call.value ?? 0n
    const now = this.clock()

    // 1. Authorization
    const buyHash = await authorizeOrder(buy, args.buySig, caller, this.authContext)
    trace.buyHash = buyHash
    const sellHash = await authorizeOrder(sell, args.sellSig, caller, this.authContext)
    trace.sellHash = sellHash

    // 2. Compatibility
    if (!ordersCanMatch(buy, sell, caller, now)) {
      throw new ExchangeError(`Orders ${buyHash} and ${sellHash} do not match`, "NOT_MATCHED")
    }

    // 3. Replay
    if (await this.ledger.isFinalized(buyHash)) {
      throw new ExchangeError(`Order ${buyHash} is already finalized`, "ALREADY_FINALIZED")
    }
    if (await this.ledger.isFinalized(sellHash)) {
      throw new ExchangeError(`Order ${sellHash} is already finalized`, "ALREADY_FINALIZED")
    }

    // 4. Target must be a contract
    if (!(await this.chain.hasCode(sell.target))) {
      throw new ExchangeError(`Target ${sell.target} has no code`, "INVALID_TARGET")
    }

    // 5. Call data
    const { buyCallData, sellCallData } = reconcileOrders(buy, sell)

    // 6. Finalize both digests
    await this.finalize(buyHash, journal)
    await this.finalize(sellHash, journal)

    // 7. Payment
    const price = calculateMatchPrice(buy, sell, now)
    await this.transferFunds(buy, sell, price, caller, value)

    // 8. Asset transfer through the seller's delegate
    const delegate = await this.registry.delegateFor(sell.maker)
    if (!delegate) {
      throw new ExchangeError(`No delegate registered for ${sell.maker}`, "DELEGATE_CALL_FAILED")
    }
    await this.external(
      "DELEGATE_CALL_FAILED",
      `Delegate call to ${sell.target} failed`,
      () => delegate.invoke(sell.target, sellCallData),
    )

    // 9. Post-conditions
    await this.checkPostCondition(buy, buyCallData)
    await this.checkPostCondition(sell, sellCallData)

    // 10. Record
    return { buyHash, sellHash, ...this.orient(buy, sell, caller), price }
  }

  private async finalize(digest: Hex, journal: SettlementJournal): Promise<void> {
    if (!(await this.ledger.tryFinalize(digest))) {
      throw new ExchangeError(`Order ${digest} is already finalized`, "ALREADY_FINALIZED")
    }
    journal.record(`finalize:${digest}`, () => this.ledger.release(digest))
  }

  private async transferFunds(
    buy: Order,
    sell: Order,
    price: bigint,
    caller: Address,
    value: bigint,
  ): Promise<void> {
    const nativePayment = isAddressEqual(sell.paymentToken, ZERO_ADDRESS)

    if (!nativePayment && value > 0n) {
      throw new ExchangeError("Native currency attached to a token-settled match", "INVALID_PAYMENT")
    }

    if (price <= 0n) {
      if (value > 0n) await this.payNative(caller, value)
      return
    }

    const fee = computeFee(price)
    const proceeds = price - fee

    if (nativePayment) {
      if (!isAddressEqual(caller, buy.maker)) {
        throw new ExchangeError("Only the buyer can pay in native currency", "INVALID_PAYMENT")
      }
      if (value < price) {
        throw new ExchangeError(`Attached value ${value} is below price ${price}`, "INVALID_PAYMENT")
      }
      await this.payNative(sell.maker, proceeds)
      if (fee > 0n) await this.payNative(this.feeRecipient, fee)
      if (value > price) await this.payNative(caller, value - price)
      return
    }

    await this.pullToken(sell.paymentToken, buy.maker, sell.maker, proceeds)
    if (fee > 0n) await this.pullToken(sell.paymentToken, buy.maker, this.feeRecipient, fee)
  }

  private payNative(to: Address, amount: bigint): Promise<void> {
    return this.external(
      "TRANSFER_FAILED",
      `Native transfer of ${amount} to ${to} failed`,
      () => this.native.transfer(to, amount),
    )
  }

  private pullToken(token: Address, from: Address, to: Address, amount: bigint): Promise<void> {
    return this.external(
      "TRANSFER_FAILED",
      `Token ${token} transfer of ${amount} from ${from} to ${to} failed`,
      () => this.tokens.transferFrom(token, from, to, amount),
    )
  }

  private async checkPostCondition(order: Order, callData: Hex): Promise<void> {
    if (isAddressEqual(order.staticTarget, ZERO_ADDRESS)) return
    await this.external(
      "POST_CONDITION_FAILED",
      `Post-condition ${order.staticTarget} rejected the ${order.side} order`,
      () => this.chain.staticCall(order.staticTarget, concat([order.staticExtra, callData])),
    )
  }

  /**
   * Run an external sub-call. False and thrown errors become `code`; only a
   * refused re-entry passes through with its own code.
   */
  private async external(code: ExchangeErrorCode, message: string, fn: () => Promise<boolean>): Promise<void> {
    let ok: boolean
    try {
      ok = await fn()
    } catch (err) {
      if (err instanceof ExchangeError && err.code === "REENTRANT") throw err
      throw new ExchangeError(message, code, { cause: err })
    }
    if (!ok) throw new ExchangeError(message, code)
  }

  /** The initiating side is the taker; a third-party caller settles as the buyer's agent. */
  private orient(buy: Order, sell: Order, caller: Address): { maker: Address; taker: Address } {
    if (isAddressEqual(caller, sell.maker)) return { maker: buy.maker, taker: sell.maker }
    return { maker: sell.maker, taker: buy.maker }
  }

  // -------------------------------------------------------------------------
  // cancelOrder
  // -------------------------------------------------------------------------

  /** Consume an order's digest at its maker's request so it can never be matched. */
  async cancelOrder(order: Order, caller: Address): Promise<CancelResult> {
    const result = await this.exclusive("cancel", () => this.runCancel(order, caller))
    this.notify("cancel", result.hash, () => this.emit("OrderCancelled", result))
    return result
  }

  private async runCancel(order: Order, caller: Address): Promise<CancelResult> {
    const digest = this.hashOrder(order)
    try {
      if (!isAddressEqual(caller, order.maker)) {
        throw new ExchangeError(`Only the maker can cancel order ${digest}`, "UNAUTHORIZED")
      }
      if (!(await this.ledger.tryFinalize(digest))) {
        throw new ExchangeError(`Order ${digest} is already finalized`, "ALREADY_FINALIZED")
      }
      this.logger.log("cancel", digest, { maker: order.maker })
      return { hash: digest, maker: order.maker }
    } catch (err) {
      this.logger.logError("cancel", digest, err, { caller })
      throw err
    }
  }

  /** Listeners run after the call has committed; their errors are logged, not thrown. */
  private notify(operation: ExchangeOperation, orderHash: Hex, fire: () => void): void {
    try {
      fire()
    } catch (err) {
      this.logger.logError(operation, orderHash, err, { step: "listener" })
    }
  }

  // -------------------------------------------------------------------------
  // Serialization and re-entry
  // -------------------------------------------------------------------------

  private exclusive<T>(operation: ExchangeOperation, fn: () => Promise<T>): Promise<T> {
    const active = this.scope.getStore()
    if (active) {
      return Promise.reject(new ExchangeError(
        `Re-entrant ${operation} during ${active.operation}`,
        "REENTRANT",
      ))
    }
    return this.mutex.runExclusive(() => this.scope.run({ operation }, fn))
  }

  private async unwind(journal: SettlementJournal, orderHash: Hex | undefined): Promise<void> {
    await journal.unwind((label, err) => {
      this.logger.logError("rollback", orderHash ?? "unknown", err, { step: label })
    })
  }
}
