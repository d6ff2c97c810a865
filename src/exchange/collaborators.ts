// src/exchange/collaborators.ts — Ports to the systems the engine drives
//
// The engine never moves assets itself. It asks the seller's delegate to run
// the agreed call, pulls token payments through the token ledger, pays out
// native currency it holds for the call, and reads chain state for target and
// post-condition checks.

import type { Address, Hex } from "viem"

/** Per-account execution proxy that performs the asset transfer for its owner. */
export interface Delegate {
  /** Execute `callData` against `target` on the owner's behalf. */
  invoke(target: Address, callData: Hex): Promise<boolean>
}

export interface DelegateRegistry {
  /** The account's delegate, or null when none is registered. */
  delegateFor(account: Address): Promise<Delegate | null>
}

/** Pull-based fungible token transfers (ERC-20 transferFrom, engine as spender). */
export interface FungibleAssetLedger {
  transferFrom(token: Address, from: Address, to: Address, amount: bigint): Promise<boolean>
}

/** Native currency held by the engine for the current call (its attached value). */
export interface NativeCurrency {
  transfer(to: Address, amount: bigint): Promise<boolean>
}

export interface ChainReader {
  /** Whether code is deployed at the address. */
  hasCode(address: Address): Promise<boolean>
  /** Read-only call; false when the call reverts. */
  staticCall(target: Address, data: Hex): Promise<boolean>
}

/**
 * The platform's transaction boundary: every write made through the
 * collaborators inside `fn` commits together, or none does if `fn` throws.
 */
export interface ExecutionHost {
  atomically<T>(fn: () => Promise<T>): Promise<T>
}
