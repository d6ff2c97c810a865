// src/exchange/chain-reader.ts — viem-backed chain reads
//
// Target code checks (eth_getCode) and post-condition static calls (eth_call).
// A post-condition passes when the call returns without reverting.

import { BaseError, ExecutionRevertedError, createPublicClient, http, type Address, type Hex } from "viem"
import type { ChainReader } from "./collaborators.js"

/** Minimal viem-compatible client interface (subset of PublicClient) */
export interface ChainReadClient {
  getCode(args: { address: Address }): Promise<Hex | undefined>
  call(args: { to: Address; data: Hex }): Promise<{ data?: Hex }>
}

export class ViemChainReader implements ChainReader {
  constructor(private readonly client: ChainReadClient) {}

  async hasCode(address: Address): Promise<boolean> {
    const code = await this.client.getCode({ address })
    return code !== undefined && code !== "0x"
  }

  async staticCall(target: Address, data: Hex): Promise<boolean> {
    try {
      await this.client.call({ to: target, data })
      return true
    } catch (err) {
      if (err instanceof BaseError && err.walk((e) => e instanceof ExecutionRevertedError) !== null) {
        return false
      }
      throw err
    }
  }
}

/** ChainReader over an HTTP JSON-RPC endpoint. */
export function createViemChainReader(rpcUrl: string): ViemChainReader {
  const client = createPublicClient({ transport: http(rpcUrl) })
  return new ViemChainReader({
    getCode: (args) => client.getCode(args),
    call: (args) => client.call(args),
  })
}
