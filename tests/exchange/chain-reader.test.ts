// tests/exchange/chain-reader.test.ts — viem-backed code checks and static calls

import { describe, it, expect, vi } from "vitest"
import { BaseError, ExecutionRevertedError, type Address, type Hex } from "viem"
import { ViemChainReader, type ChainReadClient } from "../../src/exchange/chain-reader.js"
import { CHECKER, COLLECTION } from "../helpers/orders.js"

function stubClient(overrides: Partial<ChainReadClient> = {}): ChainReadClient {
  return {
    getCode: vi.fn(async () => undefined),
    call: vi.fn(async () => ({ data: "0x" as const })),
    ...overrides,
  }
}

describe("ViemChainReader.hasCode", () => {
  it("is true for deployed bytecode", async () => {
    const reader = new ViemChainReader(stubClient({ getCode: async () => "0x6080604052" }))
    expect(await reader.hasCode(COLLECTION)).toBe(true)
  })

  it("is false for an account without code", async () => {
    expect(await new ViemChainReader(stubClient()).hasCode(COLLECTION)).toBe(false)
    expect(await new ViemChainReader(stubClient({ getCode: async () => "0x" })).hasCode(COLLECTION)).toBe(false)
  })
})

describe("ViemChainReader.staticCall", () => {
  it("passes when the call returns", async () => {
    const call = vi.fn(async (_args: { to: Address; data: Hex }) => ({ data: "0x01" as const }))
    const reader = new ViemChainReader(stubClient({ call }))

    expect(await reader.staticCall(CHECKER, "0xdeadbeef")).toBe(true)
    expect(call).toHaveBeenCalledWith({ to: CHECKER, data: "0xdeadbeef" })
  })

  it("fails when the call reverts", async () => {
    const reader = new ViemChainReader(stubClient({
      call: async () => { throw new ExecutionRevertedError({ message: "execution reverted" }) },
    }))
    expect(await reader.staticCall(CHECKER, "0x")).toBe(false)
  })

  it("finds a revert wrapped inside another viem error", async () => {
    const reader = new ViemChainReader(stubClient({
      call: async () => { throw new BaseError("call failed", { cause: new ExecutionRevertedError() }) },
    }))
    expect(await reader.staticCall(CHECKER, "0x")).toBe(false)
  })

  it("rethrows transport failures", async () => {
    const reader = new ViemChainReader(stubClient({
      call: async () => { throw new Error("connect ECONNREFUSED") },
    }))
    await expect(reader.staticCall(CHECKER, "0x")).rejects.toThrow("connect ECONNREFUSED")
  })

  it("rethrows viem errors that are not reverts", async () => {
    const reader = new ViemChainReader(stubClient({
      call: async () => { throw new BaseError("request timed out") },
    }))
    await expect(reader.staticCall(CHECKER, "0x")).rejects.toBeInstanceOf(BaseError)
  })
})
