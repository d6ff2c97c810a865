// src/config.ts — Configuration loader from environment variables

import { getAddress, isAddress, type Address } from "viem"
import { DEFAULT_LEDGER_KEY_PREFIX } from "./exchange/ledger.js"

export interface ExchangeConfig {
  // Gateway
  port: number
  host: string

  // Chain
  chainId: number
  rpcUrl: string

  /** Identity orders must be scoped to (verifying contract of the EIP-712 domain) */
  exchangeAddress: Address
  /** Receives the 2.5% protocol fee */
  feeRecipient: Address

  /** Finalization ledger backend; in-memory when no URL is set */
  redis: {
    url: string
    enabled: boolean
    keyPrefix: string
    connectTimeoutMs: number
    commandTimeoutMs: number
  }
}

function parseIntEnv(envKey: string, fallback: string): number {
  const raw = process.env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (!Number.isFinite(value)) {
    throw new Error(`${envKey} must be an integer, got "${raw}"`)
  }
  return value
}

function parseAddressEnv(envKey: string): Address {
  const raw = process.env[envKey]
  if (!raw) {
    throw new Error(`${envKey} is required`)
  }
  if (!isAddress(raw, { strict: false })) {
    throw new Error(`${envKey} must be a 20-byte hex address, got "${raw}"`)
  }
  return getAddress(raw)
}

export function loadConfig(): ExchangeConfig {
  const chainId = parseIntEnv("CHAIN_ID", "1")
  if (chainId <= 0) {
    throw new Error(`CHAIN_ID must be positive, got ${chainId}`)
  }

  return {
    port: parseIntEnv("PORT", "3000"),
    host: process.env.HOST ?? "0.0.0.0",

    chainId,
    rpcUrl: process.env.RPC_URL ?? "http://127.0.0.1:8545",

    exchangeAddress: parseAddressEnv("EXCHANGE_ADDRESS"),
    feeRecipient: parseAddressEnv("FEE_RECIPIENT"),

    redis: {
      url: process.env.REDIS_URL ?? "",
      enabled: !!process.env.REDIS_URL,
      keyPrefix: process.env.LEDGER_KEY_PREFIX ?? DEFAULT_LEDGER_KEY_PREFIX,
      connectTimeoutMs: parseIntEnv("REDIS_CONNECT_TIMEOUT_MS", "5000"),
      commandTimeoutMs: parseIntEnv("REDIS_COMMAND_TIMEOUT_MS", "3000"),
    },
  }
}
