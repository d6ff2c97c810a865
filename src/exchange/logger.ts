// src/exchange/logger.ts — Structured settlement logger
//
// JSON lines on stdout, one per engine operation.

import { ExchangeError } from "./types.js"

export type ExchangeOperation = "match" | "cancel" | "rollback"

export interface ExchangeLogEntry {
  timestamp: string
  operation: ExchangeOperation
  order_hash: string
  latency_ms?: number
  [key: string]: unknown
}

export interface ExchangeErrorLogEntry {
  timestamp: string
  operation: ExchangeOperation
  order_hash: string
  error: string
  error_code?: string
  [key: string]: unknown
}

export interface ExchangeLogger {
  log(
    operation: ExchangeOperation,
    orderHash: string,
    metadata?: Record<string, unknown>,
    latencyMs?: number,
  ): void

  logError(
    operation: ExchangeOperation,
    orderHash: string,
    error: unknown,
    metadata?: Record<string, unknown>,
  ): void
}

/** JSON.stringify with bigints written as decimal strings */
function serialize(entry: ExchangeLogEntry | ExchangeErrorLogEntry): string {
  return JSON.stringify(entry, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value,
  )
}

class ConsoleExchangeLogger implements ExchangeLogger {
  log(
    operation: ExchangeOperation,
    orderHash: string,
    metadata?: Record<string, unknown>,
    latencyMs?: number,
  ): void {
    const entry: ExchangeLogEntry = {
      timestamp: new Date().toISOString(),
      operation,
      order_hash: orderHash,
      ...(latencyMs !== undefined ? { latency_ms: latencyMs } : {}),
      ...(metadata ?? {}),
    }
    console.log(serialize(entry))
  }

  logError(
    operation: ExchangeOperation,
    orderHash: string,
    error: unknown,
    metadata?: Record<string, unknown>,
  ): void {
    const entry: ExchangeErrorLogEntry = {
      timestamp: new Date().toISOString(),
      operation,
      order_hash: orderHash,
      error: error instanceof Error ? error.message : String(error),
      ...(error instanceof ExchangeError ? { error_code: error.code } : {}),
      ...(metadata ?? {}),
    }
    console.log(serialize(entry))
  }
}

export function createExchangeLogger(): ExchangeLogger {
  return new ConsoleExchangeLogger()
}
