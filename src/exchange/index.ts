// src/exchange/index.ts — Public API

export * from "./types.js"
export { hashOrder, orderTypedData, orderDomain, ORDER_TYPES, DOMAIN_NAME, DOMAIN_VERSION } from "./hash.js"
export {
  authorizeOrder,
  validateOrder,
  validateOrderParameters,
  recoverSigner,
  splitSignature,
  joinSignature,
  type AuthorizationContext,
} from "./authorize.js"
export { resolvePrice, calculateMatchPrice, computeFee } from "./pricing.js"
export { reconcileCalldata, reconcileOrders, orderCalldataCanMatch, type ReconciledCalldata } from "./calldata.js"
export { ordersCanMatch, isWithinWindow, isAscendingAuction } from "./matching.js"
export {
  MemoryFinalizationLedger,
  RedisFinalizationLedger,
  DEFAULT_LEDGER_KEY_PREFIX,
  type FinalizationLedger,
  type LedgerRedisClient,
} from "./ledger.js"
export { createLedgerRedis, type LedgerRedisConfig, type LedgerRedisConnection } from "./redis.js"
export type {
  ChainReader,
  Delegate,
  DelegateRegistry,
  ExecutionHost,
  FungibleAssetLedger,
  NativeCurrency,
} from "./collaborators.js"
export { ViemChainReader, createViemChainReader, type ChainReadClient } from "./chain-reader.js"
export { decodeOrder, encodeOrder, decodeSignature, OrderJson, SignatureJson } from "./codec.js"
export { createExchangeLogger, type ExchangeLogger, type ExchangeOperation } from "./logger.js"
export { ExchangeEngine, type ExchangeEngineDeps, type ExchangeEvents } from "./engine.js"
