/**
 * @actus-sm/contract: Contract facade for hosts.
 *
 * Wraps the engine behind numeric codes and encoded bytes:
 * - ActusContract: init, processEvent, state and history queries
 * - ContractStore: pluggable persistence, with an in-memory implementation
 * - Hash-chained history of every applied event
 * - Zod configuration and pino logging
 */

export { ActusContract } from "./contract.js";
export type { ActusContractOptions, ProcessEventOptions } from "./contract.js";

export { InMemoryContractStore } from "./store.js";
export type { ContractRecord, ContractStore } from "./store.js";

export {
  GENESIS_HASH,
  computeHistoryHash,
  appendHistory,
  verifyHistory,
} from "./history.js";
export type {
  HistoryRecord,
  HistoryContent,
  HistoryError,
  HistoryVerification,
} from "./history.js";

export { ConfigSchema, loadConfig, createLogger, silentLogger } from "./config.js";
export type { AppConfig } from "./config.js";
