/**
 * @strongbox/custody
 *
 * Deposit conversion, withdrawal release and the reentrancy guard
 * around one settlement-currency ledger.
 */

// Coordinator
export { Custody } from "./custody.js";
export type { CustodyOptions } from "./custody.js";

// Components
export { DepositPipeline } from "./deposit-pipeline.js";
export { WithdrawalGate } from "./withdrawal-gate.js";
export { ReentrancyLock } from "./lock.js";
export { ProceedsMeter } from "./measure.js";
export type { CustodyContext } from "./context.js";

// Configuration
export {
  DEFAULT_DEADLINE_WINDOW_SECONDS,
  normalizeAddress,
  resolveCustodyConfig,
} from "./config.js";

// Records
export { InMemoryRecordLog } from "./records.js";
export type {
  RecordHandler,
  RecordHandlerFailure,
  RecordLogOptions,
  RecordQuery,
  RecordSubscription,
} from "./records.js";

// Ports
export type {
  AssetTransferProtocol,
  ConversionRequest,
  ExchangeAdapter,
  NativeValueChannel,
  RecordSink,
} from "./ports.js";

// Types
export { CustodyError } from "./types.js";
export type {
  CustodyConfig,
  CustodyErrorCode,
  CustodyErrorDetails,
  ResolvedCustodyConfig,
  SettlementCurrency,
  SolvencyReport,
} from "./types.js";

// Collaborators
export * from "./simulated/index.js";
export * from "./evm/index.js";
