export { EvmConnection } from "./connection.js";
export type { EvmClients, EvmConnectionConfig } from "./connection.js";
export { RouterExchangeAdapter } from "./router-exchange.js";
export { Erc20TransferProtocol } from "./erc20-transfer.js";
