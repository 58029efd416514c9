export { InMemoryTokenBank } from "./token-bank.js";
export type { BankOperation, FailureMode } from "./token-bank.js";
export { ExchangeError, FixedRateExchange } from "./fixed-rate-exchange.js";
export type { ConversionHook, FixedRateExchangeOptions, Rate } from "./fixed-rate-exchange.js";
