/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createDepositRoutes } from "./deposits.js";
export { createWithdrawalRoutes } from "./withdrawals.js";
export { createAccountRoutes } from "./account.js";
export { createCustodyRoutes } from "./custody.js";
export { createRecordRoutes } from "./records.js";
export { createSandboxRoutes } from "./sandbox.js";
