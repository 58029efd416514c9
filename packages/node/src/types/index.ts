/**
 * Type barrel — re-exports all public types from @strongbox/node.
 */

// DTOs
export {
  AssetDepositSchema,
  BaseUnitsSchema,
  ListRecordsQuerySchema,
  NativeDepositSchema,
  SandboxApproveSchema,
  SandboxMintSchema,
  WithdrawalSchema,
  toRecordDto,
  toSolvencyDto,
} from "./dto.js";
export type {
  AmountDto,
  AssetDepositDto,
  CustodyRecordDto,
  ListRecordsQuery,
  NativeDepositDto,
  SandboxApproveDto,
  SandboxMintDto,
  SolvencyDto,
  WithdrawalDto,
} from "./dto.js";

// Error
export { createErrorEnvelope, RequestError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope, RequestErrorStatus } from "./error.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord, JwtClaims } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
