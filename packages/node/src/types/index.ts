/**
 * Type barrel: re-exports all public types from @lockbox/node.
 */

// DTOs
export {
  QuantitySchema,
  PaginationQuerySchema,
  AuthorizationSchema,
  DepositSchema,
  MintSchema,
  EventTypeSchema,
  ListEventsQuerySchema,
  ListAccountEventsQuerySchema,
} from "./dto.js";
export type {
  DepositDto,
  DepositResponse,
  WithdrawalOutcomeResponse,
  RemovalResponse,
  AccountView,
  BalanceView,
  CustodyStatus,
  ListEventsQuery,
  ListAccountEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { paginate } from "./pagination.js";
export type { PaginationMeta, PaginatedResponse } from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv, ValidatedEnv, ValidatedQueryEnv } from "./api-contract.js";
