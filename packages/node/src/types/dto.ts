/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Quantities travel as decimal integer strings in both directions.
 */

import { z } from "zod";
import { isCustodyEventType } from "@lockbox/types";
import type { CustodyEventType } from "@lockbox/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const QuantitySchema = z
  .string()
  .regex(/^\d+$/, "Must be a non-negative decimal integer string");

export const PaginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Account DTOs
// =============================================================================

export const AuthorizationSchema = z.object({
  asset: z.string().min(1),
  amount: QuantitySchema,
  owner: z.string().min(1),
  nonce: z.string().min(1).max(128),
  deadline: z.number().int().min(0),
  signature: z.string().min(1),
});

export const DepositSchema = z.object({
  asset: z.string().min(1).max(128),
  lockPeriod: z.number().int().min(0),
  amount: QuantitySchema,
  authorization: AuthorizationSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

export interface DepositResponse {
  readonly account: string;
  readonly asset: string;
  readonly amount: string;
  readonly newBalance: string;
  readonly created: boolean;
  readonly rearmed: boolean;
  readonly unlockTime: number;
}

export interface WithdrawalOutcomeResponse {
  readonly asset: string;
  readonly amount: string;
  readonly status: "withdrawn" | "failed";
  readonly reason?: string;
}

export interface RemovalResponse {
  readonly account: string;
  readonly asset: string;
  readonly forfeited: string;
}

export interface AccountView {
  readonly account: string;
  readonly createdAt: number;
  readonly lockPeriod: number;
  readonly unlockTime: number;
  readonly unlocked: boolean;
  readonly nonZeroAssetCount: number;
  readonly balances: readonly { readonly asset: string; readonly balance: string }[];
}

export interface BalanceView {
  readonly account: string;
  readonly asset: string;
  readonly balance: string;
}

// =============================================================================
// Admin DTOs
// =============================================================================

export const MintSchema = z.object({
  asset: z.string().min(1).max(128),
  holder: z.string().min(1),
  amount: QuantitySchema,
});

export interface CustodyStatus {
  readonly custodyId: string;
  readonly paused: boolean;
  readonly accounts: number;
  readonly events: number;
}

// =============================================================================
// Event DTOs
// =============================================================================

export const EventTypeSchema = z.custom<CustodyEventType>(isCustodyEventType, {
  message: "Unknown event type",
});

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  type: EventTypeSchema.optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListAccountEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListAccountEventsQuery = z.infer<typeof ListAccountEventsQuerySchema>;
