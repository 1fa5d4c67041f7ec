/**
 * Common Schema Primitives
 * Shared types used across all schemas
 */

import { z } from "zod";
import { getAddress, isAddress, type Address, type Hex } from "viem";

// ============================================
// NORMALIZATION
// ============================================

const BYTES32_PATTERN = /^0x[a-fA-F0-9]{64}$/;

export function isBytes32(value: string): value is Hex {
  return BYTES32_PATTERN.test(value);
}

/** Lowercases the hex digits so equal byte strings compare equal */
export function normalizeBytes32(value: Hex): Hex {
  return `0x${value.slice(2).toLowerCase()}`;
}

// ============================================
// PRIMITIVE SCHEMAS
// ============================================

/** Principal address, output in checksummed form */
export const addressSchema = z
  .string()
  .refine((value): value is Address => isAddress(value, { strict: false }), "Invalid address")
  .transform((value) => getAddress(value));

/** 32-byte value (handles, digests, proposal ids) */
export const bytes32Schema = z
  .string()
  .refine(isBytes32, "Expected 0x-prefixed 32-byte hex value")
  .transform(normalizeBytes32);

export const handleSchema = bytes32Schema;

export const digestSchema = bytes32Schema;

export const proposalIdSchema = bytes32Schema;

/** Proposal link: exactly four 32-byte blocks */
export const proposalUrlSchema = z.tuple([
  bytes32Schema,
  bytes32Schema,
  bytes32Schema,
  bytes32Schema,
]);

/**
 * Non-negative amount in the smallest unit.
 * Accepts bigint, decimal string or safe integer to keep precision.
 */
export const amountSchema = z
  .union([
    z.bigint().nonnegative(),
    z.string().regex(/^\d+$/, "Amount must be a non-negative integer string"),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  ])
  .transform((value) => BigInt(value));

/** Unix time in seconds */
export const unixSecondsSchema = z.number().int().nonnegative();

export type ProposalUrlInput = z.input<typeof proposalUrlSchema>;
