/**
 * GuildVault Constants
 */

// ============================================
// TIME
// ============================================

/** Seconds in one week: veto window, provisional period, cooldown and claim delay */
export const ONE_WEEK = 7 * 24 * 60 * 60;

export const ONE_DAY = 24 * 60 * 60;

// ============================================
// ENCODING
// ============================================

/** Number of 32-byte blocks in a proposal link */
export const URL_BLOCK_COUNT = 4;

export const BYTES32_HEX_LENGTH = 64;

export const ZERO_BYTES32 = `0x${"0".repeat(BYTES32_HEX_LENGTH)}` as const;

// ============================================
// DEFAULTS
// ============================================

export const GOVERNANCE_DEFAULTS = {
  releaseHandleOnVeto: false,
  rejectUnknownProposalVeto: false,
  eventHistorySize: 1000,
} as const;
