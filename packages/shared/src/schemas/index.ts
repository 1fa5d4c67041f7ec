/**
 * GuildVault Zod Schemas
 * Validation schemas for external inputs and environment
 */

import { z } from "zod";
import { GOVERNANCE_DEFAULTS } from "../constants/index.js";

// ============================================
// RE-EXPORT ALL SCHEMAS
// ============================================

export * from "./common.js";

// ============================================
// ENVIRONMENT SCHEMAS
// ============================================

const booleanFlag = (fallback: boolean) =>
  z
    .enum(["true", "false"])
    .default(fallback ? "true" : "false")
    .transform((v) => v === "true");

export const governanceEnvSchema = z.object({
  // Governance behaviour
  GUILDVAULT_RELEASE_HANDLE_ON_VETO: booleanFlag(GOVERNANCE_DEFAULTS.releaseHandleOnVeto),
  GUILDVAULT_REJECT_UNKNOWN_PROPOSAL_VETO: booleanFlag(GOVERNANCE_DEFAULTS.rejectUnknownProposalVeto),
  GUILDVAULT_EVENT_HISTORY_SIZE: z
    .string()
    .regex(/^\d+$/, "Event history size must be a positive integer")
    .default(String(GOVERNANCE_DEFAULTS.eventHistorySize))
    .transform(Number),

  // Logging
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),

  // Node
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export type GovernanceEnv = z.infer<typeof governanceEnvSchema>;
