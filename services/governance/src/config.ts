/**
 * Governance Service Configuration
 */

import { z } from "zod";
import { governanceEnvSchema } from "@guildvault/shared";
import type { GovernanceConfig } from "./governance/types.js";

// ============================================
// GOVERNANCE CONFIG SCHEMA
// ============================================

const governanceConfigSchema = z.object({
  releaseHandleOnVeto: z.boolean(),
  rejectUnknownProposalVeto: z.boolean(),
  eventHistorySize: z.number().int().min(1).max(1_000_000),
});

// ============================================
// LOAD CONFIGURATION
// ============================================

export function loadGovernanceConfig(
  env: Record<string, string | undefined> = process.env
): GovernanceConfig {
  const parsed = governanceEnvSchema.parse(env);

  const config: GovernanceConfig = {
    // Strict compatibility keeps vetoed handles reserved
    releaseHandleOnVeto: parsed.GUILDVAULT_RELEASE_HANDLE_ON_VETO,
    rejectUnknownProposalVeto: parsed.GUILDVAULT_REJECT_UNKNOWN_PROPOSAL_VETO,
    eventHistorySize: parsed.GUILDVAULT_EVENT_HISTORY_SIZE,
  };

  return governanceConfigSchema.parse(config);
}
