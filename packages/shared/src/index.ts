/**
 * @guildvault/shared
 * Shared logging, schemas, and constants for GuildVault
 */

// Export schemas (address, bytes32, url, amount, env)
export * from "./schemas/index.js";

// Export constants (ONE_WEEK, GOVERNANCE_DEFAULTS, etc.)
export * from "./constants/index.js";

// Export logger
export {
  logger,
  createServiceLogger,
  governanceLogger,
  gatewayLogger,
  logGovernanceEvent,
  audit,
  logError,
} from "./logger/index.js";
export type { GovernanceLogContext } from "./logger/index.js";
