/**
 * @guildvault/governance
 * Membership-gated treasury governance engine
 */

export * from "./governance/index.js";
export * from "./gateway/commands.js";
export * from "./gateway/command-gateway.js";
export * from "./storage/snapshot.js";
export { loadGovernanceConfig } from "./config.js";
