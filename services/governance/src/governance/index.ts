/**
 * Governance Module Exports
 *
 * Provides the membership-gated treasury:
 * - Access guard (full membership, weekly action budget)
 * - Membership registry (sponsor, veto)
 * - Proposal ledger (submit, veto, claim, donate)
 * - Engine facade with typed events
 */

// Types
export * from "./types.js";

// Clock
export * from "./clock.js";

// Proposal ids
export * from "./proposal-id.js";

// Components
export * from "./member-store.js";
export * from "./access-guard.js";
export * from "./membership-registry.js";
export * from "./treasury-vault.js";
export * from "./proposal-ledger.js";

// Main engine
export * from "./governance-engine.js";
