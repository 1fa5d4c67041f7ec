/**
 * Governance Types
 *
 * Types for the membership-gated treasury:
 * - Member and proposal records
 * - Governance events
 * - Engine configuration
 * - Precondition errors
 */

import type { Address, Hex } from "viem";
import { GOVERNANCE_DEFAULTS } from "@guildvault/shared";

// ============================================
// RECORDS
// ============================================

/**
 * Admitted member. Absent members have no record,
 * which is the "zero sponsor" state.
 */
export interface Member {
  address: Address;
  sponsor: Address;
  handle: Hex;
  timeJoined: number;
  /** 0 until the first sponsor or propose action */
  lastActionTime: number;
}

export interface GenesisMember {
  address: Address;
  handle: Hex;
}

/** Four 32-byte blocks holding the proposal link */
export type ProposalUrl = readonly [Hex, Hex, Hex, Hex];

export interface Proposal {
  id: Hex;
  sponsor: Address;
  url: ProposalUrl;
  digest: Hex;
  wallet: Address;
  /** Drops to 0 once vetoed or claimed */
  value: bigint;
  timeSubmitted: number;
}

export interface ProposalFields {
  sponsor: Address;
  url: ProposalUrl;
  digest: Hex;
  wallet: Address;
  value: bigint;
  timeSubmitted: number;
}

export type ProposalStatus =
  | "absent"      // Never submitted
  | "pending"     // Inside the veto window
  | "claimable"   // Window closed, value not yet released
  | "neutralized"; // Vetoed or claimed

// ============================================
// EVENTS
// ============================================

export type GovernanceEvent =
  | { type: "NewMember"; sponsor: Address; member: Address; at: number }
  | { type: "MemberVetoed"; vetoer: Address; member: Address; at: number }
  | { type: "NewProposal"; sponsor: Address; proposalId: Hex; at: number }
  | { type: "ProposalVetoed"; vetoer: Address; proposalId: Hex; at: number }
  | { type: "ProposalClaimed"; proposalId: Hex; wallet: Address; value: bigint; at: number }
  | { type: "NewDonation"; donor: Address; amount: bigint; at: number };

export type GovernanceEventType = GovernanceEvent["type"];

export type GovernanceEventOf<T extends GovernanceEventType> = Extract<GovernanceEvent, { type: T }>;

/** Receives every event a component produces, after its state change */
export type GovernanceEventSink = (event: GovernanceEvent) => void;

export interface GovernanceEngineEvents {
  "member:new": (event: GovernanceEventOf<"NewMember">) => void;
  "member:vetoed": (event: GovernanceEventOf<"MemberVetoed">) => void;
  "proposal:new": (event: GovernanceEventOf<"NewProposal">) => void;
  "proposal:vetoed": (event: GovernanceEventOf<"ProposalVetoed">) => void;
  "proposal:claimed": (event: GovernanceEventOf<"ProposalClaimed">) => void;
  "treasury:donation": (event: GovernanceEventOf<"NewDonation">) => void;
}

// ============================================
// STATE SUMMARY
// ============================================

export interface GovernanceState {
  memberCount: number;
  takenHandleCount: number;
  proposalCount: number;
  treasuryBalance: bigint;
  totalPaidOut: bigint;
  now: number;
}

// ============================================
// CONFIGURATION
// ============================================

export interface GovernanceConfig {
  /** Free a vetoed member's handle instead of keeping it reserved */
  releaseHandleOnVeto: boolean;
  /** Fail vetoes of never-submitted proposal ids with ProposalNotFound */
  rejectUnknownProposalVeto: boolean;
  /** Number of events kept in the in-memory journal */
  eventHistorySize: number;
}

export const DEFAULT_GOVERNANCE_CONFIG: GovernanceConfig = {
  releaseHandleOnVeto: GOVERNANCE_DEFAULTS.releaseHandleOnVeto,
  rejectUnknownProposalVeto: GOVERNANCE_DEFAULTS.rejectUnknownProposalVeto,
  eventHistorySize: GOVERNANCE_DEFAULTS.eventHistorySize,
};

// ============================================
// ERRORS
// ============================================

export type GovernanceErrorCode =
  | "NotAMember"
  | "NotYetFull"
  | "RateLimited"
  | "AlreadyMember"
  | "HandleTaken"
  | "VetoWindowClosed"
  | "InsufficientFunds"
  | "DuplicateProposal"
  | "NotYetClaimable"
  | "ProposalNotFound"
  | "InvalidInput";

export abstract class GovernanceError extends Error {
  abstract readonly code: GovernanceErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export function isGovernanceError(value: unknown): value is GovernanceError {
  return value instanceof GovernanceError;
}

export class NotAMemberError extends GovernanceError {
  readonly code = "NotAMember";

  constructor(public readonly address: Address) {
    super(`Not a member: ${address}`);
  }
}

export class NotYetFullError extends GovernanceError {
  readonly code = "NotYetFull";

  constructor(
    public readonly address: Address,
    public readonly availableAt: number
  ) {
    super(`Member ${address} is provisional until ${availableAt}`);
  }
}

export class RateLimitedError extends GovernanceError {
  readonly code = "RateLimited";

  constructor(
    public readonly address: Address,
    public readonly availableAt: number
  ) {
    super(`Member ${address} already acted this period; next action at ${availableAt}`);
  }
}

export class AlreadyMemberError extends GovernanceError {
  readonly code = "AlreadyMember";

  constructor(public readonly address: Address) {
    super(`Already a member: ${address}`);
  }
}

export class HandleTakenError extends GovernanceError {
  readonly code = "HandleTaken";

  constructor(public readonly handle: Hex) {
    super(`Handle already taken: ${handle}`);
  }
}

export class VetoWindowClosedError extends GovernanceError {
  readonly code = "VetoWindowClosed";

  constructor(
    public readonly subject: string,
    public readonly closedAt: number
  ) {
    super(`Veto window for ${subject} closed at ${closedAt}`);
  }
}

export class InsufficientFundsError extends GovernanceError {
  readonly code = "InsufficientFunds";

  constructor(
    public readonly requested: bigint,
    public readonly available: bigint
  ) {
    super(`Insufficient treasury funds: requested=${requested}, available=${available}`);
  }
}

export class DuplicateProposalError extends GovernanceError {
  readonly code = "DuplicateProposal";

  constructor(public readonly proposalId: Hex) {
    super(`Proposal already exists: ${proposalId}`);
  }
}

export class NotYetClaimableError extends GovernanceError {
  readonly code = "NotYetClaimable";

  constructor(
    public readonly proposalId: Hex,
    public readonly availableAt: number
  ) {
    super(`Proposal ${proposalId} is claimable from ${availableAt}`);
  }
}

export class ProposalNotFoundError extends GovernanceError {
  readonly code = "ProposalNotFound";

  constructor(public readonly proposalId: Hex) {
    super(`Proposal not found: ${proposalId}`);
  }
}

export class InvalidInputError extends GovernanceError {
  readonly code = "InvalidInput";

  constructor(message: string) {
    super(message);
  }
}
