/**
 * Governance Engine
 *
 * Facade over the membership registry, proposal ledger and treasury vault.
 * Every operation reads the injected clock once, runs synchronously to
 * completion, and either commits fully or throws before any change.
 *
 * Events are journaled and re-emitted on the typed emitter after the
 * state change they describe.
 */

import { EventEmitter } from "eventemitter3";
import { audit, governanceLogger as logger, logError, logGovernanceEvent } from "@guildvault/shared";
import { zeroAddress, type Address, type Hex } from "viem";
import { AccessGuard } from "./access-guard.js";
import { systemClock, type Clock } from "./clock.js";
import {
  toAmount,
  toBytes32,
  toNonZeroPrincipal,
  toPrincipal,
  toProposalUrl,
} from "./inputs.js";
import { MemberStore } from "./member-store.js";
import { MembershipRegistry } from "./membership-registry.js";
import { ProposalLedger } from "./proposal-ledger.js";
import { TreasuryVault } from "./treasury-vault.js";
import {
  AlreadyMemberError,
  DEFAULT_GOVERNANCE_CONFIG,
  HandleTakenError,
  InvalidInputError,
  isGovernanceError,
  type GenesisMember,
  type GovernanceConfig,
  type GovernanceEngineEvents,
  type GovernanceEvent,
  type GovernanceState,
  type Member,
  type Proposal,
  type ProposalStatus,
} from "./types.js";

const engineLogger = logger.child({ component: "governance-engine" });

/**
 * Previously exported state to rebuild an engine from
 */
export interface GovernanceSeed {
  members: Member[];
  takenHandles: Hex[];
  proposals: Proposal[];
  treasuryBalance: bigint;
  payouts: Array<[Address, bigint]>;
}

export interface GovernanceEngineOptions {
  clock?: Clock;
  config?: Partial<GovernanceConfig>;
  genesisMembers?: GenesisMember[];
  seed?: GovernanceSeed;
}

export interface SubmitProposalInput {
  url: readonly string[];
  digest: string;
  wallet: string;
  value: bigint;
}

// ============================================
// GOVERNANCE ENGINE
// ============================================

export class GovernanceEngine extends EventEmitter<GovernanceEngineEvents> {
  private readonly clock: Clock;
  private readonly config: GovernanceConfig;

  // Components
  private readonly store: MemberStore;
  private readonly guard: AccessGuard;
  private readonly vault: TreasuryVault;
  private readonly registry: MembershipRegistry;
  private readonly ledger: ProposalLedger;

  // Journal
  private readonly events: GovernanceEvent[] = [];

  constructor(options: GovernanceEngineOptions = {}) {
    super();
    this.clock = options.clock ?? systemClock;
    this.config = { ...DEFAULT_GOVERNANCE_CONFIG, ...options.config };

    const sink = (event: GovernanceEvent) => this.dispatch(event);

    this.store = new MemberStore();
    this.guard = new AccessGuard(this.store);
    this.vault = new TreasuryVault(
      options.seed?.treasuryBalance ?? 0n,
      options.seed?.payouts ?? []
    );
    this.registry = new MembershipRegistry(this.store, this.guard, this.config, sink);
    this.ledger = new ProposalLedger(
      this.guard,
      this.vault,
      this.config,
      sink,
      options.seed?.proposals ?? []
    );

    if (options.seed) {
      for (const member of options.seed.members) {
        if (member.sponsor === zeroAddress) {
          throw new InvalidInputError(`Seed member ${member.address} has no sponsor`);
        }
        if (this.store.has(member.address)) {
          throw new AlreadyMemberError(member.address);
        }
        if (this.store.isHandleTaken(member.handle)) {
          throw new HandleTakenError(member.handle);
        }
        this.store.insert(member);
      }
      for (const handle of options.seed.takenHandles) {
        this.store.reserveHandle(handle);
      }
    }

    const genesis = (options.genesisMembers ?? []).map((m, i) => ({
      address: toNonZeroPrincipal(m.address, `genesisMembers[${i}].address`),
      handle: toBytes32(m.handle, `genesisMembers[${i}].handle`),
    }));
    if (genesis.length > 0) {
      this.registry.admitGenesis(genesis);
    }

    if (this.store.size === 0) {
      throw new InvalidInputError("A governance engine needs at least one member");
    }

    engineLogger.info({
      members: this.store.size,
      proposals: this.ledger.size,
      treasuryBalance: this.vault.getBalance().toString(),
      releaseHandleOnVeto: this.config.releaseHandleOnVeto,
      rejectUnknownProposalVeto: this.config.rejectUnknownProposalVeto,
    }, "GovernanceEngine initialized");
  }

  // ============================================
  // MEMBERSHIP
  // ============================================

  sponsorMember(caller: string, newMember: string, handle: string): Member {
    return this.run("sponsorMember", caller, (now) =>
      this.registry.sponsorMember(
        toPrincipal(caller, "caller"),
        toNonZeroPrincipal(newMember, "newMember"),
        toBytes32(handle, "handle"),
        now
      )
    );
  }

  vetoMember(caller: string, target: string): Member {
    return this.run("vetoMember", caller, (now) =>
      this.registry.vetoMember(toPrincipal(caller, "caller"), toPrincipal(target, "target"), now)
    );
  }

  // ============================================
  // PROPOSALS
  // ============================================

  submitProposal(caller: string, input: SubmitProposalInput): Proposal {
    return this.run("submitProposal", caller, (now) =>
      this.ledger.submitProposal(
        toPrincipal(caller, "caller"),
        {
          url: toProposalUrl(input.url),
          digest: toBytes32(input.digest, "digest"),
          wallet: toPrincipal(input.wallet, "wallet"),
          value: toAmount(input.value, "value"),
        },
        now
      )
    );
  }

  vetoProposal(caller: string, proposalId: string): void {
    this.run("vetoProposal", caller, (now) =>
      this.ledger.vetoProposal(toPrincipal(caller, "caller"), toBytes32(proposalId, "proposalId"), now)
    );
  }

  claimProposal(caller: string, proposalId: string): bigint {
    return this.run("claimProposal", caller, (now) =>
      this.ledger.claimProposal(toPrincipal(caller, "caller"), toBytes32(proposalId, "proposalId"), now)
    );
  }

  donate(donor: string, amount: bigint): bigint {
    return this.run("donate", donor, (now) =>
      this.ledger.donate(toPrincipal(donor, "donor"), toAmount(amount, "amount"), now)
    );
  }

  // ============================================
  // READS
  // ============================================

  getMember(address: string): Member | undefined {
    return this.registry.getMember(toPrincipal(address, "address"));
  }

  isMember(address: string): boolean {
    return this.registry.isMember(toPrincipal(address, "address"));
  }

  isFullMember(address: string): boolean {
    return this.registry.isFullMember(toPrincipal(address, "address"), this.clock.now());
  }

  isHandleTaken(handle: string): boolean {
    return this.registry.isHandleTaken(toBytes32(handle, "handle"));
  }

  /**
   * Earliest second at which the member may sponsor or propose,
   * undefined for non-members
   */
  nextActionAt(address: string): number | undefined {
    const member = this.registry.getMember(toPrincipal(address, "address"));
    return member ? this.guard.nextActionAt(member) : undefined;
  }

  getProposal(proposalId: string): Proposal | undefined {
    return this.ledger.getProposal(toBytes32(proposalId, "proposalId"));
  }

  getProposalStatus(proposalId: string): ProposalStatus {
    return this.ledger.getStatus(toBytes32(proposalId, "proposalId"), this.clock.now());
  }

  getTreasuryBalance(): bigint {
    return this.vault.getBalance();
  }

  getPayoutTotal(wallet: string): bigint {
    return this.vault.getPayoutTotal(toPrincipal(wallet, "wallet"));
  }

  listMembers(): Member[] {
    return this.registry.listMembers();
  }

  listProposals(): Proposal[] {
    return this.ledger.listProposals();
  }

  listTakenHandles(): Hex[] {
    return this.store.listTakenHandles();
  }

  listPayouts(): Array<[Address, bigint]> {
    return this.vault.listPayouts();
  }

  getRecentEvents(limit = 100): GovernanceEvent[] {
    if (limit <= 0) {
      return [];
    }
    return this.events.slice(-limit);
  }

  getConfig(): GovernanceConfig {
    return { ...this.config };
  }

  getState(): GovernanceState {
    return {
      memberCount: this.store.size,
      takenHandleCount: this.store.takenHandleCount,
      proposalCount: this.ledger.size,
      treasuryBalance: this.vault.getBalance(),
      totalPaidOut: this.vault.getTotalPaidOut(),
      now: this.clock.now(),
    };
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  /**
   * Reads the clock once and logs rejected preconditions before rethrowing
   */
  private run<T>(operation: string, caller: string, body: (now: number) => T): T {
    const now = this.clock.now();
    try {
      return body(now);
    } catch (error) {
      if (isGovernanceError(error)) {
        logGovernanceEvent("warn", `${operation}:rejected`, { caller, at: now }, `${operation} rejected: ${error.code}`);
      }
      throw error;
    }
  }

  private dispatch(event: GovernanceEvent): void {
    this.events.push(event);
    if (this.events.length > this.config.eventHistorySize) {
      this.events.splice(0, this.events.length - this.config.eventHistorySize);
    }

    // Listener failures are logged; the committed operation still returns normally
    try {
      switch (event.type) {
        case "NewMember":
          audit({ action: "sponsor", entityType: "member", entityId: event.member, actor: event.sponsor });
          this.emit("member:new", event);
          break;
        case "MemberVetoed":
          audit({ action: "veto", entityType: "member", entityId: event.member, actor: event.vetoer });
          this.emit("member:vetoed", event);
          break;
        case "NewProposal":
          audit({ action: "submit", entityType: "proposal", entityId: event.proposalId, actor: event.sponsor });
          this.emit("proposal:new", event);
          break;
        case "ProposalVetoed":
          audit({ action: "veto", entityType: "proposal", entityId: event.proposalId, actor: event.vetoer });
          this.emit("proposal:vetoed", event);
          break;
        case "ProposalClaimed":
          audit({
            action: "claim",
            entityType: "proposal",
            entityId: event.proposalId,
            actor: event.wallet,
            details: { value: event.value.toString() },
          });
          this.emit("proposal:claimed", event);
          break;
        case "NewDonation":
          audit({
            action: "donate",
            entityType: "treasury",
            actor: event.donor,
            details: { amount: event.amount.toString() },
          });
          this.emit("treasury:donation", event);
          break;
      }
    } catch (error) {
      logError(
        error instanceof Error ? error : new Error(String(error)),
        { event: event.type },
        `Listener for ${event.type} failed`
      );
    }
  }
}

/**
 * Factory function
 */
export function createGovernanceEngine(options?: GovernanceEngineOptions): GovernanceEngine {
  return new GovernanceEngine(options);
}
