/**
 * Proposal Ledger
 *
 * Spending proposals keyed by a content-derived id:
 * - Submit (full member, weekly budget, value strictly below the pool)
 * - Veto within one week of submission
 * - Claim after one week, releasing the value exactly once
 *
 * Veto and claim both neutralize a proposal by zeroing its value.
 * Records are never deleted.
 */

import { governanceLogger, ONE_WEEK } from "@guildvault/shared";
import type { Address, Hex } from "viem";
import type { AccessGuard } from "./access-guard.js";
import type { TreasuryVault } from "./treasury-vault.js";
import { deriveProposalId } from "./proposal-id.js";
import {
  DuplicateProposalError,
  InsufficientFundsError,
  NotYetClaimableError,
  ProposalNotFoundError,
  VetoWindowClosedError,
  type GovernanceConfig,
  type GovernanceEventSink,
  type Proposal,
  type ProposalStatus,
  type ProposalUrl,
} from "./types.js";

const ledgerLogger = governanceLogger.child({ component: "proposal-ledger" });

export interface SubmitProposalParams {
  url: ProposalUrl;
  digest: Hex;
  wallet: Address;
  value: bigint;
}

export class ProposalLedger {
  private readonly proposals: Map<Hex, Proposal> = new Map();

  constructor(
    private readonly guard: AccessGuard,
    private readonly vault: TreasuryVault,
    private readonly config: Pick<GovernanceConfig, "rejectUnknownProposalVeto">,
    private readonly emit: GovernanceEventSink,
    existing: Iterable<Proposal> = []
  ) {
    for (const proposal of existing) {
      if (this.proposals.has(proposal.id)) {
        throw new DuplicateProposalError(proposal.id);
      }
      this.proposals.set(proposal.id, { ...proposal });
    }
  }

  submitProposal(caller: Address, params: SubmitProposalParams, now: number): Proposal {
    const proposal = this.guard.rateLimited(caller, now, () => {
      const available = this.vault.getBalance();
      if (params.value >= available) {
        throw new InsufficientFundsError(params.value, available);
      }

      const id = deriveProposalId({
        sponsor: caller,
        url: params.url,
        digest: params.digest,
        wallet: params.wallet,
        value: params.value,
        timeSubmitted: now,
      });

      if (this.proposals.has(id)) {
        throw new DuplicateProposalError(id);
      }

      const record: Proposal = {
        id,
        sponsor: caller,
        url: params.url,
        digest: params.digest,
        wallet: params.wallet,
        value: params.value,
        timeSubmitted: now,
      };
      this.proposals.set(id, record);
      return { ...record };
    });

    ledgerLogger.info({
      proposalId: proposal.id,
      sponsor: caller,
      wallet: proposal.wallet,
      value: proposal.value.toString(),
      at: now,
    }, "Proposal submitted");

    this.emit({ type: "NewProposal", sponsor: caller, proposalId: proposal.id, at: now });

    return proposal;
  }

  /**
   * Any full member may veto any proposal inside its window.
   * A missing id reads as the zero record (timeSubmitted = 0).
   */
  vetoProposal(caller: Address, id: Hex, now: number): void {
    this.guard.requireFullMember(caller, now);

    const proposal = this.proposals.get(id);
    if (!proposal && this.config.rejectUnknownProposalVeto) {
      throw new ProposalNotFoundError(id);
    }

    const closesAt = (proposal?.timeSubmitted ?? 0) + ONE_WEEK;
    if (now >= closesAt) {
      throw new VetoWindowClosedError(`proposal ${id}`, closesAt);
    }

    if (proposal) {
      proposal.value = 0n;
    } else {
      ledgerLogger.warn({ proposalId: id, vetoer: caller }, "Veto of unknown proposal id accepted");
    }

    ledgerLogger.info({ proposalId: id, vetoer: caller, at: now }, "Proposal vetoed");

    this.emit({ type: "ProposalVetoed", vetoer: caller, proposalId: id, at: now });
  }

  /**
   * Open to anyone once the window has passed. Returns the amount released,
   * 0n when the proposal was already neutralized or never existed.
   */
  claimProposal(caller: Address, id: Hex, now: number): bigint {
    const proposal = this.proposals.get(id);
    const timeSubmitted = proposal?.timeSubmitted ?? 0;

    const claimableAt = timeSubmitted + ONE_WEEK;
    if (now < claimableAt) {
      throw new NotYetClaimableError(id, claimableAt);
    }

    if (!proposal || proposal.value === 0n) {
      ledgerLogger.debug({ proposalId: id, caller }, "Claim on neutralized proposal ignored");
      return 0n;
    }

    const value = proposal.value;
    this.vault.release(proposal.wallet, value);
    // Zeroed before any listener runs, so a re-entrant claim sees nothing to pay
    proposal.value = 0n;

    ledgerLogger.info({
      proposalId: id,
      caller,
      wallet: proposal.wallet,
      value: value.toString(),
      at: now,
    }, "Proposal claimed");

    this.emit({ type: "ProposalClaimed", proposalId: id, wallet: proposal.wallet, value, at: now });

    return value;
  }

  donate(donor: Address, amount: bigint, now: number): bigint {
    const balance = this.vault.deposit(amount);

    ledgerLogger.info({
      donor,
      amount: amount.toString(),
      balance: balance.toString(),
    }, "Donation received");

    this.emit({ type: "NewDonation", donor, amount, at: now });

    return balance;
  }

  getProposal(id: Hex): Proposal | undefined {
    const proposal = this.proposals.get(id);
    return proposal ? { ...proposal } : undefined;
  }

  getStatus(id: Hex, now: number): ProposalStatus {
    const proposal = this.proposals.get(id);
    if (!proposal) {
      return "absent";
    }
    if (proposal.value === 0n) {
      return "neutralized";
    }
    return now - proposal.timeSubmitted < ONE_WEEK ? "pending" : "claimable";
  }

  listProposals(): Proposal[] {
    return Array.from(this.proposals.values(), (p) => ({ ...p }));
  }

  get size(): number {
    return this.proposals.size;
  }
}
